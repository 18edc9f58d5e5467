import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Location } from '../../location/entities/location.entity';
import { PropertyImage } from '../../image/entities/property-image.entity';
import { numericTransformer } from '../../common/utils/numeric.transformer';
import { PROPERTY_CONSTANTS } from '../constants/property.constants';

@Entity('properties')
export class Property {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: PROPERTY_CONSTANTS.TITLE.MAX_LENGTH })
  title!: string;

  @Column('text')
  description!: string;

  @Column({ type: 'integer', nullable: true })
  locationId!: number | null;

  // Deleting a location keeps its properties and clears the reference
  @ManyToOne(() => Location, (location) => location.properties, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'locationId' })
  location!: Location | null;

  @Column({ type: 'varchar', length: PROPERTY_CONSTANTS.PROPERTY_TYPE.MAX_LENGTH, nullable: true })
  propertyType!: string | null;

  @Column({ type: 'integer', default: PROPERTY_CONSTANTS.BEDROOMS.DEFAULT })
  bedrooms!: number;

  @Column({
    type: 'decimal',
    precision: 3,
    scale: 1,
    default: PROPERTY_CONSTANTS.BATHROOMS.DEFAULT,
    transformer: numericTransformer,
  })
  bathrooms!: number;

  @Column({ type: 'integer', default: PROPERTY_CONSTANTS.GUESTS.DEFAULT })
  maxGuests!: number;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: numericTransformer })
  pricePerNight!: number;

  @Column({ type: 'varchar', length: PROPERTY_CONSTANTS.ADDRESS.MAX_LENGTH, nullable: true })
  address!: string | null;

  // Stored as a comma-joined tag list
  @Column('simple-array', { default: '' })
  amenities!: string[];

  @Column({ default: true })
  isAvailable!: boolean;

  @OneToMany(() => PropertyImage, (image) => image.property)
  images?: PropertyImage[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
