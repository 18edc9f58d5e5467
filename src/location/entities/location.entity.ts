import {
  Column,
  CreateDateColumn,
  Entity,
  OneToMany,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { Property } from '../../property/entities/property.entity';
import { LOCATION_CONSTANTS } from '../constants/location.constants';

@Entity('locations')
@Unique('unique_location', ['name', 'city', 'country'])
export class Location {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: LOCATION_CONSTANTS.NAME.MAX_LENGTH })
  name!: string;

  @Column({ length: LOCATION_CONSTANTS.CITY.MAX_LENGTH })
  city!: string;

  @Column({ length: LOCATION_CONSTANTS.STATE.MAX_LENGTH })
  state!: string;

  @Column({ length: LOCATION_CONSTANTS.COUNTRY.MAX_LENGTH, default: LOCATION_CONSTANTS.DEFAULT_COUNTRY })
  country!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @OneToMany(() => Property, (property) => property.location)
  properties?: Property[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
