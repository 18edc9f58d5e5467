import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Property } from '../../property/entities/property.entity';

@Entity('property_images')
export class PropertyImage {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  propertyId!: number;

  @ManyToOne(() => Property, (property) => property.images, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'propertyId' })
  property?: Property;

  // Relative to MEDIA_ROOT
  @Column({ length: 255 })
  path!: string;

  @Column({ type: 'varchar', length: 200, nullable: true })
  caption!: string | null;

  @Column({ default: false })
  isPrimary!: boolean;

  @CreateDateColumn()
  uploadedAt!: Date;
}
