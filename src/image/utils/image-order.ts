import { FindOptionsOrder } from 'typeorm';
import { PropertyImage } from '../entities/property-image.entity';

export const IMAGE_DISPLAY_ORDER: FindOptionsOrder<PropertyImage> = {
  isPrimary: 'DESC',
  uploadedAt: 'ASC',
  id: 'ASC',
};
