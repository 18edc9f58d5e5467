import { LocationSummary } from '../../location/interface/location-response.interface';
import { PropertyImageView } from '../../image/interface/image-response.interface';

export interface PropertyListItem {
  id: number;
  title: string;
  location: LocationSummary | null;
  property_type: string | null;
  bedrooms: number;
  bathrooms: number;
  max_guests: number;
  price_per_night: number;
  first_image: string | null;
  is_available: boolean;
}

export interface PropertyDetail extends Omit<PropertyListItem, 'first_image'> {
  description: string;
  address: string | null;
  amenities: string;
  amenities_list: string[];
  images: PropertyImageView[];
  created_at: string;
  updated_at: string;
}

export interface Pagination {
  totalItems: number;
  currentPage: number;
  totalPages: number;
  limit: number;
}
