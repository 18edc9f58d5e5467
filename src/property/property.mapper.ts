import { Property } from './entities/property.entity';
import { PropertyImage } from '../image/entities/property-image.entity';
import { PropertyDetail, PropertyListItem } from './interface/property-response.interface';
import { toLocationSummary } from '../location/location.mapper';
import { mediaUrlFor, toImageView } from '../image/image.mapper';
import { joinAmenities } from './utils/amenities.util';

// `images` must already be in display order: primary first, then oldest upload
export function toPropertyListItem(property: Property, images: PropertyImage[], mediaUrl: string): PropertyListItem {
  const [first] = images;
  return {
    id: property.id,
    title: property.title,
    location: property.location ? toLocationSummary(property.location) : null,
    property_type: property.propertyType,
    bedrooms: property.bedrooms,
    bathrooms: property.bathrooms,
    max_guests: property.maxGuests,
    price_per_night: property.pricePerNight,
    first_image: first ? mediaUrlFor(mediaUrl, first.path) : null,
    is_available: property.isAvailable,
  };
}

export function toPropertyDetail(property: Property, images: PropertyImage[], mediaUrl: string): PropertyDetail {
  const { first_image: _firstImage, ...summary } = toPropertyListItem(property, images, mediaUrl);
  return {
    ...summary,
    description: property.description,
    address: property.address,
    amenities: joinAmenities(property.amenities),
    amenities_list: [...property.amenities],
    images: images.map((image) => toImageView(image, mediaUrl)),
    created_at: property.createdAt.toISOString(),
    updated_at: property.updatedAt.toISOString(),
  };
}
