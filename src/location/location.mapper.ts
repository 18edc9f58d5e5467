import { Location } from './entities/location.entity';
import { LocationDetail, LocationSummary } from './interface/location-response.interface';

export function toLocationSummary(location: Location): LocationSummary {
  return {
    id: location.id,
    name: location.name,
    city: location.city,
    state: location.state,
    country: location.country,
  };
}

export function toLocationDetail(location: Location): LocationDetail {
  return {
    ...toLocationSummary(location),
    description: location.description,
    created_at: location.createdAt.toISOString(),
    updated_at: location.updatedAt.toISOString(),
  };
}
