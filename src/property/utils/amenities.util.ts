import { PROPERTY_CONSTANTS } from '../constants/property.constants';

const DELIMITER = PROPERTY_CONSTANTS.AMENITY_DELIMITER;

/** "WiFi, Pool,,Kitchen" -> ["WiFi", "Pool", "Kitchen"] */
export function parseAmenities(raw: string | null | undefined): string[] {
  if (!raw) return [];
  return normalizeAmenities(raw.split(DELIMITER));
}

// A tag may not carry the delimiter, or it would split on the way back out
export function normalizeAmenities(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags.flatMap((t) => t.split(DELIMITER))) {
    const trimmed = tag.trim();
    if (!trimmed || seen.has(trimmed)) continue;
    seen.add(trimmed);
    result.push(trimmed);
  }
  return result;
}

export function joinAmenities(tags: readonly string[]): string {
  return tags.join(DELIMITER);
}
