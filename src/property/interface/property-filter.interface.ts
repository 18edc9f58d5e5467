export interface PropertyFilter {
    location?: string;
    propertyType?: string;
    minBedrooms?: number;
    isAvailable?: boolean;
    search?: string;
}
