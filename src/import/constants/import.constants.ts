export const PROPERTY_MATCH_KEYS = ['title', 'address'] as const;

export type PropertyMatchKey = (typeof PROPERTY_MATCH_KEYS)[number];

export function isPropertyMatchKey(value: string): value is PropertyMatchKey {
    return PROPERTY_MATCH_KEYS.some((key) => key === value);
}

export const IMPORT_CONSTANTS = {
    DEFAULT_TRUE_TOKENS: ['true', '1', 'yes', 'y'],
    DEFAULT_FALSE_TOKENS: ['false', '0', 'no', 'n'],

    DEFAULT_PROPERTY_KEY: 'title',

    LOCATION_COLUMNS: {
        REQUIRED: ['name', 'city', 'state'],
        OPTIONAL: ['country', 'description'],
    },

    PROPERTY_COLUMNS: {
        REQUIRED: ['title', 'price_per_night'],
        // Required unless location resolution is skipped
        LOCATION: ['location', 'city', 'state'],
        OPTIONAL: [
            'description',
            'property_type',
            'bedrooms',
            'bathrooms',
            'max_guests',
            'address',
            'amenities',
            'is_available',
            'country',
        ],
    },
} as const;

export type ImportConstants = typeof IMPORT_CONSTANTS;
