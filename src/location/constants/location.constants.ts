export const LOCATION_CONSTANTS = {
    NAME: {
        MAX_LENGTH: 200,
    },

    CITY: {
        MAX_LENGTH: 100,
    },

    STATE: {
        MAX_LENGTH: 100,
    },

    COUNTRY: {
        MAX_LENGTH: 100,
    },

    DEFAULT_COUNTRY: 'USA',

    // Autocomplete fragment rules
    AUTOCOMPLETE: {
        MIN_LENGTH: 2,
        MAX_LENGTH: 100,
        DEFAULT_LIMIT: 5,
    },
} as const;

export type LocationConstants = typeof LOCATION_CONSTANTS;

export const LOCATION_ORDERINGS = ['name', '-name', 'city', '-city'] as const;

export type LocationOrdering = (typeof LOCATION_ORDERINGS)[number];
