export const PROPERTY_CONSTANTS = {
    TITLE: {
        MAX_LENGTH: 300,
    },

    PROPERTY_TYPE: {
        MAX_LENGTH: 100,
    },

    ADDRESS: {
        MAX_LENGTH: 500,
    },

    BEDROOMS: {
        MIN: 0,
        DEFAULT: 1,
    },

    // decimal(3,1)
    BATHROOMS: {
        MIN: 0,
        MAX: 99.9,
        DECIMAL_PLACES: 1,
        DEFAULT: 1,
    },

    GUESTS: {
        MIN: 1,
        DEFAULT: 2,
    },

    // decimal(10,2)
    PRICE: {
        MIN: 0,
        MAX: 99999999.99,
        DECIMAL_PLACES: 2,
    },

    AMENITY_DELIMITER: ',',

    DEFAULT_PAGE_SIZE: 10,
} as const;

export type PropertyConstants = typeof PROPERTY_CONSTANTS;
