export const IMAGE_CONSTANTS = {
    // Subdirectory of MEDIA_ROOT; also the prefix of every stored path
    UPLOAD_SUBDIR: 'property_images',

    DEFAULT_MEDIA_ROOT: 'media',
    DEFAULT_MEDIA_URL: '/media/',

    ALLOWED_MIME_TYPES: ['image/jpeg', 'image/png', 'image/webp'],

    MAX_FILE_SIZE: 5 * 1024 * 1024,

    CAPTION: {
        MAX_LENGTH: 200,
    },
} as const;

export type ImageConstants = typeof IMAGE_CONSTANTS;
