export interface FileWithBuffer {
    buffer: Buffer;
    mimetype: string;
    originalname: string;
    size: number;
}

// A type alias so it satisfies FileValidator's Record<string, any> options bound
export type FileValidatorOptions = {
    allowedMimeTypes: readonly string[];
    maxFileSize: number;
};
