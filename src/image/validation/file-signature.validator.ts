import { BadRequestException, FileValidator, PayloadTooLargeException } from "@nestjs/common";
import { filetypeinfo } from 'magic-bytes.js';
import { FileValidatorOptions, FileWithBuffer } from "../interface/upload.interface";



export class FileSignatureValidator extends FileValidator<FileValidatorOptions> {
    private readonly allowedMimeTypes: readonly string[];
    private readonly maxFileSize: number;
    constructor(options: FileValidatorOptions) {
        super(options);
        this.allowedMimeTypes = options.allowedMimeTypes;
        this.maxFileSize = options.maxFileSize;
    }

    isValid(file?: FileWithBuffer): boolean {
        if (!file || !file.buffer || !file.mimetype || !file.size || !file.originalname) {
            throw new BadRequestException("Invalid file or missing required properties (buffer, mimetype, size, originalname).");
        }
        if (file.size > this.maxFileSize) {
            throw new PayloadTooLargeException(
                `File size (${file.size} bytes) exceeds the allowed limit (${this.maxFileSize} bytes).`,
            );
        }
        if (!this.allowedMimeTypes.includes(file.mimetype)) {
            return false;
        }
        // validate file signature
        const fileSignatures = filetypeinfo(file.buffer)
            .map((info) => info.mime)
            .filter((mime): mime is string => typeof mime === 'string');
        if (!fileSignatures.length) {
            throw new BadRequestException("Unable to detect file signature.");
        }

        const isMatch = fileSignatures.includes(file.mimetype);
        if (!isMatch) {
            throw new BadRequestException(
                `File signature does not match the MIME type. Detected signatures: ${fileSignatures.join(', ')}, but got: ${file.mimetype}`,
            );
        }

        return true;
    }
    buildErrorMessage(file: FileWithBuffer): string {
        return `File validation failed for ${file.originalname}. Allowed MIME types: ${this.allowedMimeTypes.join(', ')}. Max file size: ${this.maxFileSize} bytes.`;
    }
}
