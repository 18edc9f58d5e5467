import { BadRequestException, PayloadTooLargeException } from '@nestjs/common';
import { FileSignatureValidator } from '../validation/file-signature.validator';
import { FileWithBuffer } from '../interface/upload.interface';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);

describe('FileSignatureValidator', () => {
  const validator = new FileSignatureValidator({
    allowedMimeTypes: ['image/jpeg', 'image/png'],
    maxFileSize: 1024,
  });

  const file = (overrides: Partial<FileWithBuffer> = {}): FileWithBuffer => ({
    buffer: PNG_BYTES,
    mimetype: 'image/png',
    originalname: 'photo.png',
    size: PNG_BYTES.length,
    ...overrides,
  });

  it('should accept a file whose signature matches its MIME type', () => {
    expect(validator.isValid(file())).toBe(true);
  });

  it('should reject a MIME type outside the allowed list', () => {
    expect(validator.isValid(file({ mimetype: 'image/gif' }))).toBe(false);
  });

  it('should throw BadRequestException when the signature does not match', () => {
    expect(() => validator.isValid(file({ mimetype: 'image/jpeg' }))).toThrow(BadRequestException);
  });

  it('should throw BadRequestException when no signature is recognised', () => {
    const text = Buffer.from('plain text');
    expect(() => validator.isValid(file({ buffer: text, size: text.length }))).toThrow(
      'Unable to detect file signature.',
    );
  });

  it('should throw PayloadTooLargeException above the size limit', () => {
    expect(() => validator.isValid(file({ size: 4096 }))).toThrow(PayloadTooLargeException);
  });

  it('should throw BadRequestException when no file is given', () => {
    expect(() => validator.isValid(undefined)).toThrow(BadRequestException);
  });
});
