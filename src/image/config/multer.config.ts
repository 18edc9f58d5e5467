import { memoryStorage } from 'multer';
import { BadRequestException } from '@nestjs/common';
import { MulterOptions } from '@nestjs/platform-express/multer/interfaces/multer-options.interface';
import { IMAGE_CONSTANTS } from '../constants/image.constants';

const allowedMimes: readonly string[] = IMAGE_CONSTANTS.ALLOWED_MIME_TYPES;

// Files stay in memory so the signature validator can read the buffer;
// ImageService writes them under MEDIA_ROOT once validated.
export const multerOptions: MulterOptions = {
  storage: memoryStorage(),

  fileFilter: (req, file, cb) => {
    if (!allowedMimes.includes(file.mimetype)) {
      return cb(
        new BadRequestException(
          `Invalid file type. Allowed types: ${allowedMimes.join(', ')}`,
        ),
        false,
      );
    }
    cb(null, true);
  },

  limits: {
    fileSize: IMAGE_CONSTANTS.MAX_FILE_SIZE,
    files: 1,
  },
};
