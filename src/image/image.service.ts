import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Not, Repository } from 'typeorm';
import { mkdir, unlink, writeFile } from 'fs/promises';
import { extname, join, resolve } from 'path';
import { PropertyImage } from './entities/property-image.entity';
import { Property } from '../property/entities/property.entity';
import { CreateImageDto } from './dto/create-image.dto';
import { UpdateImageDto } from './dto/update-image.dto';
import { FileWithBuffer } from './interface/upload.interface';
import { IMAGE_CONSTANTS } from './constants/image.constants';
import { readMediaUrl, toImageView } from './image.mapper';
import { IMAGE_DISPLAY_ORDER } from './utils/image-order';
import { RequestContext } from '../common/request-context';

const EXTENSION_BY_MIME: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/webp': '.webp',
};

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

@Injectable()
export class ImageService {
  private readonly logger = new Logger(ImageService.name);
  private readonly mediaRoot: string;
  private readonly mediaUrl: string;

  constructor(
    @InjectRepository(PropertyImage)
    private readonly images: Repository<PropertyImage>,
    @InjectRepository(Property)
    private readonly properties: Repository<Property>,
    private readonly dataSource: DataSource,
    private readonly config: ConfigService,
  ) {
    this.mediaRoot = resolve(this.config.get<string>('MEDIA_ROOT') || IMAGE_CONSTANTS.DEFAULT_MEDIA_ROOT);
    this.mediaUrl = readMediaUrl(this.config);
  }

  async findForProperty(propertyId: number) {
    await this.ensurePropertyExists(propertyId);
    const images = await this.images.find({ where: { propertyId }, order: IMAGE_DISPLAY_ORDER });

    return {
      message: 'Images fetched successfully',
      results: images.length,
      data: images.map((image) => toImageView(image, this.mediaUrl)),
    };
  }

  async upload(propertyId: number, file: FileWithBuffer, dto: CreateImageDto, ctx: RequestContext) {
    await this.ensurePropertyExists(propertyId);

    const relativePath = await this.storeFile(propertyId, file);

    let saved: PropertyImage;
    try {
      saved = await this.dataSource.transaction(async (manager) => {
        // Only one primary image per property; the newest flag wins
        if (dto.is_primary) {
          await manager.update(PropertyImage, { propertyId }, { isPrimary: false });
        }
        const image = manager.create(PropertyImage, {
          propertyId,
          path: relativePath,
          caption: dto.caption?.trim() || null,
          isPrimary: dto.is_primary ?? false,
        });
        return manager.save(image);
      });
    } catch (error) {
      await this.deleteFile(relativePath);
      throw error;
    }

    this.logger.log(`[${ctx.requestId}] stored image ${saved.id} for property ${propertyId}`);

    return {
      message: 'Image uploaded successfully',
      data: toImageView(saved, this.mediaUrl),
    };
  }

  async update(id: number, dto: UpdateImageDto, ctx: RequestContext) {
    const image = await this.findEntity(id);

    if (dto.caption !== undefined) image.caption = dto.caption.trim() || null;
    if (dto.is_primary !== undefined) image.isPrimary = dto.is_primary;

    const saved = await this.dataSource.transaction(async (manager) => {
      if (image.isPrimary) {
        await manager.update(PropertyImage, { propertyId: image.propertyId, id: Not(image.id) }, { isPrimary: false });
      }
      return manager.save(image);
    });
    this.logger.log(`[${ctx.requestId}] updated image ${id}`);

    return {
      message: 'Image updated successfully',
      data: toImageView(saved, this.mediaUrl),
    };
  }

  async remove(id: number, ctx: RequestContext) {
    const image = await this.findEntity(id);

    await this.images.delete({ id });
    await this.deleteFile(image.path);
    this.logger.log(`[${ctx.requestId}] deleted image ${id}`);

    return { message: 'Image deleted successfully' };
  }

  private async storeFile(propertyId: number, file: FileWithBuffer): Promise<string> {
    const ext = extname(file.originalname).toLowerCase() || EXTENSION_BY_MIME[file.mimetype] || '';
    const uniqueSuffix = `${Date.now()}-${Math.round(Math.random() * 1e9)}`;
    const filename = `property-${propertyId}-${uniqueSuffix}${ext}`;

    const directory = join(this.mediaRoot, IMAGE_CONSTANTS.UPLOAD_SUBDIR);
    await mkdir(directory, { recursive: true });
    await writeFile(join(directory, filename), file.buffer);

    // Stored with forward slashes: it doubles as the URL suffix
    return `${IMAGE_CONSTANTS.UPLOAD_SUBDIR}/${filename}`;
  }

  private async deleteFile(relativePath: string): Promise<void> {
    try {
      await unlink(join(this.mediaRoot, relativePath));
    } catch (error) {
      if (isMissingFileError(error)) return;
      this.logger.warn(
        `Failed to remove ${relativePath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async ensurePropertyExists(propertyId: number): Promise<void> {
    const exists = await this.properties.exists({ where: { id: propertyId } });
    if (!exists) {
      throw new NotFoundException('Property not found');
    }
  }

  private async findEntity(id: number): Promise<PropertyImage> {
    const image = await this.images.findOne({ where: { id } });
    if (!image) {
      throw new NotFoundException('Image not found');
    }
    return image;
  }
}
