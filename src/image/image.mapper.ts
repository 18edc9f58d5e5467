import { ConfigService } from '@nestjs/config';
import { PropertyImage } from './entities/property-image.entity';
import { PropertyImageView } from './interface/image-response.interface';
import { IMAGE_CONSTANTS } from './constants/image.constants';

export function readMediaUrl(config: ConfigService): string {
  return config.get<string>('MEDIA_URL') || IMAGE_CONSTANTS.DEFAULT_MEDIA_URL;
}

/** "/media/" + "property_images/a.jpg" -> "/media/property_images/a.jpg" */
export function mediaUrlFor(mediaUrl: string, path: string): string {
  return `${mediaUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function toImageView(image: PropertyImage, mediaUrl: string): PropertyImageView {
  return {
    id: image.id,
    image: mediaUrlFor(mediaUrl, image.path),
    caption: image.caption,
    is_primary: image.isPrimary,
  };
}
