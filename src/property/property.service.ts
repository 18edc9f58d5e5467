import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { Property } from './entities/property.entity';
import { Location } from '../location/entities/location.entity';
import { PropertyImage } from '../image/entities/property-image.entity';
import { CreatePropertyDto } from './dto/create-property.dto';
import { UpdatePropertyDto } from './dto/update-property.dto';
import { PropertyQueryDto } from './dto/property-query.dto';
import { PropertyQueryBuilder } from './utils/property-query.builder';
import { normalizeAmenities } from './utils/amenities.util';
import { PROPERTY_CONSTANTS } from './constants/property.constants';
import { toPropertyDetail, toPropertyListItem } from './property.mapper';
import { Pagination } from './interface/property-response.interface';
import { readMediaUrl } from '../image/image.mapper';
import { IMAGE_DISPLAY_ORDER } from '../image/utils/image-order';
import { RequestContext } from '../common/request-context';
import { readPositiveInt } from '../common/utils/config.util';

@Injectable()
export class PropertyService {
  private readonly logger = new Logger(PropertyService.name);
  private readonly pageSize: number;
  private readonly mediaUrl: string;

  constructor(
    @InjectRepository(Property)
    private readonly properties: Repository<Property>,
    @InjectRepository(Location)
    private readonly locations: Repository<Location>,
    @InjectRepository(PropertyImage)
    private readonly images: Repository<PropertyImage>,
    private readonly dataSource: DataSource,
    private readonly config: ConfigService,
  ) {
    this.pageSize = readPositiveInt(this.config, 'PAGE_SIZE', PROPERTY_CONSTANTS.DEFAULT_PAGE_SIZE);
    this.mediaUrl = readMediaUrl(this.config);
  }

  async findAll(query: PropertyQueryDto, ctx: RequestContext) {
    // Pagination
    const page = query.page ?? 1;
    const limit = this.pageSize;
    const skip = (page - 1) * limit;

    const filter = PropertyQueryBuilder.fromQuery(query);
    const qb = this.properties
      .createQueryBuilder('property')
      .leftJoinAndSelect('property.location', 'location');

    PropertyQueryBuilder.applyFilters(qb, filter)
      .orderBy('property.id', 'ASC')
      .skip(skip)
      .take(limit);

    const [properties, total] = await qb.getManyAndCount();
    const imagesByProperty = await this.loadImages(properties.map((p) => p.id));

    this.logger.debug(`[${ctx.requestId}] listing page ${page}: ${properties.length} of ${total}`);

    const data = properties.map((property) =>
      toPropertyListItem(property, imagesByProperty.get(property.id) ?? [], this.mediaUrl),
    );

    const pagination: Pagination = {
      totalItems: total,
      currentPage: page,
      totalPages: Math.ceil(total / limit),
      limit,
    };

    return {
      message: 'Properties fetched successfully',
      pagination,
      results: data.length,
      data,
    };
  }

  async findOne(id: number) {
    const property = await this.findEntity(id);
    const images = await this.images.find({ where: { propertyId: id }, order: IMAGE_DISPLAY_ORDER });

    return {
      message: 'Property fetched successfully',
      data: toPropertyDetail(property, images, this.mediaUrl),
    };
  }

  async create(dto: CreatePropertyDto, ctx: RequestContext) {
    const location = dto.location_id != null ? await this.findLocation(dto.location_id) : null;

    const property = this.properties.create({
      title: dto.title.trim(),
      description: dto.description.trim(),
      locationId: location?.id ?? null,
      location,
      propertyType: dto.property_type?.trim() || null,
      bedrooms: dto.bedrooms ?? PROPERTY_CONSTANTS.BEDROOMS.DEFAULT,
      bathrooms: dto.bathrooms ?? PROPERTY_CONSTANTS.BATHROOMS.DEFAULT,
      maxGuests: dto.max_guests ?? PROPERTY_CONSTANTS.GUESTS.DEFAULT,
      pricePerNight: dto.price_per_night,
      address: dto.address?.trim() || null,
      amenities: normalizeAmenities(dto.amenities ?? []),
      isAvailable: dto.is_available ?? true,
    });

    const saved = await this.properties.save(property);
    this.logger.log(`[${ctx.requestId}] created property ${saved.id}`);

    return {
      message: 'Property created successfully',
      data: toPropertyDetail(saved, [], this.mediaUrl),
    };
  }

  async update(id: number, dto: UpdatePropertyDto, ctx: RequestContext) {
    const property = await this.findEntity(id);

    if (dto.location_id !== undefined) {
      const location = dto.location_id === null ? null : await this.findLocation(dto.location_id);
      property.location = location;
      property.locationId = location?.id ?? null;
    }
    if (dto.title !== undefined) property.title = dto.title.trim();
    if (dto.description !== undefined) property.description = dto.description.trim();
    if (dto.property_type !== undefined) property.propertyType = dto.property_type.trim() || null;
    if (dto.bedrooms !== undefined) property.bedrooms = dto.bedrooms;
    if (dto.bathrooms !== undefined) property.bathrooms = dto.bathrooms;
    if (dto.max_guests !== undefined) property.maxGuests = dto.max_guests;
    if (dto.price_per_night !== undefined) property.pricePerNight = dto.price_per_night;
    if (dto.address !== undefined) property.address = dto.address.trim() || null;
    if (dto.amenities !== undefined) property.amenities = normalizeAmenities(dto.amenities);
    if (dto.is_available !== undefined) property.isAvailable = dto.is_available;

    const saved = await this.properties.save(property);
    const images = await this.images.find({ where: { propertyId: id }, order: IMAGE_DISPLAY_ORDER });
    this.logger.log(`[${ctx.requestId}] updated property ${id}`);

    return {
      message: 'Property updated successfully',
      data: toPropertyDetail(saved, images, this.mediaUrl),
    };
  }

  async remove(id: number, ctx: RequestContext) {
    await this.findEntity(id);

    await this.dataSource.transaction(async (manager) => {
      await manager.delete(PropertyImage, { propertyId: id });
      await manager.delete(Property, { id });
    });
    this.logger.log(`[${ctx.requestId}] deleted property ${id}`);

    return { message: 'Property deleted successfully' };
  }

  private async findEntity(id: number): Promise<Property> {
    const property = await this.properties.findOne({
      where: { id },
      relations: { location: true },
    });
    if (!property) {
      throw new NotFoundException('Property not found');
    }
    return property;
  }

  private async findLocation(id: number): Promise<Location> {
    const location = await this.locations.findOne({ where: { id } });
    if (!location) {
      throw new NotFoundException('Location not found');
    }
    return location;
  }

  private async loadImages(propertyIds: number[]): Promise<Map<number, PropertyImage[]>> {
    const byProperty = new Map<number, PropertyImage[]>();
    if (propertyIds.length === 0) return byProperty;

    const images = await this.images.find({
      where: { propertyId: In(propertyIds) },
      order: IMAGE_DISPLAY_ORDER,
    });
    for (const image of images) {
      const list = byProperty.get(image.propertyId) ?? [];
      list.push(image);
      byProperty.set(image.propertyId, list);
    }
    return byProperty;
  }
}
