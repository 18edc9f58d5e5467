import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { Location } from './entities/location.entity';
import { Property } from '../property/entities/property.entity';
import { CreateLocationDto } from './dto/create-location.dto';
import { UpdateLocationDto } from './dto/update-location.dto';
import { LocationQueryDto } from './dto/location-query.dto';
import { LOCATION_CONSTANTS, LocationOrdering } from './constants/location.constants';
import { rankLocationMatches } from './utils/autocomplete.ranker';
import { toLocationDetail, toLocationSummary } from './location.mapper';
import { RequestContext } from '../common/request-context';
import { readPositiveInt } from '../common/utils/config.util';
import { containsPattern, LIKE_ESCAPE } from '../common/utils/like.util';

const ORDER_COLUMNS: Record<LocationOrdering, [string, 'ASC' | 'DESC']> = {
  name: ['location.name', 'ASC'],
  '-name': ['location.name', 'DESC'],
  city: ['location.city', 'ASC'],
  '-city': ['location.city', 'DESC'],
};

const FRAGMENT_MATCH = [
  `LOWER(location.name) LIKE :pattern ${LIKE_ESCAPE}`,
  `LOWER(location.city) LIKE :pattern ${LIKE_ESCAPE}`,
  `LOWER(location.state) LIKE :pattern ${LIKE_ESCAPE}`,
].join(' OR ');

@Injectable()
export class LocationService {
  private readonly logger = new Logger(LocationService.name);
  private readonly autocompleteLimit: number;

  constructor(
    @InjectRepository(Location)
    private readonly locations: Repository<Location>,
    private readonly dataSource: DataSource,
    private readonly config: ConfigService,
  ) {
    this.autocompleteLimit = readPositiveInt(
      this.config,
      'AUTOCOMPLETE_LIMIT',
      LOCATION_CONSTANTS.AUTOCOMPLETE.DEFAULT_LIMIT,
    );
  }

  async findAll(query: LocationQueryDto) {
    const qb = this.locations.createQueryBuilder('location');

    const search = query.search?.trim();
    if (search) {
      qb.where(`(${FRAGMENT_MATCH})`, { pattern: containsPattern(search) });
    }

    const [column, direction] = ORDER_COLUMNS[query.ordering ?? 'name'];
    qb.orderBy(column, direction).addOrderBy('location.id', 'ASC');

    const locations = await qb.getMany();

    return {
      message: 'Locations fetched successfully',
      results: locations.length,
      data: locations.map(toLocationSummary),
    };
  }

  async findOne(id: number) {
    const location = await this.findEntity(id);
    return {
      message: 'Location fetched successfully',
      data: toLocationDetail(location),
    };
  }

  async autocomplete(fragment: string | undefined, ctx: RequestContext) {
    const needle = fragment?.trim() ?? '';

    if (needle.length < LOCATION_CONSTANTS.AUTOCOMPLETE.MIN_LENGTH) {
      return {
        message: 'Locations fetched successfully',
        results: 0,
        data: [],
      };
    }

    const candidates = await this.locations
      .createQueryBuilder('location')
      .where(`(${FRAGMENT_MATCH})`, { pattern: containsPattern(needle) })
      .getMany();

    const matches = rankLocationMatches(candidates, needle, this.autocompleteLimit);
    this.logger.debug(`[${ctx.requestId}] autocomplete "${needle}": ${matches.length}/${candidates.length}`);

    return {
      message: 'Locations fetched successfully',
      results: matches.length,
      data: matches.map(toLocationSummary),
    };
  }

  async create(dto: CreateLocationDto, ctx: RequestContext) {
    const location = this.locations.create({
      name: dto.name.trim(),
      city: dto.city.trim(),
      state: dto.state.trim(),
      country: dto.country?.trim() || LOCATION_CONSTANTS.DEFAULT_COUNTRY,
      description: dto.description?.trim() || null,
    });

    const saved = await this.locations.save(location);
    this.logger.log(`[${ctx.requestId}] created location ${saved.id}`);

    return {
      message: 'Location created successfully',
      data: toLocationDetail(saved),
    };
  }

  async update(id: number, dto: UpdateLocationDto, ctx: RequestContext) {
    const location = await this.findEntity(id);

    if (dto.name !== undefined) location.name = dto.name.trim();
    if (dto.city !== undefined) location.city = dto.city.trim();
    if (dto.state !== undefined) location.state = dto.state.trim();
    if (dto.country !== undefined) location.country = dto.country.trim() || LOCATION_CONSTANTS.DEFAULT_COUNTRY;
    if (dto.description !== undefined) location.description = dto.description.trim() || null;

    const saved = await this.locations.save(location);
    this.logger.log(`[${ctx.requestId}] updated location ${id}`);

    return {
      message: 'Location updated successfully',
      data: toLocationDetail(saved),
    };
  }

  async remove(id: number, ctx: RequestContext) {
    await this.findEntity(id);

    // Properties outlive their location; only the reference is cleared
    await this.dataSource.transaction(async (manager) => {
      await manager.update(Property, { locationId: id }, { locationId: null });
      await manager.delete(Location, { id });
    });
    this.logger.log(`[${ctx.requestId}] deleted location ${id}`);

    return { message: 'Location deleted successfully' };
  }

  private async findEntity(id: number): Promise<Location> {
    const location = await this.locations.findOne({ where: { id } });
    if (!location) {
      throw new NotFoundException('Location not found');
    }
    return location;
  }
}
