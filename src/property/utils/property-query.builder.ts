import { Brackets, SelectQueryBuilder } from 'typeorm';
import { Property } from '../entities/property.entity';
import { PropertyQueryDto } from '../dto/property-query.dto';
import { PropertyFilter } from '../interface/property-filter.interface';
import { containsPattern, LIKE_ESCAPE } from '../../common/utils/like.util';

/**
 * Applies listing filters to a query builder aliased `property` with the
 * location joined as `location`. Every supplied filter is AND-ed; absent
 * filters are not applied.
 */
export class PropertyQueryBuilder {
    static fromQuery(query: PropertyQueryDto): PropertyFilter {
        return {
            location: query.location?.trim() || undefined,
            propertyType: query.property_type?.trim() || undefined,
            minBedrooms: query.bedrooms,
            isAvailable: query.is_available,
            search: query.search?.trim() || undefined,
        };
    }

    static applyFilters(qb: SelectQueryBuilder<Property>, filter: PropertyFilter): SelectQueryBuilder<Property> {
        // Location search
        if (filter.location) {
            qb.andWhere(
                new Brackets((where) => {
                    where
                        .where(`LOWER(location.name) LIKE :location ${LIKE_ESCAPE}`)
                        .orWhere(`LOWER(location.city) LIKE :location ${LIKE_ESCAPE}`);
                }),
                { location: containsPattern(filter.location) },
            );
        }

        if (filter.propertyType) {
            qb.andWhere('LOWER(property.propertyType) = :propertyType', {
                propertyType: filter.propertyType.toLowerCase(),
            });
        }

        if (filter.minBedrooms !== undefined) {
            qb.andWhere('property.bedrooms >= :minBedrooms', { minBedrooms: filter.minBedrooms });
        }

        // Not bound as a parameter: the SQLite driver cannot bind JS booleans
        if (filter.isAvailable !== undefined) {
            qb.andWhere(filter.isAvailable ? 'property.isAvailable' : 'NOT property.isAvailable');
        }

        // Keyword search
        if (filter.search) {
            qb.andWhere(
                new Brackets((where) => {
                    where
                        .where(`LOWER(property.title) LIKE :search ${LIKE_ESCAPE}`)
                        .orWhere(`LOWER(property.description) LIKE :search ${LIKE_ESCAPE}`)
                        .orWhere(`LOWER(location.name) LIKE :search ${LIKE_ESCAPE}`);
                }),
                { search: containsPattern(filter.search) },
            );
        }

        return qb;
    }
}
