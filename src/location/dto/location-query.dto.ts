import { IsIn, IsOptional, IsString, MaxLength } from 'class-validator';
import { LOCATION_ORDERINGS, LocationOrdering } from '../constants/location.constants';

export class LocationQueryDto {
    @IsOptional()
    @IsString()
    @MaxLength(100)
    search?: string;

    @IsOptional()
    @IsIn(LOCATION_ORDERINGS)
    ordering?: LocationOrdering;
}
