import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { LOCATION_CONSTANTS } from '../constants/location.constants';

export class CreateLocationDto {
    @ApiProperty({ example: 'Miami Beach' })
    @IsString()
    @IsNotEmpty()
    @MaxLength(LOCATION_CONSTANTS.NAME.MAX_LENGTH)
    name!: string;

    @ApiProperty({ example: 'Miami' })
    @IsString()
    @IsNotEmpty()
    @MaxLength(LOCATION_CONSTANTS.CITY.MAX_LENGTH)
    city!: string;

    @ApiProperty({ example: 'Florida' })
    @IsString()
    @IsNotEmpty()
    @MaxLength(LOCATION_CONSTANTS.STATE.MAX_LENGTH)
    state!: string;

    @ApiPropertyOptional({ example: 'USA', default: LOCATION_CONSTANTS.DEFAULT_COUNTRY })
    @IsString()
    @IsOptional()
    @MaxLength(LOCATION_CONSTANTS.COUNTRY.MAX_LENGTH)
    country?: string;

    @ApiPropertyOptional()
    @IsString()
    @IsOptional()
    description?: string;
}
