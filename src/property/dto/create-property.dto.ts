import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, TransformFnParams, Type } from 'class-transformer';
import {
    IsArray,
    IsBoolean,
    IsInt,
    IsNotEmpty,
    IsNumber,
    IsOptional,
    IsString,
    Max,
    MaxLength,
    Min,
} from 'class-validator';
import { PROPERTY_CONSTANTS } from '../constants/property.constants';
import { parseBooleanParam } from '../../common/utils/boolean.util';

export class CreatePropertyDto {
    @ApiProperty({ example: 'Luxury Beachfront Villa' })
    @IsString()
    @IsNotEmpty()
    @MaxLength(PROPERTY_CONSTANTS.TITLE.MAX_LENGTH)
    title!: string;

    @ApiProperty()
    @IsString()
    description!: string;

    @ApiPropertyOptional({ nullable: true, description: 'Location id; null leaves the property unassigned' })
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    location_id?: number | null;

    @ApiPropertyOptional({ example: 'Villa' })
    @IsOptional()
    @IsString()
    @MaxLength(PROPERTY_CONSTANTS.PROPERTY_TYPE.MAX_LENGTH)
    property_type?: string;

    @ApiPropertyOptional({ default: PROPERTY_CONSTANTS.BEDROOMS.DEFAULT })
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(PROPERTY_CONSTANTS.BEDROOMS.MIN)
    bedrooms?: number;

    @ApiPropertyOptional({ default: PROPERTY_CONSTANTS.BATHROOMS.DEFAULT, example: 2.5 })
    @IsOptional()
    @Type(() => Number)
    @IsNumber({ maxDecimalPlaces: PROPERTY_CONSTANTS.BATHROOMS.DECIMAL_PLACES })
    @Min(PROPERTY_CONSTANTS.BATHROOMS.MIN)
    @Max(PROPERTY_CONSTANTS.BATHROOMS.MAX)
    bathrooms?: number;

    @ApiPropertyOptional({ default: PROPERTY_CONSTANTS.GUESTS.DEFAULT })
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(PROPERTY_CONSTANTS.GUESTS.MIN)
    max_guests?: number;

    @ApiProperty({ example: 450 })
    @Type(() => Number)
    @IsNumber({ maxDecimalPlaces: PROPERTY_CONSTANTS.PRICE.DECIMAL_PLACES })
    @Min(PROPERTY_CONSTANTS.PRICE.MIN)
    @Max(PROPERTY_CONSTANTS.PRICE.MAX)
    price_per_night!: number;

    @ApiPropertyOptional()
    @IsOptional()
    @IsString()
    @MaxLength(PROPERTY_CONSTANTS.ADDRESS.MAX_LENGTH)
    address?: string;

    @ApiPropertyOptional({ type: [String], example: ['WiFi', 'Pool'] })
    @IsOptional()
    @IsArray()
    @IsString({ each: true })
    amenities?: string[];

    @ApiPropertyOptional({ default: true })
    @IsOptional()
    @Transform(({ obj, key }: TransformFnParams) => parseBooleanParam(obj[key]))
    @IsBoolean()
    is_available?: boolean;
}
