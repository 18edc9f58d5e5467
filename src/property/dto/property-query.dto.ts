import { Transform, TransformFnParams, Type } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { parseBooleanParam } from '../../common/utils/boolean.util';

export class PropertyQueryDto {
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    page?: number;

    // Substring of the location's name or city
    @IsOptional()
    @IsString()
    @MaxLength(200)
    location?: string;

    @IsOptional()
    @IsString()
    @MaxLength(100)
    property_type?: string;

    // Minimum bedroom count
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(0)
    bedrooms?: number;

    // Read from the raw object: implicit conversion would turn "false" into true
    @IsOptional()
    @Transform(({ obj, key }: TransformFnParams) => parseBooleanParam(obj[key]))
    @IsBoolean()
    is_available?: boolean;

    @IsOptional()
    @IsString()
    @MaxLength(200)
    search?: string;
}
