import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, TransformFnParams } from 'class-transformer';
import { IsBoolean, IsOptional, IsString, MaxLength } from 'class-validator';
import { IMAGE_CONSTANTS } from '../constants/image.constants';
import { parseBooleanParam } from '../../common/utils/boolean.util';

export class CreateImageDto {
    @ApiPropertyOptional({ example: 'Beautiful exterior' })
    @IsOptional()
    @IsString()
    @MaxLength(IMAGE_CONSTANTS.CAPTION.MAX_LENGTH)
    caption?: string;

    // Multipart fields arrive as strings
    @ApiPropertyOptional({ default: false })
    @IsOptional()
    @Transform(({ obj, key }: TransformFnParams) => parseBooleanParam(obj[key]))
    @IsBoolean()
    is_primary?: boolean;
}
