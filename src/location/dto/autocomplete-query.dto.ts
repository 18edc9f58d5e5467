import { IsOptional, IsString, MaxLength } from 'class-validator';
import { LOCATION_CONSTANTS } from '../constants/location.constants';

export class AutocompleteQueryDto {
    // Fragments shorter than the minimum yield an empty result, not a 400
    @IsOptional()
    @IsString()
    @MaxLength(LOCATION_CONSTANTS.AUTOCOMPLETE.MAX_LENGTH)
    q?: string;
}
