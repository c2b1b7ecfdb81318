import { ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsEnum,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { TravelMode } from '../domain/enums/travel-mode.enum';
import { DATE_ONLY_PATTERN } from '../../utils/date';
import { TRAVEL_REQUEST_LIMITS } from '../domain/travel-request.limits';

const isPresent = (_: EditTravelRequestDto, value: unknown): boolean =>
  value !== undefined;

/**
 * Partial edit of the content fields. Omitted fields are left as they
 * are; `null` is accepted only for the optional text fields, where it
 * clears the value.
 */
export class EditTravelRequestDto {
  @ApiPropertyOptional({ maxLength: TRAVEL_REQUEST_LIMITS.purpose })
  @ValidateIf(isPresent)
  @IsString()
  @IsNotEmpty()
  @MaxLength(TRAVEL_REQUEST_LIMITS.purpose)
  purpose?: string;

  @ApiPropertyOptional({ enum: TravelMode })
  @ValidateIf(isPresent)
  @IsEnum(TravelMode)
  mode?: TravelMode;

  @ApiPropertyOptional({ example: '2024-03-04' })
  @ValidateIf(isPresent)
  @Matches(DATE_ONLY_PATTERN)
  @IsISO8601({ strict: true })
  fromDate?: string;

  @ApiPropertyOptional({ example: '2024-03-06' })
  @ValidateIf(isPresent)
  @Matches(DATE_ONLY_PATTERN)
  @IsISO8601({ strict: true })
  toDate?: string;

  @ApiPropertyOptional({ maxLength: TRAVEL_REQUEST_LIMITS.place })
  @ValidateIf(isPresent)
  @IsString()
  @IsNotEmpty()
  @MaxLength(TRAVEL_REQUEST_LIMITS.place)
  fromWhere?: string;

  @ApiPropertyOptional({ maxLength: TRAVEL_REQUEST_LIMITS.place })
  @ValidateIf(isPresent)
  @IsString()
  @IsNotEmpty()
  @MaxLength(TRAVEL_REQUEST_LIMITS.place)
  toWhere?: string;

  @ApiPropertyOptional()
  @ValidateIf(isPresent)
  @IsBoolean()
  lodging?: boolean;

  @ApiPropertyOptional({
    maxLength: TRAVEL_REQUEST_LIMITS.lodgingInfo,
    nullable: true,
    type: String,
  })
  @IsString()
  @MaxLength(TRAVEL_REQUEST_LIMITS.lodgingInfo)
  @IsOptional()
  lodgingInfo?: string | null;

  @ApiPropertyOptional({
    maxLength: TRAVEL_REQUEST_LIMITS.additional,
    nullable: true,
    type: String,
  })
  @IsString()
  @MaxLength(TRAVEL_REQUEST_LIMITS.additional)
  @IsOptional()
  additionalRequest?: string | null;

  @ApiPropertyOptional({
    maxLength: TRAVEL_REQUEST_LIMITS.additional,
    nullable: true,
    type: String,
  })
  @IsString()
  @MaxLength(TRAVEL_REQUEST_LIMITS.additional)
  @IsOptional()
  additionalInfo?: string | null;
}
