import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsEnum,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { TravelMode } from '../domain/enums/travel-mode.enum';
import { DATE_ONLY_PATTERN } from '../../utils/date';
import { TRAVEL_REQUEST_LIMITS } from '../domain/travel-request.limits';

/**
 * Owner, manager, status and dates of record are set by the server.
 */
export class CreateTravelRequestDto {
  @ApiProperty({
    example: 'Client workshop',
    maxLength: TRAVEL_REQUEST_LIMITS.purpose,
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(TRAVEL_REQUEST_LIMITS.purpose)
  purpose!: string;

  @ApiProperty({ enum: TravelMode, example: TravelMode.TRAIN })
  @IsEnum(TravelMode)
  mode!: TravelMode;

  @ApiProperty({ example: '2024-03-04' })
  @Matches(DATE_ONLY_PATTERN)
  @IsISO8601({ strict: true })
  fromDate!: string;

  @ApiProperty({ example: '2024-03-06' })
  @Matches(DATE_ONLY_PATTERN)
  @IsISO8601({ strict: true })
  toDate!: string;

  @ApiProperty({ example: 'Berlin', maxLength: TRAVEL_REQUEST_LIMITS.place })
  @IsString()
  @IsNotEmpty()
  @MaxLength(TRAVEL_REQUEST_LIMITS.place)
  fromWhere!: string;

  @ApiProperty({ example: 'Munich', maxLength: TRAVEL_REQUEST_LIMITS.place })
  @IsString()
  @IsNotEmpty()
  @MaxLength(TRAVEL_REQUEST_LIMITS.place)
  toWhere!: string;

  @ApiPropertyOptional({ default: false })
  @IsBoolean()
  @IsOptional()
  lodging?: boolean;

  @ApiPropertyOptional({
    example: 'Hotel near the venue',
    description: 'Required when lodging is true',
    maxLength: TRAVEL_REQUEST_LIMITS.lodgingInfo,
  })
  @IsString()
  @MaxLength(TRAVEL_REQUEST_LIMITS.lodgingInfo)
  @IsOptional()
  lodgingInfo?: string;

  @ApiPropertyOptional({ maxLength: TRAVEL_REQUEST_LIMITS.additional })
  @IsString()
  @MaxLength(TRAVEL_REQUEST_LIMITS.additional)
  @IsOptional()
  additionalRequest?: string;

  @ApiPropertyOptional({ maxLength: TRAVEL_REQUEST_LIMITS.additional })
  @IsString()
  @MaxLength(TRAVEL_REQUEST_LIMITS.additional)
  @IsOptional()
  additionalInfo?: string;

  @ApiPropertyOptional({
    default: false,
    description: 'Store as to_submit without notifying the manager',
  })
  @IsBoolean()
  @IsOptional()
  saveAsDraft?: boolean;
}
