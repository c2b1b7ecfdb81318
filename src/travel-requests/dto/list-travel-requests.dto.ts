import { ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import {
  IsEnum,
  IsISO8601,
  IsOptional,
  IsString,
  Matches,
} from 'class-validator';
import { TravelRequestStatus } from '../domain/enums/travel-request-status.enum';
import { DATE_ONLY_PATTERN } from '../../utils/date';

/**
 * Query parameters shared by the admin and manager listings
 */
export class ListTravelRequestsDto {
  @ApiPropertyOptional({ enum: TravelRequestStatus })
  @IsEnum(TravelRequestStatus)
  @IsOptional()
  status?: TravelRequestStatus;

  @ApiPropertyOptional({
    name: 'start_date',
    description: 'Earliest date of request, inclusive',
    example: '2024-01-01',
  })
  @Expose({ name: 'start_date' })
  @Matches(DATE_ONLY_PATTERN)
  @IsISO8601({ strict: true })
  @IsOptional()
  startDate?: string;

  @ApiPropertyOptional({
    name: 'end_date',
    description: 'Latest date of request, inclusive',
    example: '2024-01-31',
  })
  @Expose({ name: 'end_date' })
  @Matches(DATE_ONLY_PATTERN)
  @IsISO8601({ strict: true })
  @IsOptional()
  endDate?: string;

  @ApiPropertyOptional({
    name: 'search_name',
    description: "Substring of the requester's first or last name",
  })
  @Expose({ name: 'search_name' })
  @IsString()
  @IsOptional()
  searchName?: string;

  @ApiPropertyOptional({
    name: 'sort_by',
    description:
      'date_of_request or from_date, prefix with - for descending. Unknown fields are ignored.',
    example: '-from_date',
  })
  @Expose({ name: 'sort_by' })
  @IsString()
  @IsOptional()
  sortBy?: string;
}

export class ListOwnTravelRequestsDto extends ListTravelRequestsDto {
  @ApiPropertyOptional({
    name: 'purpose_of_travel',
    description: 'Substring of the purpose',
  })
  @Expose({ name: 'purpose_of_travel' })
  @IsString()
  @IsOptional()
  purpose?: string;
}
