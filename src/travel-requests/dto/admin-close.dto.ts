import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { TravelRequestAction } from '../domain/enums/travel-request-action.enum';
import { TRAVEL_REQUEST_LIMITS } from '../domain/travel-request.limits';

export class AdminCloseDto {
  @ApiProperty({ enum: [TravelRequestAction.CLOSE], example: 'close' })
  @IsString()
  action!: string;

  @ApiProperty({
    example: 'trip completed',
    maxLength: TRAVEL_REQUEST_LIMITS.note,
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(TRAVEL_REQUEST_LIMITS.note)
  note!: string;
}
