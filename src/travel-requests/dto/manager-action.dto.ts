import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { MANAGER_ACTIONS } from '../domain/enums/travel-request-action.enum';
import { TRAVEL_REQUEST_LIMITS } from '../domain/travel-request.limits';

export class ManagerActionDto {
  // Checked by the lifecycle: an unknown action is an invalid transition
  @ApiProperty({ enum: MANAGER_ACTIONS, example: 'approve' })
  @IsString()
  action!: string;

  @ApiProperty({
    example: 'Approved, enjoy the trip',
    maxLength: TRAVEL_REQUEST_LIMITS.note,
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(TRAVEL_REQUEST_LIMITS.note)
  note!: string;
}
