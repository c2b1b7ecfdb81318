import { ApiProperty } from '@nestjs/swagger';
import { IsString } from 'class-validator';
import { TravelRequestAction } from '../domain/enums/travel-request-action.enum';

export class EmployeeActionDto {
  @ApiProperty({ enum: [TravelRequestAction.SUBMIT], example: 'submit' })
  @IsString()
  action!: string;
}
