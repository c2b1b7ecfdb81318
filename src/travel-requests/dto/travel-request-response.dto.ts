import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose, Type } from 'class-transformer';
import { EmployeeReferenceDto } from '../../employees/dto/employee-response.dto';
import { TravelMode } from '../domain/enums/travel-mode.enum';
import { TravelRequestStatus } from '../domain/enums/travel-request-status.enum';

export class TravelRequestResponseDto {
  @ApiProperty({ example: 12 })
  @Expose()
  id!: number;

  @ApiPropertyOptional({ type: EmployeeReferenceDto, nullable: true })
  @Expose()
  @Type(() => EmployeeReferenceDto)
  employee!: EmployeeReferenceDto | null;

  @ApiPropertyOptional({ type: EmployeeReferenceDto, nullable: true })
  @Expose()
  @Type(() => EmployeeReferenceDto)
  manager!: EmployeeReferenceDto | null;

  @ApiProperty({ example: 'Client workshop' })
  @Expose()
  purpose!: string;

  @ApiProperty({ enum: TravelMode })
  @Expose()
  mode!: TravelMode;

  @ApiProperty({ example: '2024-03-04' })
  @Expose()
  fromDate!: string;

  @ApiProperty({ example: '2024-03-06' })
  @Expose()
  toDate!: string;

  @ApiProperty({ example: 'Berlin' })
  @Expose()
  fromWhere!: string;

  @ApiProperty({ example: 'Munich' })
  @Expose()
  toWhere!: string;

  @ApiProperty()
  @Expose()
  lodging!: boolean;

  @ApiPropertyOptional({ nullable: true, type: String })
  @Expose()
  lodgingInfo!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  @Expose()
  additionalRequest!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  @Expose()
  additionalInfo!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  @Expose()
  messageFromManager!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  @Expose()
  messageFromAdmin!: string | null;

  @ApiProperty({ example: '2024-02-20' })
  @Expose()
  dateOfRequest!: string;

  @ApiPropertyOptional({ nullable: true, type: String })
  @Expose()
  dateOfApproval!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  @Expose()
  dateOfRejection!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  @Expose()
  dateOfRevert!: string | null;

  @ApiProperty()
  @Expose()
  resubmissionRequest!: boolean;

  @ApiProperty()
  @Expose()
  isResubmitted!: boolean;

  @ApiProperty({ enum: TravelRequestStatus })
  @Expose()
  status!: TravelRequestStatus;
}

export class TravelRequestActionResponseDto {
  @ApiProperty({ example: 'Request status updated' })
  message!: string;

  @ApiProperty({ example: 'approve' })
  action!: string;

  @ApiProperty({ type: TravelRequestResponseDto })
  request!: TravelRequestResponseDto;
}
