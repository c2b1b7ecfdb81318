import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose, Type } from 'class-transformer';
import { EmployeeStatus } from '../domain/enums/employee-status.enum';

export class EmployeeReferenceDto {
  @ApiProperty({ example: 3 })
  @Expose()
  id!: number;

  @ApiProperty({ example: 'msmith' })
  @Expose()
  username!: string;

  @ApiProperty({ example: 'Mary' })
  @Expose()
  firstName!: string;

  @ApiProperty({ example: 'Smith' })
  @Expose()
  lastName!: string;

  @ApiProperty({ example: 'mary.smith@example.com' })
  @Expose()
  email!: string;
}

export class EmployeeResponseDto extends EmployeeReferenceDto {
  @ApiProperty({ example: 7 })
  @Expose()
  userId!: number;

  @ApiProperty({ example: true })
  @Expose()
  isActive!: boolean;

  @ApiProperty({ example: false })
  @Expose()
  isManager!: boolean;

  @ApiPropertyOptional({ example: 3, nullable: true, type: Number })
  @Expose()
  managerId!: number | null;

  @ApiPropertyOptional({ type: EmployeeReferenceDto, nullable: true })
  @Expose()
  @Type(() => EmployeeReferenceDto)
  manager!: EmployeeReferenceDto | null;

  @ApiProperty({ enum: EmployeeStatus, example: EmployeeStatus.ACTIVE })
  @Expose()
  status!: EmployeeStatus;

  @ApiProperty({ example: '2024-01-01' })
  @Expose()
  createdOn!: string;
}

export class EmployeeMeResponseDto {
  @ApiProperty({ example: 5 })
  id!: number;

  @ApiProperty({ example: 'John Doe' })
  employeeName!: string;

  @ApiProperty({ example: 'Mary Smith' })
  managerName!: string;
}
