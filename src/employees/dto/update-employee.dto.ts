import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsEmail,
  IsEnum,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { EmployeeStatus } from '../domain/enums/employee-status.enum';
import { lowerCaseTransformer } from '../../utils/transformers/lower-case.transformer';
import { DATE_ONLY_PATTERN } from '../../utils/date';

const isPresent = (_: UpdateEmployeeDto, value: unknown): boolean =>
  value !== undefined;

/**
 * Partial update of an employee. Omitted fields are left as they are.
 * Account fields and profile fields are split and applied separately.
 * `managerId: null` clears the manager; no other field accepts null.
 */
export class UpdateEmployeeDto {
  @ApiPropertyOptional({ example: 'jdoe' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(150)
  @ValidateIf(isPresent)
  username?: string;

  @ApiPropertyOptional({ example: 'John' })
  @IsString()
  @MaxLength(150)
  @ValidateIf(isPresent)
  firstName?: string;

  @ApiPropertyOptional({ example: 'Doe' })
  @IsString()
  @MaxLength(150)
  @ValidateIf(isPresent)
  lastName?: string;

  @ApiPropertyOptional({ example: 'john.doe@example.com' })
  @Transform(lowerCaseTransformer)
  @IsEmail()
  @ValidateIf(isPresent)
  email?: string;

  @ApiPropertyOptional()
  @IsBoolean()
  @ValidateIf(isPresent)
  isActive?: boolean;

  @ApiPropertyOptional()
  @IsBoolean()
  @ValidateIf(isPresent)
  isManager?: boolean;

  @ApiPropertyOptional({ enum: EmployeeStatus })
  @Transform(lowerCaseTransformer)
  @IsEnum(EmployeeStatus)
  @ValidateIf(isPresent)
  status?: EmployeeStatus;

  @ApiPropertyOptional({ example: '2024-01-01' })
  @Matches(DATE_ONLY_PATTERN)
  @IsISO8601({ strict: true })
  @ValidateIf(isPresent)
  createdOn?: string;

  @ApiPropertyOptional({
    description: 'Employee ID of the new manager, or null to clear it',
    example: 3,
    nullable: true,
    type: Number,
  })
  @Type(() => Number)
  @ValidateIf((dto: UpdateEmployeeDto) => dto.managerId !== null)
  @IsInt()
  @IsOptional()
  managerId?: number | null;
}
