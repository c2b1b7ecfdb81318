import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsEmail,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  MinLength,
} from 'class-validator';
import { EmployeeStatus } from '../domain/enums/employee-status.enum';
import { lowerCaseTransformer } from '../../utils/transformers/lower-case.transformer';

export class CreateAccountDto {
  @ApiProperty({ example: 'jdoe' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(150)
  username!: string;

  @ApiProperty({ example: 'secret-password', minLength: 8 })
  @IsString()
  @MinLength(8)
  password!: string;

  @ApiProperty({ example: 'secret-password' })
  @IsString()
  @IsNotEmpty()
  passwordConfirmation!: string;

  @ApiPropertyOptional({ example: 'John' })
  @IsString()
  @IsOptional()
  @MaxLength(150)
  firstName?: string;

  @ApiPropertyOptional({ example: 'Doe' })
  @IsString()
  @IsOptional()
  @MaxLength(150)
  lastName?: string;

  @ApiPropertyOptional({ example: 'john.doe@example.com' })
  @Transform(lowerCaseTransformer)
  @IsEmail()
  @IsOptional()
  email?: string;
}

export class CreateEmployeeDto extends CreateAccountDto {
  @ApiPropertyOptional({ default: true })
  @IsBoolean()
  @IsOptional()
  isActive?: boolean;

  @ApiPropertyOptional({ default: false })
  @IsBoolean()
  @IsOptional()
  isManager?: boolean;

  @ApiPropertyOptional({
    enum: EmployeeStatus,
    default: EmployeeStatus.ACTIVE,
  })
  @Transform(lowerCaseTransformer)
  @IsEnum(EmployeeStatus)
  @IsOptional()
  status?: EmployeeStatus;

  @ApiPropertyOptional({
    description: 'Employee ID of the manager',
    example: 3,
  })
  @Type(() => Number)
  @IsInt()
  @IsOptional()
  managerId?: number;
}
