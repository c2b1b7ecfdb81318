import { ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { IsOptional, IsString } from 'class-validator';

export class ListEmployeesDto {
  @ApiPropertyOptional({
    name: 'search_name',
    description: 'Case-insensitive match on first or last name',
    example: 'doe',
  })
  @Expose({ name: 'search_name' })
  @IsString()
  @IsOptional()
  searchName?: string;
}
