import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class AdminResponseDto {
  @ApiProperty({ example: 1 })
  @Expose()
  id!: number;

  @ApiProperty({ example: 4 })
  @Expose()
  userId!: number;

  @ApiProperty({ example: 'root' })
  @Expose()
  username!: string;
}
