import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

/**
 * Public view of an account. The password hash and superuser flag are
 * never exposed.
 */
export class UserResponseDto {
  @ApiProperty({ example: 1 })
  @Expose()
  id!: number;

  @ApiProperty({ example: 'jdoe' })
  @Expose()
  username!: string;

  @ApiProperty({ example: 'John' })
  @Expose()
  firstName!: string;

  @ApiProperty({ example: 'Doe' })
  @Expose()
  lastName!: string;

  @ApiProperty({ example: 'john.doe@example.com' })
  @Expose()
  email!: string;

  @ApiProperty({ example: true })
  @Expose()
  isActive!: boolean;
}
