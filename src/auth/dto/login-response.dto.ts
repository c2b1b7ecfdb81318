import { ApiProperty } from '@nestjs/swagger';
import { UserResponseDto } from '../../users/dto/user-response.dto';
import { RoleEnum } from '../../roles/roles.enum';

export class LoginResponseDto {
  @ApiProperty()
  token!: string;

  @ApiProperty({ description: 'Expiry as epoch milliseconds' })
  tokenExpires!: number;

  @ApiProperty({ enum: RoleEnum })
  role!: RoleEnum;

  @ApiProperty({ type: () => UserResponseDto })
  user!: UserResponseDto;
}
