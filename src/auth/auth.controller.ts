import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { AuthLoginDto } from './dto/auth-login.dto';
import { LoginResponseDto } from './dto/login-response.dto';
import { RoleEnum } from '../roles/roles.enum';
import { AdminBootstrapGuard } from './guards/admin-bootstrap.guard';
import { EmployeesService } from '../employees/employees.service';
import { CreateAdminDto } from '../employees/dto/create-admin.dto';
import { AdminResponseDto } from '../employees/dto/admin-response.dto';

@ApiTags('Auth')
@Controller({
  path: 'auth',
  version: '1',
})
export class AuthController {
  constructor(
    private readonly service: AuthService,
    private readonly employeesService: EmployeesService,
  ) {}

  @Post('employee/login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Employee portal login' })
  @ApiOkResponse({ type: LoginResponseDto })
  @ApiUnauthorizedResponse({ description: 'Invalid credentials' })
  @ApiForbiddenResponse({ description: 'Account belongs to another portal' })
  employeeLogin(@Body() loginDto: AuthLoginDto): Promise<LoginResponseDto> {
    return this.service.validateLogin(RoleEnum.employee, loginDto);
  }

  @Post('manager/login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Manager portal login' })
  @ApiOkResponse({ type: LoginResponseDto })
  @ApiUnauthorizedResponse({ description: 'Invalid credentials' })
  @ApiForbiddenResponse({ description: 'Account belongs to another portal' })
  managerLogin(@Body() loginDto: AuthLoginDto): Promise<LoginResponseDto> {
    return this.service.validateLogin(RoleEnum.manager, loginDto);
  }

  @Post('admin/login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Admin portal login' })
  @ApiOkResponse({ type: LoginResponseDto })
  @ApiUnauthorizedResponse({ description: 'Invalid credentials' })
  @ApiForbiddenResponse({ description: 'Account belongs to another portal' })
  adminLogin(@Body() loginDto: AuthLoginDto): Promise<LoginResponseDto> {
    return this.service.validateLogin(RoleEnum.admin, loginDto);
  }

  @Post('admin/create')
  @UseGuards(AdminBootstrapGuard)
  @HttpCode(HttpStatus.CREATED)
  @ApiBearerAuth()
  @ApiOperation({
    summary: 'Create an admin',
    description:
      'Open without a token while no admin exists; afterwards admins only.',
  })
  @ApiCreatedResponse({ type: AdminResponseDto })
  @ApiUnprocessableEntityResponse({ description: 'Username already exists' })
  createAdmin(@Body() dto: CreateAdminDto): Promise<AdminResponseDto> {
    return this.employeesService.createAdmin(dto);
  }
}
