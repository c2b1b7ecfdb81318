import { Controller, Get, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { EmployeesService } from '../employees.service';
import { EmployeeMeResponseDto } from '../dto/employee-response.dto';
import { RolesGuard } from '../../roles/roles.guard';
import { CurrentPrincipal } from '../../identity/decorators/current-principal.decorator';
import { Principal } from '../../identity/domain/principal';

@ApiTags('Employee profile')
@Controller({ path: 'employee', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class EmployeeProfileController {
  constructor(private readonly employeesService: EmployeesService) {}

  @Get('me')
  @ApiOperation({ summary: 'Own employee id, name and manager name' })
  @ApiOkResponse({ type: EmployeeMeResponseDto })
  @ApiNotFoundResponse({ description: 'Employee details not found' })
  me(@CurrentPrincipal() principal: Principal): Promise<EmployeeMeResponseDto> {
    return this.employeesService.me(principal);
  }
}
