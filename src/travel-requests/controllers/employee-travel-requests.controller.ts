import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { TravelRequestsService } from '../travel-requests.service';
import { CreateTravelRequestDto } from '../dto/create-travel-request.dto';
import { EditTravelRequestDto } from '../dto/edit-travel-request.dto';
import { EmployeeActionDto } from '../dto/employee-action.dto';
import { ListOwnTravelRequestsDto } from '../dto/list-travel-requests.dto';
import {
  TravelRequestActionResponseDto,
  TravelRequestResponseDto,
} from '../dto/travel-request-response.dto';
import { Roles } from '../../roles/roles.decorator';
import { RoleEnum } from '../../roles/roles.enum';
import { RolesGuard } from '../../roles/roles.guard';
import { CurrentPrincipal } from '../../identity/decorators/current-principal.decorator';
import { EmployeePrincipal } from '../../identity/domain/principal';

@ApiTags('Employee requests')
@Controller({ path: 'employee/requests', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class EmployeeTravelRequestsController {
  constructor(private readonly travelRequestsService: TravelRequestsService) {}

  @Get()
  @Roles(RoleEnum.employee)
  @ApiOperation({ summary: 'List own travel requests' })
  @ApiOkResponse({ type: TravelRequestResponseDto, isArray: true })
  @ApiNotFoundResponse({ description: 'No requests found' })
  list(
    @CurrentPrincipal(RoleEnum.employee) principal: EmployeePrincipal,
    @Query() query: ListOwnTravelRequestsDto,
  ): Promise<TravelRequestResponseDto[]> {
    return this.travelRequestsService.list(principal, query);
  }

  @Post()
  @Roles(RoleEnum.employee)
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Create a travel request addressed to your manager',
  })
  @ApiCreatedResponse({ type: TravelRequestResponseDto })
  @ApiBadRequestResponse({
    description: 'Invalid fields, or no manager assigned',
  })
  create(
    @CurrentPrincipal(RoleEnum.employee) principal: EmployeePrincipal,
    @Body() dto: CreateTravelRequestDto,
  ): Promise<TravelRequestResponseDto> {
    return this.travelRequestsService.create(principal, dto);
  }

  @Get(':id')
  @ApiOperation({ summary: 'View a travel request' })
  @ApiOkResponse({ type: TravelRequestResponseDto })
  @ApiNotFoundResponse({ description: 'Request not found' })
  findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<TravelRequestResponseDto> {
    return this.travelRequestsService.getById(id);
  }

  @Patch(':id')
  @Roles(RoleEnum.employee)
  @ApiOperation({ summary: 'Edit the content of an own travel request' })
  @ApiOkResponse({ type: TravelRequestResponseDto })
  @ApiForbiddenResponse({ description: 'Not the owner of the request' })
  edit(
    @CurrentPrincipal(RoleEnum.employee) principal: EmployeePrincipal,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: EditTravelRequestDto,
  ): Promise<TravelRequestResponseDto> {
    return this.travelRequestsService.edit(principal, id, dto);
  }

  @Post(':id/action')
  @Roles(RoleEnum.employee)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Submit a draft or reverted request' })
  @ApiOkResponse({ type: TravelRequestActionResponseDto })
  @ApiBadRequestResponse({ description: 'InvalidTransition' })
  @ApiForbiddenResponse({ description: 'Not the owner of the request' })
  act(
    @CurrentPrincipal(RoleEnum.employee) principal: EmployeePrincipal,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: EmployeeActionDto,
  ): Promise<TravelRequestActionResponseDto> {
    return this.travelRequestsService.submit(principal, id, dto.action);
  }

  @Delete(':id')
  @Roles(RoleEnum.employee)
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete an own travel request' })
  @ApiNoContentResponse()
  @ApiForbiddenResponse({
    description: 'Not the owner, or the request has no owner',
  })
  remove(
    @CurrentPrincipal(RoleEnum.employee) principal: EmployeePrincipal,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    return this.travelRequestsService.remove(principal, id);
  }
}
