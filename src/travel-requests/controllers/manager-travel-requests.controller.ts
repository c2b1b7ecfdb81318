import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { TravelRequestsService } from '../travel-requests.service';
import { ManagerActionDto } from '../dto/manager-action.dto';
import { ListTravelRequestsDto } from '../dto/list-travel-requests.dto';
import {
  TravelRequestActionResponseDto,
  TravelRequestResponseDto,
} from '../dto/travel-request-response.dto';
import { Roles } from '../../roles/roles.decorator';
import { RoleEnum } from '../../roles/roles.enum';
import { RolesGuard } from '../../roles/roles.guard';
import { CurrentPrincipal } from '../../identity/decorators/current-principal.decorator';
import { ManagerPrincipal } from '../../identity/domain/principal';

@ApiTags('Manager requests')
@Controller({ path: 'manager/requests', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class ManagerTravelRequestsController {
  constructor(private readonly travelRequestsService: TravelRequestsService) {}

  @Get()
  @Roles(RoleEnum.manager)
  @ApiOperation({
    summary: 'List requests of employees reporting to you',
  })
  @ApiOkResponse({ type: TravelRequestResponseDto, isArray: true })
  @ApiNotFoundResponse({ description: 'No requests found' })
  list(
    @CurrentPrincipal(RoleEnum.manager) principal: ManagerPrincipal,
    @Query() query: ListTravelRequestsDto,
  ): Promise<TravelRequestResponseDto[]> {
    return this.travelRequestsService.list(principal, query);
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

  @Post(':id/action')
  @Roles(RoleEnum.manager)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Approve, reject or revert a submitted request' })
  @ApiOkResponse({ type: TravelRequestActionResponseDto })
  @ApiBadRequestResponse({ description: 'InvalidTransition' })
  @ApiForbiddenResponse({
    description: 'The request is addressed to another manager',
  })
  act(
    @CurrentPrincipal(RoleEnum.manager) principal: ManagerPrincipal,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: ManagerActionDto,
  ): Promise<TravelRequestActionResponseDto> {
    return this.travelRequestsService.decide(
      principal,
      id,
      dto.action,
      dto.note,
    );
  }
}
