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
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { TravelRequestsService } from '../travel-requests.service';
import { AdminCloseDto } from '../dto/admin-close.dto';
import { ListTravelRequestsDto } from '../dto/list-travel-requests.dto';
import {
  TravelRequestActionResponseDto,
  TravelRequestResponseDto,
} from '../dto/travel-request-response.dto';
import { Roles } from '../../roles/roles.decorator';
import { RoleEnum } from '../../roles/roles.enum';
import { RolesGuard } from '../../roles/roles.guard';
import { CurrentPrincipal } from '../../identity/decorators/current-principal.decorator';
import { AdminPrincipal } from '../../identity/domain/principal';

@ApiTags('Admin requests')
@Controller({ path: 'admin/requests', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class AdminTravelRequestsController {
  constructor(private readonly travelRequestsService: TravelRequestsService) {}

  @Get()
  @Roles(RoleEnum.admin)
  @ApiOperation({ summary: 'List all travel requests' })
  @ApiOkResponse({ type: TravelRequestResponseDto, isArray: true })
  @ApiNotFoundResponse({ description: 'No requests found' })
  list(
    @CurrentPrincipal(RoleEnum.admin) principal: AdminPrincipal,
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

  @Post(':id/close')
  @Roles(RoleEnum.admin)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Close an approved request' })
  @ApiOkResponse({ type: TravelRequestActionResponseDto })
  @ApiBadRequestResponse({ description: 'Request not approved yet' })
  close(
    @CurrentPrincipal(RoleEnum.admin) principal: AdminPrincipal,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: AdminCloseDto,
  ): Promise<TravelRequestActionResponseDto> {
    return this.travelRequestsService.close(
      principal,
      id,
      dto.action,
      dto.note,
    );
  }
}
