import { Injectable, NotFoundException } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { TravelRequestLifecycleDomainService } from './domain/services/travel-request-lifecycle.domain.service';
import {
  TravelRequest,
  TravelRequestContent,
} from './domain/entities/travel-request.entity';
import { RequestFilters } from './domain/ports/travel-request.repository.port';
import { parseSortBy } from './domain/utils/sort-by.util';
import {
  AdminPrincipal,
  EmployeePrincipal,
  ManagerPrincipal,
  Principal,
} from '../identity/domain/principal';
import { CreateTravelRequestDto } from './dto/create-travel-request.dto';
import { EditTravelRequestDto } from './dto/edit-travel-request.dto';
import {
  ListOwnTravelRequestsDto,
  ListTravelRequestsDto,
} from './dto/list-travel-requests.dto';
import {
  TravelRequestActionResponseDto,
  TravelRequestResponseDto,
} from './dto/travel-request-response.dto';

/**
 * Orchestration Service (Application Layer)
 *
 * Maps DTOs to domain input and domain records to response DTOs. Workflow
 * rules live in TravelRequestLifecycleDomainService.
 */
@Injectable()
export class TravelRequestsService {
  constructor(
    private readonly lifecycle: TravelRequestLifecycleDomainService,
  ) {}

  /**
   * An empty listing is reported as not found
   */
  async list(
    principal: Principal,
    query: ListTravelRequestsDto | ListOwnTravelRequestsDto,
  ): Promise<TravelRequestResponseDto[]> {
    const filters: RequestFilters = {
      status: query.status,
      dateFrom: query.startDate,
      dateTo: query.endDate,
      requesterName: query.searchName,
      purpose: 'purpose' in query ? query.purpose : undefined,
    };

    const requests = await this.lifecycle.list(
      principal,
      filters,
      parseSortBy(query.sortBy),
    );
    if (requests.length === 0) {
      throw new NotFoundException('No requests found');
    }

    return requests.map((request) => this.toResponseDto(request));
  }

  async getById(id: number): Promise<TravelRequestResponseDto> {
    return this.toResponseDto(await this.lifecycle.getById(id));
  }

  async create(
    principal: EmployeePrincipal,
    dto: CreateTravelRequestDto,
  ): Promise<TravelRequestResponseDto> {
    const request = await this.lifecycle.create(
      principal,
      {
        purpose: dto.purpose,
        mode: dto.mode,
        fromDate: dto.fromDate,
        toDate: dto.toDate,
        fromWhere: dto.fromWhere,
        toWhere: dto.toWhere,
        lodging: dto.lodging ?? false,
        lodgingInfo: dto.lodgingInfo ?? null,
        additionalRequest: dto.additionalRequest ?? null,
        additionalInfo: dto.additionalInfo ?? null,
      },
      { saveAsDraft: dto.saveAsDraft },
    );

    return this.toResponseDto(request);
  }

  async edit(
    principal: EmployeePrincipal,
    id: number,
    dto: EditTravelRequestDto,
  ): Promise<TravelRequestResponseDto> {
    const changes: Partial<TravelRequestContent> = {};
    if (dto.purpose !== undefined) changes.purpose = dto.purpose;
    if (dto.mode !== undefined) changes.mode = dto.mode;
    if (dto.fromDate !== undefined) changes.fromDate = dto.fromDate;
    if (dto.toDate !== undefined) changes.toDate = dto.toDate;
    if (dto.fromWhere !== undefined) changes.fromWhere = dto.fromWhere;
    if (dto.toWhere !== undefined) changes.toWhere = dto.toWhere;
    if (dto.lodging !== undefined) changes.lodging = dto.lodging;
    if (dto.lodgingInfo !== undefined) changes.lodgingInfo = dto.lodgingInfo;
    if (dto.additionalRequest !== undefined) {
      changes.additionalRequest = dto.additionalRequest;
    }
    if (dto.additionalInfo !== undefined) {
      changes.additionalInfo = dto.additionalInfo;
    }

    return this.toResponseDto(
      await this.lifecycle.edit(principal, id, changes),
    );
  }

  async remove(principal: EmployeePrincipal, id: number): Promise<void> {
    await this.lifecycle.remove(principal, id);
  }

  async decide(
    principal: ManagerPrincipal,
    id: number,
    action: string,
    note: string,
  ): Promise<TravelRequestActionResponseDto> {
    const request = await this.lifecycle.decide(principal, id, action, note);
    return this.toActionResponse(action, request);
  }

  async submit(
    principal: EmployeePrincipal,
    id: number,
    action: string,
  ): Promise<TravelRequestActionResponseDto> {
    const request = await this.lifecycle.submit(principal, id, action);
    return this.toActionResponse(action, request);
  }

  async close(
    principal: AdminPrincipal,
    id: number,
    action: string,
    note: string,
  ): Promise<TravelRequestActionResponseDto> {
    const request = await this.lifecycle.close(principal, id, action, note);
    return this.toActionResponse(action, request);
  }

  private toActionResponse(
    action: string,
    request: TravelRequest,
  ): TravelRequestActionResponseDto {
    return {
      message: 'Request status updated',
      action,
      request: this.toResponseDto(request),
    };
  }

  private toResponseDto(request: TravelRequest): TravelRequestResponseDto {
    return plainToClass(TravelRequestResponseDto, request, {
      excludeExtraneousValues: true,
    });
  }
}
