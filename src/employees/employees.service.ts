import { Injectable, NotFoundException } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { DirectoryAdminDomainService } from './domain/services/directory-admin.domain.service';
import {
  Employee,
  EmployeeReference,
} from './domain/entities/employee.entity';
import { Principal } from '../identity/domain/principal';
import { RoleEnum } from '../roles/roles.enum';
import { CreateEmployeeDto } from './dto/create-employee.dto';
import { UpdateEmployeeDto } from './dto/update-employee.dto';
import { CreateAdminDto } from './dto/create-admin.dto';
import {
  EmployeeMeResponseDto,
  EmployeeResponseDto,
} from './dto/employee-response.dto';
import { AdminResponseDto } from './dto/admin-response.dto';

/**
 * Orchestration Service (Application Layer) for the employee directory
 */
@Injectable()
export class EmployeesService {
  constructor(private readonly directory: DirectoryAdminDomainService) {}

  async list(searchName?: string): Promise<EmployeeResponseDto[]> {
    const employees = await this.directory.listEmployees(searchName);
    return employees.map((employee) => this.toResponseDto(employee));
  }

  async findOne(id: number): Promise<EmployeeResponseDto> {
    return this.toResponseDto(await this.directory.getEmployee(id));
  }

  async create(dto: CreateEmployeeDto): Promise<EmployeeResponseDto> {
    return this.toResponseDto(await this.directory.createEmployee(dto));
  }

  async update(
    id: number,
    dto: UpdateEmployeeDto,
  ): Promise<EmployeeResponseDto> {
    return this.toResponseDto(await this.directory.updateEmployee(id, dto));
  }

  async remove(id: number): Promise<void> {
    await this.directory.deleteEmployee(id);
  }

  hasAdmin(): Promise<boolean> {
    return this.directory.hasAdmin();
  }

  async createAdmin(dto: CreateAdminDto): Promise<AdminResponseDto> {
    const admin = await this.directory.createAdmin(dto);
    return plainToClass(AdminResponseDto, admin, {
      excludeExtraneousValues: true,
    });
  }

  /**
   * Summary of the caller's own employee profile
   */
  async me(principal: Principal): Promise<EmployeeMeResponseDto> {
    if (
      principal.kind !== RoleEnum.employee &&
      principal.kind !== RoleEnum.manager
    ) {
      throw new NotFoundException('Employee details not found');
    }

    const employee = await this.directory.getEmployee(principal.employeeId);
    return {
      id: employee.id,
      employeeName: this.displayName(employee),
      managerName: employee.manager
        ? this.displayName(employee.manager)
        : 'No Manager',
    };
  }

  private displayName(employee: EmployeeReference): string {
    return (
      `${employee.firstName} ${employee.lastName}`.trim() || employee.username
    );
  }

  private toResponseDto(employee: Employee): EmployeeResponseDto {
    return plainToClass(EmployeeResponseDto, employee, {
      excludeExtraneousValues: true,
    });
  }
}
