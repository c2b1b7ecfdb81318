import {
  NewTravelRequest,
  TravelRequest,
} from '../../../../domain/entities/travel-request.entity';
import { TravelRequestEntity } from '../entities/travel-request.entity';
import { EmployeeMapper } from '../../../../../employees/infrastructure/persistence/relational/mappers/employee.mapper';

export class TravelRequestMapper {
  /**
   * Employee references are filled only when `employee.user` and
   * `manager.user` were joined
   */
  static toDomain(entity: TravelRequestEntity): TravelRequest {
    return {
      id: entity.id,
      employeeId: entity.employeeId,
      employee: entity.employee
        ? EmployeeMapper.toReference(entity.employee)
        : null,
      managerId: entity.managerId,
      manager: entity.manager
        ? EmployeeMapper.toReference(entity.manager)
        : null,
      purpose: entity.purpose,
      mode: entity.mode,
      fromDate: entity.fromDate,
      toDate: entity.toDate,
      fromWhere: entity.fromWhere,
      toWhere: entity.toWhere,
      lodging: entity.lodging,
      lodgingInfo: entity.lodgingInfo,
      additionalRequest: entity.additionalRequest,
      additionalInfo: entity.additionalInfo,
      messageFromManager: entity.messageFromManager,
      messageFromAdmin: entity.messageFromAdmin,
      dateOfRequest: entity.dateOfRequest,
      dateOfApproval: entity.dateOfApproval,
      dateOfRejection: entity.dateOfRejection,
      dateOfRevert: entity.dateOfRevert,
      resubmissionRequest: entity.resubmissionRequest,
      isResubmitted: entity.isResubmitted,
      status: entity.status,
    };
  }

  static toPersistence(data: NewTravelRequest): TravelRequestEntity {
    const entity = new TravelRequestEntity();
    entity.employeeId = data.employeeId;
    entity.managerId = data.managerId;
    entity.purpose = data.purpose;
    entity.mode = data.mode;
    entity.fromDate = data.fromDate;
    entity.toDate = data.toDate;
    entity.fromWhere = data.fromWhere;
    entity.toWhere = data.toWhere;
    entity.lodging = data.lodging;
    entity.lodgingInfo = data.lodgingInfo;
    entity.additionalRequest = data.additionalRequest;
    entity.additionalInfo = data.additionalInfo;
    entity.messageFromManager = null;
    entity.messageFromAdmin = null;
    entity.dateOfRequest = data.dateOfRequest;
    entity.dateOfApproval = null;
    entity.dateOfRejection = null;
    entity.dateOfRevert = null;
    entity.resubmissionRequest = false;
    entity.isResubmitted = false;
    entity.status = data.status;
    return entity;
  }
}
