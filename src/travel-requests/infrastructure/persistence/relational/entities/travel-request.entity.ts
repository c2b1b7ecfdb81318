import {
  Check,
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { EmployeeEntity } from '../../../../../employees/infrastructure/persistence/relational/entities/employee.entity';
import { TravelMode } from '../../../../domain/enums/travel-mode.enum';
import { TravelRequestStatus } from '../../../../domain/enums/travel-request-status.enum';
import { TRAVEL_REQUEST_LIMITS } from '../../../../domain/travel-request.limits';

@Entity({ name: 'travel_requests' })
@Check(
  `"status_of_request" IN ('to_submit', 'submitted', 'rejected', 'reverted', 'approved', 'closed')`,
)
export class TravelRequestEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  // Owner; kept as null when the employee is deleted
  @ManyToOne(() => EmployeeEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'employee_id' })
  employee?: EmployeeEntity | null;

  @Index()
  @Column({ name: 'employee_id', type: 'integer', nullable: true })
  employeeId!: number | null;

  // Addressee; kept as null when the manager is deleted
  @ManyToOne(() => EmployeeEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'manager_id' })
  manager?: EmployeeEntity | null;

  @Index()
  @Column({ name: 'manager_id', type: 'integer', nullable: true })
  managerId!: number | null;

  @Column({
    name: 'purpose_of_travel',
    type: 'varchar',
    length: TRAVEL_REQUEST_LIMITS.purpose,
  })
  purpose!: string;

  @Column({ name: 'mode_of_travel', type: 'varchar', length: 100 })
  mode!: TravelMode;

  @Column({ name: 'from_date', type: 'date' })
  fromDate!: string;

  @Column({ name: 'to_date', type: 'date' })
  toDate!: string;

  @Column({
    name: 'from_where',
    type: 'varchar',
    length: TRAVEL_REQUEST_LIMITS.place,
  })
  fromWhere!: string;

  @Column({
    name: 'to_where',
    type: 'varchar',
    length: TRAVEL_REQUEST_LIMITS.place,
  })
  toWhere!: string;

  @Column({ type: 'boolean', default: false })
  lodging!: boolean;

  @Column({
    name: 'lodging_info',
    type: 'varchar',
    length: TRAVEL_REQUEST_LIMITS.lodgingInfo,
    nullable: true,
  })
  lodgingInfo!: string | null;

  @Column({
    name: 'additional_request',
    type: 'varchar',
    length: TRAVEL_REQUEST_LIMITS.additional,
    nullable: true,
  })
  additionalRequest!: string | null;

  @Column({
    name: 'additional_info',
    type: 'varchar',
    length: TRAVEL_REQUEST_LIMITS.additional,
    nullable: true,
  })
  additionalInfo!: string | null;

  @Column({
    name: 'message_from_manager',
    type: 'varchar',
    length: TRAVEL_REQUEST_LIMITS.note,
    nullable: true,
  })
  messageFromManager!: string | null;

  @Column({
    name: 'message_from_admin',
    type: 'varchar',
    length: TRAVEL_REQUEST_LIMITS.note,
    nullable: true,
  })
  messageFromAdmin!: string | null;

  @Index()
  @Column({ name: 'date_of_request', type: 'date', update: false })
  dateOfRequest!: string;

  @Column({ name: 'date_of_approval', type: 'date', nullable: true })
  dateOfApproval!: string | null;

  @Column({ name: 'date_of_rejection', type: 'date', nullable: true })
  dateOfRejection!: string | null;

  @Column({ name: 'date_of_revert', type: 'date', nullable: true })
  dateOfRevert!: string | null;

  @Column({ name: 'resubmission_request', type: 'boolean', default: false })
  resubmissionRequest!: boolean;

  @Column({ name: 'is_resubmitted', type: 'boolean', default: false })
  isResubmitted!: boolean;

  @Index()
  @Column({
    name: 'status_of_request',
    type: 'varchar',
    length: 20,
    default: TravelRequestStatus.TO_SUBMIT,
  })
  status!: TravelRequestStatus;
}
