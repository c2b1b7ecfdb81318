import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { UserEntity } from '../../../../../users/infrastructure/persistence/relational/entities/user.entity';
import { EmployeeStatus } from '../../../../domain/enums/employee-status.enum';

@Entity({
  name: 'employees',
})
export class EmployeeEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @OneToOne(() => UserEntity, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user!: UserEntity;

  @Index({ unique: true })
  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @Column({ name: 'is_manager', type: 'boolean', default: false })
  isManager!: boolean;

  // Weak self reference: deleting the manager nulls it on subordinates
  @ManyToOne(() => EmployeeEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'manager_id' })
  manager?: EmployeeEntity | null;

  @Index()
  @Column({ name: 'manager_id', type: 'integer', nullable: true })
  managerId!: number | null;

  @Column({
    name: 'employee_status',
    type: 'varchar',
    length: 20,
    default: EmployeeStatus.ACTIVE,
  })
  status!: EmployeeStatus;

  @Column({ name: 'date_created', type: 'date' })
  createdOn!: string;
}
