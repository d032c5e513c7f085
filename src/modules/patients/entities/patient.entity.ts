import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Clinic } from '../../clinics/entities/clinic.entity';
import { User } from '../../users/entities/user.entity';
import { Treatment } from '../../treatments/entities/treatment.entity';

export enum Gender {
  MALE = 'MALE',
  FEMALE = 'FEMALE',
  OTHER = 'OTHER',
  NOT_SPECIFIED = 'NOT_SPECIFIED',
}

export const GENDER_LABELS: Record<Gender, string> = {
  [Gender.MALE]: 'Male',
  [Gender.FEMALE]: 'Female',
  [Gender.OTHER]: 'Other',
  [Gender.NOT_SPECIFIED]: 'Prefer not to specify',
};

/**
 * A patient record. Patients never log in; they are managed by clinic staff.
 */
@Entity('patients')
@Index(['clinicId', 'isActive'])
@Index(['clinicId', 'assignedDoctorId'])
@Index(['firstName', 'lastName'])
export class Patient {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'clinic_id', type: 'int' })
  clinicId!: number;

  @ManyToOne(() => Clinic, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'clinic_id' })
  clinic?: Clinic;

  @Column({ name: 'first_name', type: 'varchar', length: 100 })
  firstName!: string;

  @Column({ name: 'last_name', type: 'varchar', length: 100 })
  lastName!: string;

  @Index()
  @Column({ type: 'varchar', length: 254 })
  email!: string;

  @Column({ name: 'contact_number', type: 'varchar', length: 20, nullable: true })
  contactNumber!: string | null;

  @Column({ name: 'secondary_contact_number', type: 'varchar', length: 20, nullable: true })
  secondaryContactNumber!: string | null;

  @Column({ type: 'enum', enum: Gender, nullable: true })
  gender!: Gender | null;

  // ISO date (YYYY-MM-DD)
  @Column({ name: 'date_of_birth', type: 'date', nullable: true })
  dateOfBirth!: string | null;

  @Column({ type: 'text', nullable: true })
  address!: string | null;

  @Column({ name: 'medical_history', type: 'text', nullable: true })
  medicalHistory!: string | null;

  @Column({ type: 'text', nullable: true })
  allergies!: string | null;

  @Column({ name: 'clinical_history', type: 'text', nullable: true })
  clinicalHistory!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({ name: 'assigned_doctor_id', type: 'int', nullable: true })
  assignedDoctorId!: number | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'assigned_doctor_id' })
  assignedDoctor?: User | null;

  @OneToMany(() => Treatment, (treatment) => treatment.patient)
  treatments?: Treatment[];

  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive!: boolean;

  @Index()
  @Column({ name: 'is_deleted', type: 'boolean', default: false })
  isDeleted!: boolean;

  @Column({ name: 'created_by', type: 'int', nullable: true })
  createdById!: number | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'created_by' })
  createdBy?: User | null;

  @Column({ name: 'updated_by', type: 'int', nullable: true })
  updatedById!: number | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'updated_by' })
  updatedBy?: User | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
