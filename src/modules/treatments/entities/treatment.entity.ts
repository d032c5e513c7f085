import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Clinic } from '../../clinics/entities/clinic.entity';
import { User } from '../../users/entities/user.entity';
import { Patient } from '../../patients/entities/patient.entity';

export enum TreatmentType {
  BRACES = 'BRACES',
  ALIGNERS = 'ALIGNERS',
  RETAINER = 'RETAINER',
  EXTRACTION = 'EXTRACTION',
  SCALING = 'SCALING',
  ORTHOGNATHIC = 'ORTHOGNATHIC',
  PROPHYLAXIS = 'PROPHYLAXIS',
  OTHER = 'OTHER',
}

export enum TreatmentStatus {
  SCHEDULED = 'SCHEDULED',
  ONGOING = 'ONGOING',
  ON_HOLD = 'ON_HOLD',
  COMPLETED = 'COMPLETED',
  CANCELLED = 'CANCELLED',
}

@Entity('treatments')
@Index(['clinicId', 'patientId'])
@Index(['clinicId', 'doctorId'])
@Index(['clinicId', 'status'])
@Index(['nextVisitDate', 'status'])
export class Treatment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'clinic_id', type: 'int' })
  clinicId!: number;

  @ManyToOne(() => Clinic, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'clinic_id' })
  clinic?: Clinic;

  @Column({ name: 'patient_id', type: 'int' })
  patientId!: number;

  @ManyToOne(() => Patient, (patient) => patient.treatments, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'patient_id' })
  patient?: Patient;

  @Column({ name: 'doctor_id', type: 'int', nullable: true })
  doctorId!: number | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'doctor_id' })
  doctor?: User | null;

  @Index()
  @Column({ name: 'treatment_type', type: 'enum', enum: TreatmentType })
  treatmentType!: TreatmentType;

  @Column({ name: 'treatment_information', type: 'text' })
  treatmentInformation!: string;

  @Column({ name: 'treatment_findings', type: 'text', nullable: true })
  treatmentFindings!: string | null;

  // Storage key of the documentation image
  @Column({ name: 'upload_image', type: 'varchar', length: 512, nullable: true })
  uploadImage!: string | null;

  @Column({ name: 'next_visit_date', type: 'timestamptz', nullable: true })
  nextVisitDate!: Date | null;

  @Column({ type: 'enum', enum: TreatmentStatus, default: TreatmentStatus.SCHEDULED })
  status!: TreatmentStatus;

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
