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
import { UserRole } from '../../../common/types/roles';
import { Clinic } from '../../clinics/entities/clinic.entity';

/**
 * A clinic staff account (administrator or doctor).
 *
 * `clinicId` is null only for superusers. It is meant to stay fixed once
 * assigned; nothing below the API layer enforces that.
 */
@Entity('users')
@Index(['email', 'clinicId'])
@Index(['clinicId', 'role'])
@Index(['isDeleted', 'clinicId'])
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'varchar', length: 254, unique: true })
  email!: string;

  @Column({ name: 'password_hash', type: 'varchar', length: 128 })
  passwordHash!: string;

  @Column({ name: 'first_name', type: 'varchar', length: 150, default: '' })
  firstName!: string;

  @Column({ name: 'last_name', type: 'varchar', length: 150, default: '' })
  lastName!: string;

  @Column({ name: 'clinic_id', type: 'int', nullable: true })
  clinicId!: number | null;

  @ManyToOne(() => Clinic, { nullable: true, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'clinic_id' })
  clinic?: Clinic | null;

  @Column({ type: 'enum', enum: UserRole, default: UserRole.DOCTOR })
  role!: UserRole;

  @Column({ name: 'contact_number', type: 'varchar', length: 20, nullable: true })
  contactNumber!: string | null;

  @Column({ name: 'secondary_contact_number', type: 'varchar', length: 20, nullable: true })
  secondaryContactNumber!: string | null;

  @Column({ type: 'text', nullable: true })
  address!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  degree!: string | null;

  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive!: boolean;

  @Column({ name: 'is_superuser', type: 'boolean', default: false })
  isSuperuser!: boolean;

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
