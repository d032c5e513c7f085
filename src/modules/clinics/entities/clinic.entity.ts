import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

/**
 * A dental clinic: the unit of tenant isolation. Every user, patient and
 * treatment belongs to exactly one clinic.
 */
@Entity('clinics')
@Index(['isActive', 'isDeleted'])
export class Clinic {
  @PrimaryGeneratedColumn()
  id!: number;

  // Unique across all rows, soft-deleted ones included
  @Column({ type: 'varchar', length: 255, unique: true })
  name!: string;

  @Column({ name: 'contact_number', type: 'varchar', length: 20 })
  contactNumber!: string;

  @Column({ type: 'text' })
  address!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive!: boolean;

  @Index()
  @Column({ name: 'is_deleted', type: 'boolean', default: false })
  isDeleted!: boolean;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
