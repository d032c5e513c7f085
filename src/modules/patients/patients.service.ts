/**
 * Dental Clinic API - Patients Service
 *
 * Patient records with clinic isolation. The assigned doctor must be a
 * doctor of the patient's own clinic.
 */

import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { EntityManager, FindOptionsOrder, FindOptionsWhere, Repository } from 'typeorm';
import { DatabaseService } from '../../common/database/database.service';
import { ApiValidationException } from '../../common/http/api-validation.exception';
import { buildPage, emptyPage, Page, pageWindow } from '../../common/http/pagination';
import { containsInsensitive } from '../../common/http/search';
import { resolveTargetClinic, tenantScope } from '../../common/tenancy/tenant-scope';
import { QueryMode, TenantContext } from '../../common/tenancy/tenant-context';
import { UserRole } from '../../common/types/roles';
import { Clinic } from '../clinics/entities/clinic.entity';
import { User } from '../users/entities/user.entity';
import { Treatment, TreatmentStatus } from '../treatments/entities/treatment.entity';
import { presentTreatment } from '../treatments/treatment.presenter';
import { Patient } from './entities/patient.entity';
import {
  CreatePatientDto,
  ListPatientsQueryDto,
  PatientOrdering,
  UpdatePatientDto,
} from './dto/patient.dto';
import {
  MedicalSummary,
  PatientDetailView,
  PatientView,
  presentMedicalSummary,
  presentPatient,
} from './patient.presenter';

const ORDERING: Record<PatientOrdering, FindOptionsOrder<Patient>> = {
  firstName: { firstName: 'ASC' },
  '-firstName': { firstName: 'DESC' },
  lastName: { lastName: 'ASC' },
  '-lastName': { lastName: 'DESC' },
  createdAt: { createdAt: 'ASC' },
  '-createdAt': { createdAt: 'DESC' },
};

const VIEW_RELATIONS = { clinic: true, assignedDoctor: true } as const;

@Injectable()
export class PatientsService {
  private readonly logger = new Logger(PatientsService.name);

  constructor(private readonly db: DatabaseService) {}

  async findAll(
    ctx: TenantContext,
    query: ListPatientsQueryDto,
    mode: QueryMode,
    url: string,
  ): Promise<Page<PatientView>> {
    const request = { page: query.page, pageSize: query.pageSize, url };
    const scope = tenantScope(ctx, mode);
    if (!scope) {
      return emptyPage(request);
    }

    const base: FindOptionsWhere<Patient> = { ...scope };
    if (query.gender) {
      base.gender = query.gender;
    }
    if (query.assignedDoctor !== undefined) {
      base.assignedDoctorId = query.assignedDoctor;
    }
    if (query.isActive !== undefined) {
      base.isActive = query.isActive;
    }

    const where: FindOptionsWhere<Patient>[] = query.search
      ? [
          { ...base, firstName: containsInsensitive(query.search) },
          { ...base, lastName: containsInsensitive(query.search) },
          { ...base, email: containsInsensitive(query.search) },
          { ...base, contactNumber: containsInsensitive(query.search) },
        ]
      : [base];

    const [patients, count] = await this.db.getRepository(Patient).findAndCount({
      where,
      relations: VIEW_RELATIONS,
      order: ORDERING[query.ordering ?? '-createdAt'],
      ...pageWindow(request),
    });

    const items = await Promise.all(
      patients.map(async (patient) => presentPatient(patient, await this.activeTreatmentsCount(patient.id))),
    );
    return buildPage(items, count, request);
  }

  async findOne(ctx: TenantContext, id: number): Promise<PatientDetailView> {
    const patient = await this.getPatientOrThrow(ctx, id, 'active', this.db.getRepository(Patient), true);
    const treatments = await this.db.getRepository(Treatment).find({
      where: { patientId: patient.id, isDeleted: false },
      relations: { clinic: true, patient: true, doctor: true },
      order: { createdAt: 'DESC' },
    });

    const now = new Date();
    return {
      ...presentPatient(patient, await this.activeTreatmentsCount(patient.id), now),
      treatments: treatments.map((treatment) => presentTreatment(treatment, now)),
    };
  }

  async medicalSummary(ctx: TenantContext, id: number): Promise<MedicalSummary> {
    const patient = await this.getPatientOrThrow(ctx, id, 'active', this.db.getRepository(Patient));
    return presentMedicalSummary(patient);
  }

  async create(ctx: TenantContext, dto: CreatePatientDto): Promise<PatientView> {
    const clinicId = resolveTargetClinic(ctx, dto.clinic);
    const { clinic: _clinic, assignedDoctor, ...fields } = dto;

    const patient = await this.db.withTransaction(async (manager) => {
      const clinicExists = await manager.getRepository(Clinic).exists({ where: { id: clinicId, isDeleted: false } });
      if (!clinicExists) {
        throw new ApiValidationException({ clinic: ['Clinic must be provided. Contact administrator.'] });
      }

      let assignedDoctorId = assignedDoctor ?? null;
      if (assignedDoctorId !== null) {
        await this.assertAssignableDoctor(manager, assignedDoctorId, clinicId);
      } else if (ctx.role === UserRole.DOCTOR && !ctx.isSuperuser) {
        // Doctors adding a patient take them on by default
        assignedDoctorId = ctx.userId;
      }

      const repo = manager.getRepository(Patient);
      const created = await repo.save(
        repo.create({
          ...fields,
          clinicId,
          assignedDoctorId,
          createdById: ctx.userId,
          updatedById: ctx.userId,
        }),
      );
      return repo.findOneOrFail({ where: { id: created.id }, relations: VIEW_RELATIONS });
    });

    this.logger.log(`Created patient ${patient.id} in clinic ${clinicId} by user ${ctx.userId}`);
    return presentPatient(patient, 0);
  }

  async update(ctx: TenantContext, id: number, dto: UpdatePatientDto): Promise<PatientView> {
    const { assignedDoctor, ...fields } = dto;

    const patient = await this.db.withTransaction(async (manager) => {
      const repo = manager.getRepository(Patient);
      const existing = await this.getPatientOrThrow(ctx, id, 'active', repo);

      if (assignedDoctor !== undefined) {
        if (assignedDoctor !== null) {
          await this.assertAssignableDoctor(manager, assignedDoctor, existing.clinicId);
        }
        existing.assignedDoctorId = assignedDoctor;
      }
      repo.merge(existing, { ...fields, updatedById: ctx.userId });
      await repo.save(existing);
      return repo.findOneOrFail({ where: { id }, relations: VIEW_RELATIONS });
    });

    this.logger.log(`Updated patient ${id} by user ${ctx.userId}`);
    return presentPatient(patient, await this.activeTreatmentsCount(id));
  }

  async assignDoctor(ctx: TenantContext, id: number, doctorId: number): Promise<PatientView> {
    return this.update(ctx, id, { assignedDoctor: doctorId });
  }

  /**
   * Soft delete. Treatments of the patient are left as they are.
   */
  async remove(ctx: TenantContext, id: number): Promise<void> {
    await this.db.withTransaction(async (manager) => {
      const repo = manager.getRepository(Patient);
      const patient = await this.getPatientOrThrow(ctx, id, 'active', repo);
      patient.isDeleted = true;
      patient.updatedById = ctx.userId;
      await repo.save(patient);
    });
    this.logger.log(`Soft-deleted patient ${id} by user ${ctx.userId}`);
  }

  async restore(ctx: TenantContext, id: number): Promise<PatientView> {
    const patient = await this.db.withTransaction(async (manager) => {
      const repo = manager.getRepository(Patient);
      const existing = await this.getPatientOrThrow(ctx, id, 'includingDeleted', repo);
      existing.isDeleted = false;
      existing.updatedById = ctx.userId;
      await repo.save(existing);
      return repo.findOneOrFail({ where: { id }, relations: VIEW_RELATIONS });
    });
    this.logger.log(`Restored patient ${id} by user ${ctx.userId}`);
    return presentPatient(patient, await this.activeTreatmentsCount(id));
  }

  private async activeTreatmentsCount(patientId: number): Promise<number> {
    return this.db.getRepository(Treatment).count({
      where: { patientId, status: TreatmentStatus.ONGOING, isDeleted: false },
    });
  }

  /**
   * Relations are only loaded for reads: saving an entity with a stale
   * `assignedDoctor` relation would overwrite a changed `assignedDoctorId`.
   */
  private async getPatientOrThrow(
    ctx: TenantContext,
    id: number,
    mode: QueryMode,
    repo: Repository<Patient>,
    withRelations = false,
  ): Promise<Patient> {
    const scope = tenantScope(ctx, mode);
    const patient = scope
      ? await repo.findOne({ where: { ...scope, id }, relations: withRelations ? VIEW_RELATIONS : {} })
      : null;
    if (!patient) {
      throw new NotFoundException({ code: 'not_found', message: 'Patient not found.' });
    }
    return patient;
  }

  private async assertAssignableDoctor(manager: EntityManager, doctorId: number, clinicId: number): Promise<void> {
    const doctor = await manager.getRepository(User).findOne({ where: { id: doctorId, isDeleted: false } });
    if (!doctor || doctor.clinicId !== clinicId || doctor.role !== UserRole.DOCTOR) {
      throw new ApiValidationException({
        assignedDoctor: ['Doctor must belong to your clinic and have doctor role.'],
      });
    }
  }
}
