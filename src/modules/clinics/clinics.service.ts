/**
 * Dental Clinic API - Clinics Service
 *
 * Clinic CRUD. A clinic member only ever sees their own clinic; superusers
 * see all of them.
 */

import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { EntityManager, FindOptionsOrder, FindOptionsWhere } from 'typeorm';
import { DatabaseService } from '../../common/database/database.service';
import { onUniqueViolation } from '../../common/database/unique-violation';
import { ApiValidationException } from '../../common/http/api-validation.exception';
import { buildPage, emptyPage, Page, pageWindow } from '../../common/http/pagination';
import { containsInsensitive } from '../../common/http/search';
import { clinicScope } from '../../common/tenancy/tenant-scope';
import { QueryMode, TenantContext } from '../../common/tenancy/tenant-context';
import { UserRole } from '../../common/types/roles';
import { User } from '../users/entities/user.entity';
import { Patient } from '../patients/entities/patient.entity';
import { Treatment, TreatmentStatus } from '../treatments/entities/treatment.entity';
import { Clinic } from './entities/clinic.entity';
import { ClinicOrdering, CreateClinicDto, ListClinicsQueryDto, UpdateClinicDto } from './dto/clinic.dto';
import {
  ClinicCounts,
  ClinicDetailView,
  ClinicStatistics,
  ClinicView,
  presentClinic,
} from './clinic.presenter';

const ORDERING: Record<ClinicOrdering, FindOptionsOrder<Clinic>> = {
  name: { name: 'ASC' },
  '-name': { name: 'DESC' },
  createdAt: { createdAt: 'ASC' },
  '-createdAt': { createdAt: 'DESC' },
};

const nameTakenError = () =>
  new ApiValidationException({ name: ['A clinic with this name already exists.'] });

@Injectable()
export class ClinicsService {
  private readonly logger = new Logger(ClinicsService.name);

  constructor(private readonly db: DatabaseService) {}

  async findAll(
    ctx: TenantContext,
    query: ListClinicsQueryDto,
    mode: QueryMode,
    url: string,
  ): Promise<Page<ClinicView>> {
    const request = { page: query.page, pageSize: query.pageSize, url };
    const scope = clinicScope(ctx, mode);
    if (!scope) {
      return emptyPage(request);
    }

    const base: FindOptionsWhere<Clinic> = { ...scope };
    if (query.isActive !== undefined) {
      base.isActive = query.isActive;
    }

    const where: FindOptionsWhere<Clinic>[] = query.search
      ? [
          { ...base, name: containsInsensitive(query.search) },
          { ...base, contactNumber: containsInsensitive(query.search) },
          { ...base, address: containsInsensitive(query.search) },
        ]
      : [base];

    const [clinics, count] = await this.db.getRepository(Clinic).findAndCount({
      where,
      order: ORDERING[query.ordering ?? '-createdAt'],
      ...pageWindow(request),
    });

    const items = await Promise.all(
      clinics.map(async (clinic) => presentClinic(clinic, await this.countsFor(clinic.id))),
    );
    return buildPage(items, count, request);
  }

  async findOne(ctx: TenantContext, id: number, mode: QueryMode = 'active'): Promise<ClinicDetailView> {
    const clinic = await this.getClinicOrThrow(ctx, id, mode);
    return this.presentDetail(clinic);
  }

  async create(ctx: TenantContext, dto: CreateClinicDto): Promise<ClinicDetailView> {
    const created = this.db.withTransaction(async (manager) => {
      await this.assertNameAvailable(manager, dto.name);
      const repo = manager.getRepository(Clinic);
      return repo.save(
        repo.create({
          name: dto.name,
          contactNumber: dto.contactNumber,
          address: dto.address,
          description: dto.description ?? null,
          isActive: dto.isActive ?? true,
        }),
      );
    });
    const clinic = await onUniqueViolation(created, nameTakenError);

    this.logger.log(`Created clinic ${clinic.id} by user ${ctx.userId}`);
    return this.presentDetail(clinic);
  }

  async update(ctx: TenantContext, id: number, dto: UpdateClinicDto): Promise<ClinicDetailView> {
    const updated = this.db.withTransaction(async (manager) => {
      const existing = await this.getClinicOrThrow(ctx, id, 'active', manager);
      if (dto.name !== undefined && dto.name !== existing.name) {
        await this.assertNameAvailable(manager, dto.name);
      }
      manager.getRepository(Clinic).merge(existing, dto);
      return manager.getRepository(Clinic).save(existing);
    });
    const clinic = await onUniqueViolation(updated, nameTakenError);

    this.logger.log(`Updated clinic ${id} by user ${ctx.userId}`);
    return this.presentDetail(clinic);
  }

  /**
   * Soft delete. Users, patients and treatments of the clinic are left as
   * they are.
   */
  async remove(ctx: TenantContext, id: number): Promise<void> {
    await this.db.withTransaction(async (manager) => {
      const clinic = await this.getClinicOrThrow(ctx, id, 'active', manager);
      clinic.isDeleted = true;
      await manager.getRepository(Clinic).save(clinic);
    });
    this.logger.log(`Soft-deleted clinic ${id} by user ${ctx.userId}`);
  }

  async restore(ctx: TenantContext, id: number): Promise<ClinicDetailView> {
    const clinic = await this.db.withTransaction(async (manager) => {
      const existing = await this.getClinicOrThrow(ctx, id, 'includingDeleted', manager);
      existing.isDeleted = false;
      return manager.getRepository(Clinic).save(existing);
    });
    this.logger.log(`Restored clinic ${id} by user ${ctx.userId}`);
    return this.presentDetail(clinic);
  }

  async statistics(ctx: TenantContext, id: number): Promise<ClinicStatistics> {
    const clinic = await this.getClinicOrThrow(ctx, id);
    const counts = await this.countsFor(clinic.id);
    return {
      totalUsers: counts.userCount,
      totalDoctors: counts.doctorCount,
      totalPatients: counts.patientCount,
      activeTreatments: await this.activeTreatmentsCount(clinic.id),
      isActive: clinic.isActive,
    };
  }

  async countsFor(clinicId: number): Promise<ClinicCounts> {
    const users = this.db.getRepository(User);
    const [userCount, doctorCount, patientCount] = await Promise.all([
      users.count({ where: { clinicId, isDeleted: false } }),
      users.count({ where: { clinicId, role: UserRole.DOCTOR, isDeleted: false } }),
      this.db.getRepository(Patient).count({ where: { clinicId, isDeleted: false } }),
    ]);
    return { userCount, doctorCount, patientCount };
  }

  private async activeTreatmentsCount(clinicId: number): Promise<number> {
    return this.db.getRepository(Treatment).count({
      where: { clinicId, status: TreatmentStatus.ONGOING, isDeleted: false },
    });
  }

  private async presentDetail(clinic: Clinic): Promise<ClinicDetailView> {
    const [counts, activeTreatmentsCount] = await Promise.all([
      this.countsFor(clinic.id),
      this.activeTreatmentsCount(clinic.id),
    ]);
    return { ...presentClinic(clinic, counts), activeTreatmentsCount };
  }

  private async getClinicOrThrow(
    ctx: TenantContext,
    id: number,
    mode: QueryMode = 'active',
    manager?: EntityManager,
  ): Promise<Clinic> {
    const scope = clinicScope(ctx, mode);
    // A clinic outside the caller's scope is indistinguishable from a missing one
    if (!scope || (scope.id !== undefined && scope.id !== id)) {
      throw new NotFoundException({ code: 'not_found', message: 'Clinic not found.' });
    }

    const repo = manager ? manager.getRepository(Clinic) : this.db.getRepository(Clinic);
    const clinic = await repo.findOne({ where: { ...scope, id } });
    if (!clinic) {
      throw new NotFoundException({ code: 'not_found', message: 'Clinic not found.' });
    }
    return clinic;
  }

  private async assertNameAvailable(manager: EntityManager, name: string): Promise<void> {
    // Soft-deleted clinics still hold their name
    const taken = await manager.getRepository(Clinic).exists({ where: { name } });
    if (taken) {
      throw nameTakenError();
    }
  }
}
