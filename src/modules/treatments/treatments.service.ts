/**
 * Dental Clinic API - Treatments Service
 *
 * Treatment records, their lifecycle status and documentation images.
 * Doctors may only change treatments assigned to them.
 */

import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import {
  Between,
  EntityManager,
  FindOptionsOrder,
  FindOptionsWhere,
  LessThan,
  LessThanOrEqual,
  MoreThan,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { DatabaseService } from '../../common/database/database.service';
import { assertCanEditTreatment } from '../../common/auth/policy/object-permissions';
import { ApiValidationException } from '../../common/http/api-validation.exception';
import { buildPage, emptyPage, Page, PageRequest, pageWindow } from '../../common/http/pagination';
import { containsInsensitive } from '../../common/http/search';
import { MediaDownloadLink, MediaStorageService } from '../../common/storage/media-storage.service';
import { resolveTargetClinic, tenantScope } from '../../common/tenancy/tenant-scope';
import { QueryMode, TenantContext } from '../../common/tenancy/tenant-context';
import { UserRole } from '../../common/types/roles';
import { imageFromBody, ImagePayload } from '../../common/uploads/image-upload';
import { User } from '../users/entities/user.entity';
import { Patient } from '../patients/entities/patient.entity';
import { Treatment, TreatmentStatus } from './entities/treatment.entity';
import {
  CreateTreatmentDto,
  ListTreatmentsQueryDto,
  TreatmentOrdering,
  UpdateTreatmentDto,
} from './dto/treatment.dto';
import { presentTreatment, TreatmentView } from './treatment.presenter';

const ORDERING: Record<TreatmentOrdering, FindOptionsOrder<Treatment>> = {
  nextVisitDate: { nextVisitDate: 'ASC' },
  '-nextVisitDate': { nextVisitDate: 'DESC' },
  createdAt: { createdAt: 'ASC' },
  '-createdAt': { createdAt: 'DESC' },
  status: { status: 'ASC' },
  '-status': { status: 'DESC' },
};

const VIEW_RELATIONS = { clinic: true, patient: true, doctor: true } as const;

function nextVisitRange(after?: string, before?: string): FindOptionsWhere<Treatment>['nextVisitDate'] {
  if (after && before) {
    return Between(new Date(after), new Date(before));
  }
  if (after) {
    return MoreThanOrEqual(new Date(after));
  }
  if (before) {
    return LessThanOrEqual(new Date(before));
  }
  return undefined;
}

@Injectable()
export class TreatmentsService {
  private readonly logger = new Logger(TreatmentsService.name);

  constructor(
    private readonly db: DatabaseService,
    private readonly storage: MediaStorageService,
  ) {}

  async findAll(
    ctx: TenantContext,
    query: ListTreatmentsQueryDto,
    mode: QueryMode,
    url: string,
  ): Promise<Page<TreatmentView>> {
    const base: FindOptionsWhere<Treatment> = {};
    if (query.status) {
      base.status = query.status;
    }
    if (query.treatmentType) {
      base.treatmentType = query.treatmentType;
    }
    if (query.patient !== undefined) {
      base.patientId = query.patient;
    }
    if (query.doctor !== undefined) {
      base.doctorId = query.doctor;
    }
    const range = nextVisitRange(query.nextVisitDateAfter, query.nextVisitDateBefore);
    if (range) {
      base.nextVisitDate = range;
    }

    return this.list(ctx, mode, base, query, url, ORDERING[query.ordering ?? '-createdAt']);
  }

  /**
   * Ongoing treatments with a next visit still ahead.
   */
  async findUpcoming(ctx: TenantContext, query: ListTreatmentsQueryDto, url: string): Promise<Page<TreatmentView>> {
    const where = { status: TreatmentStatus.ONGOING, nextVisitDate: MoreThan(new Date()) };
    return this.list(ctx, 'active', where, query, url, { nextVisitDate: 'ASC' });
  }

  /**
   * Ongoing treatments whose next visit has passed.
   */
  async findOverdue(ctx: TenantContext, query: ListTreatmentsQueryDto, url: string): Promise<Page<TreatmentView>> {
    const where = { status: TreatmentStatus.ONGOING, nextVisitDate: LessThan(new Date()) };
    return this.list(ctx, 'active', where, query, url, { nextVisitDate: 'ASC' });
  }

  async findByStatus(ctx: TenantContext, query: ListTreatmentsQueryDto, url: string): Promise<Page<TreatmentView>> {
    if (!query.status) {
      throw new ApiValidationException({ status: ['Status parameter is required.'] }, 'Status parameter is required');
    }
    return this.list(ctx, 'active', { status: query.status }, query, url, ORDERING[query.ordering ?? '-createdAt']);
  }

  async findOne(ctx: TenantContext, id: number): Promise<TreatmentView> {
    const treatment = await this.getTreatmentOrThrow(ctx, id, 'active', this.db.getRepository(Treatment), true);
    return presentTreatment(treatment);
  }

  async create(ctx: TenantContext, dto: CreateTreatmentDto): Promise<TreatmentView> {
    const clinicId = resolveTargetClinic(ctx, dto.clinic);
    const image = imageFromBody(dto.uploadImage);

    const treatment = await this.db.withTransaction(async (manager) => {
      const patient = await manager.getRepository(Patient).findOne({ where: { id: dto.patient, isDeleted: false } });
      if (!patient || patient.clinicId !== clinicId) {
        throw new ApiValidationException({ patient: ['Patient must belong to your clinic.'] });
      }

      let doctorId = dto.doctor ?? null;
      if (doctorId !== null) {
        await this.assertClinicDoctor(manager, doctorId, clinicId);
      } else if (ctx.role === UserRole.DOCTOR && !ctx.isSuperuser) {
        doctorId = ctx.userId;
      }

      const repo = manager.getRepository(Treatment);
      const created = await repo.save(
        repo.create({
          clinicId,
          patientId: patient.id,
          doctorId,
          treatmentType: dto.treatmentType,
          treatmentInformation: dto.treatmentInformation,
          treatmentFindings: dto.treatmentFindings ?? null,
          nextVisitDate: dto.nextVisitDate ? new Date(dto.nextVisitDate) : null,
          status: dto.status ?? TreatmentStatus.SCHEDULED,
          createdById: ctx.userId,
          updatedById: ctx.userId,
        }),
      );

      if (image) {
        created.uploadImage = await this.storeImage(created, image);
        await repo.save(created);
      }
      return repo.findOneOrFail({ where: { id: created.id }, relations: VIEW_RELATIONS });
    });

    this.logger.log(`Created treatment ${treatment.id} for patient ${treatment.patientId} by user ${ctx.userId}`);
    return presentTreatment(treatment);
  }

  async update(ctx: TenantContext, id: number, dto: UpdateTreatmentDto): Promise<TreatmentView> {
    const { doctor, uploadImage, nextVisitDate, ...fields } = dto;
    const image = uploadImage === undefined ? null : imageFromBody(uploadImage);

    const { treatment, replacedImage } = await this.db.withTransaction(async (manager) => {
      const repo = manager.getRepository(Treatment);
      const existing = await this.getTreatmentOrThrow(ctx, id, 'active', repo);
      assertCanEditTreatment(ctx, existing);

      if (doctor !== undefined) {
        if (doctor !== null) {
          await this.assertClinicDoctor(manager, doctor, existing.clinicId);
        }
        existing.doctorId = doctor;
      }
      if (nextVisitDate !== undefined) {
        existing.nextVisitDate = nextVisitDate ? new Date(nextVisitDate) : null;
      }
      repo.merge(existing, { ...fields, updatedById: ctx.userId });

      const previousImage = existing.uploadImage;
      if (image) {
        existing.uploadImage = await this.storeImage(existing, image);
      }
      await repo.save(existing);
      return {
        treatment: await repo.findOneOrFail({ where: { id }, relations: VIEW_RELATIONS }),
        replacedImage: image ? previousImage : null,
      };
    });

    await this.discardImage(replacedImage);
    this.logger.log(`Updated treatment ${id} by user ${ctx.userId}`);
    return presentTreatment(treatment);
  }

  async markCompleted(ctx: TenantContext, id: number): Promise<TreatmentView> {
    return this.setStatus(ctx, id, TreatmentStatus.COMPLETED);
  }

  async markCancelled(ctx: TenantContext, id: number): Promise<TreatmentView> {
    return this.setStatus(ctx, id, TreatmentStatus.CANCELLED);
  }

  async uploadImage(ctx: TenantContext, id: number, image: ImagePayload): Promise<TreatmentView> {
    const { treatment, replacedImage } = await this.db.withTransaction(async (manager) => {
      const repo = manager.getRepository(Treatment);
      const existing = await this.getTreatmentOrThrow(ctx, id, 'active', repo);
      assertCanEditTreatment(ctx, existing);

      const previousImage = existing.uploadImage;
      existing.uploadImage = await this.storeImage(existing, image);
      existing.updatedById = ctx.userId;
      await repo.save(existing);
      return {
        treatment: await repo.findOneOrFail({ where: { id }, relations: VIEW_RELATIONS }),
        replacedImage: previousImage,
      };
    });

    await this.discardImage(replacedImage);
    this.logger.log(`Uploaded image for treatment ${id} by user ${ctx.userId}`);
    return presentTreatment(treatment);
  }

  async getImageLink(ctx: TenantContext, id: number): Promise<MediaDownloadLink> {
    const treatment = await this.getTreatmentOrThrow(ctx, id, 'active', this.db.getRepository(Treatment));
    if (!treatment.uploadImage) {
      throw new NotFoundException({ code: 'not_found', message: 'No image uploaded for this treatment.' });
    }
    return this.storage.getDownloadLink(treatment.uploadImage);
  }

  async remove(ctx: TenantContext, id: number): Promise<void> {
    await this.db.withTransaction(async (manager) => {
      const repo = manager.getRepository(Treatment);
      const treatment = await this.getTreatmentOrThrow(ctx, id, 'active', repo);
      treatment.isDeleted = true;
      treatment.updatedById = ctx.userId;
      await repo.save(treatment);
    });
    this.logger.log(`Soft-deleted treatment ${id} by user ${ctx.userId}`);
  }

  async restore(ctx: TenantContext, id: number): Promise<TreatmentView> {
    const treatment = await this.db.withTransaction(async (manager) => {
      const repo = manager.getRepository(Treatment);
      const existing = await this.getTreatmentOrThrow(ctx, id, 'includingDeleted', repo);
      existing.isDeleted = false;
      existing.updatedById = ctx.userId;
      await repo.save(existing);
      return repo.findOneOrFail({ where: { id }, relations: VIEW_RELATIONS });
    });
    this.logger.log(`Restored treatment ${id} by user ${ctx.userId}`);
    return presentTreatment(treatment);
  }

  private async setStatus(ctx: TenantContext, id: number, status: TreatmentStatus): Promise<TreatmentView> {
    const treatment = await this.db.withTransaction(async (manager) => {
      const repo = manager.getRepository(Treatment);
      const existing = await this.getTreatmentOrThrow(ctx, id, 'active', repo);
      assertCanEditTreatment(ctx, existing);

      existing.status = status;
      existing.updatedById = ctx.userId;
      await repo.save(existing);
      return repo.findOneOrFail({ where: { id }, relations: VIEW_RELATIONS });
    });
    this.logger.log(`Treatment ${id} marked ${status} by user ${ctx.userId}`);
    return presentTreatment(treatment);
  }

  private async list(
    ctx: TenantContext,
    mode: QueryMode,
    filters: FindOptionsWhere<Treatment>,
    query: ListTreatmentsQueryDto,
    url: string,
    order: FindOptionsOrder<Treatment>,
  ): Promise<Page<TreatmentView>> {
    const request: PageRequest = { page: query.page, pageSize: query.pageSize, url };
    const scope = tenantScope(ctx, mode);
    if (!scope) {
      return emptyPage(request);
    }

    const base: FindOptionsWhere<Treatment> = { ...filters, ...scope };
    const where: FindOptionsWhere<Treatment>[] = query.search
      ? [
          { ...base, patient: { firstName: containsInsensitive(query.search) } },
          { ...base, patient: { lastName: containsInsensitive(query.search) } },
          { ...base, patient: { email: containsInsensitive(query.search) } },
          { ...base, treatmentInformation: containsInsensitive(query.search) },
        ]
      : [base];

    const [treatments, count] = await this.db.getRepository(Treatment).findAndCount({
      where,
      relations: VIEW_RELATIONS,
      order,
      ...pageWindow(request),
    });

    const now = new Date();
    return buildPage(
      treatments.map((treatment) => presentTreatment(treatment, now)),
      count,
      request,
    );
  }

  /**
   * Relations are only loaded for reads so that saves never see a stale
   * `doctor` relation next to a changed `doctorId`.
   */
  private async getTreatmentOrThrow(
    ctx: TenantContext,
    id: number,
    mode: QueryMode,
    repo: Repository<Treatment>,
    withRelations = false,
  ): Promise<Treatment> {
    const scope = tenantScope(ctx, mode);
    const treatment = scope
      ? await repo.findOne({ where: { ...scope, id }, relations: withRelations ? VIEW_RELATIONS : {} })
      : null;
    if (!treatment) {
      throw new NotFoundException({ code: 'not_found', message: 'Treatment not found.' });
    }
    return treatment;
  }

  private async assertClinicDoctor(manager: EntityManager, doctorId: number, clinicId: number): Promise<void> {
    const doctor = await manager.getRepository(User).findOne({ where: { id: doctorId, isDeleted: false } });
    if (!doctor || doctor.clinicId !== clinicId) {
      throw new ApiValidationException({ doctor: ['Doctor must belong to your clinic.'] });
    }
    if (doctor.role !== UserRole.DOCTOR) {
      throw new ApiValidationException({ doctor: ['Selected user must have doctor role.'] });
    }
  }

  private async storeImage(treatment: Treatment, image: ImagePayload): Promise<string> {
    const key = this.storage.generateTreatmentImageKey(treatment.clinicId, treatment.id, image.mimeType);
    await this.storage.upload(key, image.buffer, image.mimeType);
    return key;
  }

  private async discardImage(storageKey: string | null): Promise<void> {
    if (!storageKey) {
      return;
    }
    try {
      await this.storage.delete(storageKey);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not delete replaced image ${storageKey}: ${reason}`);
    }
  }
}
