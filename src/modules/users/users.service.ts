/**
 * Dental Clinic API - Users Service
 *
 * Staff account management within a clinic. Administrators create and edit
 * accounts; every clinic member can list colleagues.
 */

import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { EntityManager, FindOptionsOrder, FindOptionsWhere } from 'typeorm';
import { DatabaseService } from '../../common/database/database.service';
import { onUniqueViolation } from '../../common/database/unique-violation';
import { PasswordService } from '../../common/auth/services/password.service';
import { ApiValidationException } from '../../common/http/api-validation.exception';
import { buildPage, emptyPage, Page, pageWindow } from '../../common/http/pagination';
import { containsInsensitive } from '../../common/http/search';
import { resolveTargetClinic, tenantScope } from '../../common/tenancy/tenant-scope';
import { QueryMode, TenantContext } from '../../common/tenancy/tenant-context';
import { UserRole } from '../../common/types/roles';
import { Clinic } from '../clinics/entities/clinic.entity';
import { User } from './entities/user.entity';
import { CreateUserDto, ListUsersQueryDto, UpdateUserDto, UserOrdering } from './dto/user.dto';
import { presentUser, UserView } from './user.presenter';

const ORDERING: Record<UserOrdering, FindOptionsOrder<User>> = {
  firstName: { firstName: 'ASC' },
  '-firstName': { firstName: 'DESC' },
  createdAt: { createdAt: 'ASC' },
  '-createdAt': { createdAt: 'DESC' },
};

export function emailTakenError(message?: string): ApiValidationException {
  return new ApiValidationException({ email: ['Email already registered.'] }, message);
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private readonly db: DatabaseService,
    private readonly passwords: PasswordService,
  ) {}

  async findAll(
    ctx: TenantContext,
    query: ListUsersQueryDto,
    mode: QueryMode,
    url: string,
  ): Promise<Page<UserView>> {
    const request = { page: query.page, pageSize: query.pageSize, url };
    const scope = tenantScope(ctx, mode);
    if (!scope) {
      return emptyPage(request);
    }

    const base: FindOptionsWhere<User> = { ...scope };
    if (query.role) {
      base.role = query.role;
    }
    if (query.isActive !== undefined) {
      base.isActive = query.isActive;
    }

    const where: FindOptionsWhere<User>[] = query.search
      ? [
          { ...base, firstName: containsInsensitive(query.search) },
          { ...base, lastName: containsInsensitive(query.search) },
          { ...base, email: containsInsensitive(query.search) },
          { ...base, contactNumber: containsInsensitive(query.search) },
        ]
      : [base];

    const [users, count] = await this.db.getRepository(User).findAndCount({
      where,
      relations: { clinic: true },
      order: ORDERING[query.ordering ?? '-createdAt'],
      ...pageWindow(request),
    });
    return buildPage(users.map(presentUser), count, request);
  }

  /**
   * Active users of one role in the caller's clinic.
   */
  async findByRole(
    ctx: TenantContext,
    role: UserRole,
    query: ListUsersQueryDto,
    url: string,
  ): Promise<Page<UserView>> {
    return this.findAll(ctx, { ...query, role }, 'active', url);
  }

  async findOne(ctx: TenantContext, id: number): Promise<UserView> {
    return presentUser(await this.getUserOrThrow(ctx, id));
  }

  async create(ctx: TenantContext, dto: CreateUserDto): Promise<UserView> {
    const clinicId = resolveTargetClinic(ctx, dto.clinic);

    const created = this.db.withTransaction(async (manager) => {
      await this.assertEmailAvailable(manager, dto.email);
      await this.assertClinicExists(manager, clinicId, 'clinic');

      const repo = manager.getRepository(User);
      const saved = await repo.save(
        repo.create({
          email: dto.email,
          passwordHash: await this.passwords.hash(dto.password),
          firstName: dto.firstName ?? '',
          lastName: dto.lastName ?? '',
          role: dto.role,
          clinicId,
          contactNumber: dto.contactNumber ?? null,
          secondaryContactNumber: dto.secondaryContactNumber ?? null,
          address: dto.address ?? null,
          degree: dto.degree ?? null,
          isActive: dto.isActive ?? true,
          createdById: ctx.userId,
          updatedById: ctx.userId,
        }),
      );
      return repo.findOneOrFail({ where: { id: saved.id }, relations: { clinic: true } });
    });
    const user = await onUniqueViolation(created, () => emailTakenError());

    this.logger.log(`Created ${user.role} user ${user.id} in clinic ${clinicId} by user ${ctx.userId}`);
    return presentUser(user);
  }

  async update(ctx: TenantContext, id: number, dto: UpdateUserDto): Promise<UserView> {
    const user = await this.db.withTransaction(async (manager) => {
      const existing = await this.getUserOrThrow(ctx, id, 'active', manager);
      manager.getRepository(User).merge(existing, { ...dto, updatedById: ctx.userId });
      return manager.getRepository(User).save(existing);
    });

    this.logger.log(`Updated user ${id} by user ${ctx.userId}`);
    return presentUser(user);
  }

  async remove(ctx: TenantContext, id: number): Promise<void> {
    await this.db.withTransaction(async (manager) => {
      const user = await this.getUserOrThrow(ctx, id, 'active', manager);
      user.isDeleted = true;
      user.updatedById = ctx.userId;
      await manager.getRepository(User).save(user);
    });
    this.logger.log(`Soft-deleted user ${id} by user ${ctx.userId}`);
  }

  async restore(ctx: TenantContext, id: number): Promise<UserView> {
    const user = await this.db.withTransaction(async (manager) => {
      const existing = await this.getUserOrThrow(ctx, id, 'includingDeleted', manager);
      existing.isDeleted = false;
      existing.updatedById = ctx.userId;
      return manager.getRepository(User).save(existing);
    });
    this.logger.log(`Restored user ${id} by user ${ctx.userId}`);
    return presentUser(user);
  }

  private async getUserOrThrow(
    ctx: TenantContext,
    id: number,
    mode: QueryMode = 'active',
    manager?: EntityManager,
  ): Promise<User> {
    const scope = tenantScope(ctx, mode);
    const repo = manager ? manager.getRepository(User) : this.db.getRepository(User);
    const user = scope ? await repo.findOne({ where: { ...scope, id }, relations: { clinic: true } }) : null;
    if (!user) {
      throw new NotFoundException({ code: 'not_found', message: 'User not found.' });
    }
    return user;
  }

  /**
   * Emails stay reserved by soft-deleted accounts too.
   */
  async assertEmailAvailable(manager: EntityManager, email: string, message?: string): Promise<void> {
    const taken = await manager.getRepository(User).exists({ where: { email } });
    if (taken) {
      throw emailTakenError(message);
    }
  }

  async assertClinicExists(manager: EntityManager, clinicId: number, field: string, message?: string): Promise<void> {
    const exists = await manager.getRepository(Clinic).exists({ where: { id: clinicId, isDeleted: false } });
    if (!exists) {
      throw new ApiValidationException({ [field]: ['Clinic not found. Please select a valid clinic.'] }, message);
    }
  }
}
