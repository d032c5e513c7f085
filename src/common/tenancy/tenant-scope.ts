/**
 * Dental Clinic API - Tenant Scope Builders
 *
 * Every query against clinic-owned data spreads one of these scopes into its
 * `where` clause. A `null` scope means the caller can see nothing: callers
 * return an empty page or a 404 rather than querying unfiltered.
 */

import { BadRequestException, ForbiddenException } from '@nestjs/common';
import { ApiValidationException } from '../http/api-validation.exception';
import { assertCanAccessClinicRecord } from '../auth/policy/object-permissions';
import { QueryMode, TenantContext } from './tenant-context';

export interface SoftDeleteScope {
  isDeleted?: false;
}

export interface TenantScope extends SoftDeleteScope {
  clinicId?: number;
}

export interface ClinicScope extends SoftDeleteScope {
  id?: number;
}

export function softDeleteScope(mode: QueryMode): SoftDeleteScope {
  return mode === 'active' ? { isDeleted: false } : {};
}

/**
 * Scope for Users, Patients and Treatments.
 */
export function tenantScope(ctx: TenantContext, mode: QueryMode): TenantScope | null {
  if (ctx.isSuperuser) {
    return softDeleteScope(mode);
  }
  if (ctx.clinicId === null) {
    return null;
  }
  return { clinicId: ctx.clinicId, ...softDeleteScope(mode) };
}

/**
 * Scope for the clinics table, where a clinic is its own tenant.
 */
export function clinicScope(ctx: TenantContext, mode: QueryMode): ClinicScope | null {
  if (ctx.isSuperuser) {
    return softDeleteScope(mode);
  }
  if (ctx.clinicId === null) {
    return null;
  }
  return { id: ctx.clinicId, ...softDeleteScope(mode) };
}

/**
 * Clinic a new record is created in. Clinic members always create in their
 * own clinic and may not name another one; a superuser without a clinic has
 * to name it.
 */
export function resolveTargetClinic(ctx: TenantContext, requestedClinicId?: number | null): number {
  if (requestedClinicId) {
    assertCanAccessClinicRecord(ctx, requestedClinicId);
  }
  if (ctx.clinicId !== null) {
    return ctx.clinicId;
  }
  if (ctx.isSuperuser && requestedClinicId) {
    return requestedClinicId;
  }
  if (ctx.isSuperuser) {
    throw new ApiValidationException({ clinic: ['A clinic must be specified.'] });
  }
  throw new BadRequestException({
    code: 'validation_error',
    message: 'User is not assigned to any clinic.',
  });
}

/**
 * Query mode for a listing. Only callers allowed to see deleted rows may ask
 * for them.
 */
export function queryModeFor(includeDeleted: boolean | undefined, allowed: boolean): QueryMode {
  if (!includeDeleted) {
    return 'active';
  }
  if (!allowed) {
    throw new ForbiddenException({
      code: 'permission_denied',
      message: 'Only clinic administrators can view deleted records.',
    });
  }
  return 'includingDeleted';
}
