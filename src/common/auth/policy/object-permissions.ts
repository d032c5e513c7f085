/**
 * Object-level checks, applied after the role gate once the target row is
 * loaded.
 */

import { ForbiddenException } from '@nestjs/common';
import { UserRole } from '../../types/roles';
import { TenantContext } from '../../tenancy/tenant-context';

export function canAccessClinicRecord(ctx: TenantContext, recordClinicId: number | null): boolean {
  if (ctx.isSuperuser) {
    return true;
  }
  return ctx.clinicId !== null && ctx.clinicId === recordClinicId;
}

export function assertCanAccessClinicRecord(ctx: TenantContext, recordClinicId: number | null): void {
  if (!canAccessClinicRecord(ctx, recordClinicId)) {
    throw new ForbiddenException({
      code: 'permission_denied',
      message: 'You do not have permission to access resources from other clinics.',
    });
  }
}

/**
 * Doctors may only change treatments assigned to them. Admins and
 * superusers may change any treatment in scope.
 */
export function canEditTreatment(ctx: TenantContext, treatment: { doctorId: number | null }): boolean {
  if (ctx.isSuperuser || ctx.role !== UserRole.DOCTOR) {
    return true;
  }
  return treatment.doctorId === ctx.userId;
}

export function assertCanEditTreatment(ctx: TenantContext, treatment: { doctorId: number | null }): void {
  if (!canEditTreatment(ctx, treatment)) {
    throw new ForbiddenException({
      code: 'permission_denied',
      message: 'You can only update treatments assigned to you.',
    });
  }
}
