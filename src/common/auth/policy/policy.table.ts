/**
 * Dental Clinic API - Role Policy
 *
 * Coarse role gate: which roles may perform which action. Object-level checks
 * (clinic match, treatment ownership) live in object-permissions.ts.
 */

import { UserRole } from '../../types/roles';

export type PolicyAction =
  | 'clinic.read'
  | 'clinic.statistics'
  | 'clinic.create'
  | 'clinic.update'
  | 'clinic.delete'
  | 'clinic.restore'
  | 'clinic.includeDeleted'
  | 'user.read'
  | 'user.listDoctors'
  | 'user.listAdmins'
  | 'user.create'
  | 'user.update'
  | 'user.delete'
  | 'user.restore'
  | 'user.includeDeleted'
  | 'patient.read'
  | 'patient.create'
  | 'patient.update'
  | 'patient.delete'
  | 'patient.restore'
  | 'patient.assignDoctor'
  | 'patient.includeDeleted'
  | 'treatment.read'
  | 'treatment.create'
  | 'treatment.update'
  | 'treatment.delete'
  | 'treatment.restore'
  | 'treatment.includeDeleted';

const ANY_STAFF: readonly UserRole[] = [UserRole.ADMIN, UserRole.DOCTOR];
const ADMIN_ONLY: readonly UserRole[] = [UserRole.ADMIN];

export const POLICY_TABLE: Record<PolicyAction, readonly UserRole[]> = {
  'clinic.read': ANY_STAFF,
  'clinic.statistics': ANY_STAFF,
  'clinic.create': ADMIN_ONLY,
  'clinic.update': ADMIN_ONLY,
  'clinic.delete': ADMIN_ONLY,
  'clinic.restore': ADMIN_ONLY,
  'clinic.includeDeleted': ADMIN_ONLY,

  'user.read': ANY_STAFF,
  'user.listDoctors': ANY_STAFF,
  'user.listAdmins': ADMIN_ONLY,
  'user.create': ADMIN_ONLY,
  'user.update': ADMIN_ONLY,
  'user.delete': ADMIN_ONLY,
  'user.restore': ADMIN_ONLY,
  'user.includeDeleted': ADMIN_ONLY,

  'patient.read': ANY_STAFF,
  'patient.create': ANY_STAFF,
  'patient.update': ANY_STAFF,
  'patient.delete': ADMIN_ONLY,
  'patient.restore': ADMIN_ONLY,
  'patient.assignDoctor': ADMIN_ONLY,
  'patient.includeDeleted': ADMIN_ONLY,

  'treatment.read': ANY_STAFF,
  'treatment.create': ANY_STAFF,
  'treatment.update': ANY_STAFF,
  'treatment.delete': ANY_STAFF,
  'treatment.restore': ADMIN_ONLY,
  'treatment.includeDeleted': ADMIN_ONLY,
};

export interface PolicyActor {
  role: UserRole;
  isSuperuser: boolean;
}

export function isAllowed(action: PolicyAction, actor: PolicyActor): boolean {
  if (actor.isSuperuser) {
    return true;
  }
  return POLICY_TABLE[action].includes(actor.role);
}

export function isAdminOnly(action: PolicyAction): boolean {
  const roles = POLICY_TABLE[action];
  return roles.length === 1 && roles[0] === UserRole.ADMIN;
}

export function denialMessage(action: PolicyAction): string {
  return isAdminOnly(action)
    ? 'Only clinic administrators can access this resource.'
    : 'You do not have permission to perform this action.';
}
