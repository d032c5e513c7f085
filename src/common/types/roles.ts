/**
 * Roles a clinic user can hold. Patients have no login credentials.
 */
export enum UserRole {
  ADMIN = 'ADMIN',
  DOCTOR = 'DOCTOR',
}

export const ROLE_LABELS: Record<UserRole, string> = {
  [UserRole.ADMIN]: 'Clinic Administrator',
  [UserRole.DOCTOR]: 'Doctor/Orthodontist',
};
