import { ROLE_LABELS, UserRole } from '../../common/types/roles';
import { User } from './entities/user.entity';

export interface UserView {
  id: number;
  email: string;
  firstName: string;
  lastName: string;
  fullName: string;
  clinic: number | null;
  clinicName: string | null;
  role: UserRole;
  roleDisplay: string;
  contactNumber: string | null;
  secondaryContactNumber: string | null;
  address: string | null;
  degree: string | null;
  isActive: boolean;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * "First Last", falling back to the email when both are blank.
 */
export function fullNameOf(user: Pick<User, 'firstName' | 'lastName' | 'email'>): string {
  const name = `${user.firstName} ${user.lastName}`.trim();
  return name || user.email;
}

export function presentUser(user: User): UserView {
  return {
    id: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    fullName: fullNameOf(user),
    clinic: user.clinicId,
    clinicName: user.clinic?.name ?? null,
    role: user.role,
    roleDisplay: ROLE_LABELS[user.role],
    contactNumber: user.contactNumber,
    secondaryContactNumber: user.secondaryContactNumber,
    address: user.address,
    degree: user.degree,
    isActive: user.isActive,
    isDeleted: user.isDeleted,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
