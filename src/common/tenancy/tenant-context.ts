import { UserRole } from '../types/roles';

/**
 * Who is acting and in which clinic. Built from the authenticated user and
 * handed explicitly to every service call.
 */
export interface TenantContext {
  userId: number;
  clinicId: number | null;
  role: UserRole;
  isSuperuser: boolean;
}

/**
 * Whether soft-deleted rows are visible to a query. `includingDeleted` lifts
 * only the soft-delete filter, never the clinic filter.
 */
export type QueryMode = 'active' | 'includingDeleted';
