/**
 * Dental Clinic API - Auth Decorators Index
 *
 * Re-exports all authentication and authorization decorators.
 */

export * from './current-user.decorator';
export * from './policy.decorator';
export * from './public.decorator';
