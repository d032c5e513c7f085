/**
 * Dental Clinic API - Policy Decorator
 *
 * Names the action a route performs; PolicyGuard checks it against the
 * role policy table.
 */

import { SetMetadata } from '@nestjs/common';
import { PolicyAction } from '../policy/policy.table';

export const POLICY_KEY = 'policyAction';
export const Policy = (action: PolicyAction) => SetMetadata(POLICY_KEY, action);
