import { ForbiddenError } from '../errors/workflow';
import { Caller, Role } from '../types';

export type Capability =
  | 'attendance:record'
  | 'attendance:review'
  | 'leave:submit_for_others'
  | 'leave:decide'
  | 'leave:revoke'
  | 'salary:manage';

const ROLE_CAPABILITIES: Record<Role, readonly Capability[]> = {
  hr: [
    'attendance:record',
    'attendance:review',
    'leave:submit_for_others',
    'leave:decide',
    'leave:revoke',
    'salary:manage',
  ],
  manager: ['attendance:record', 'attendance:review', 'leave:decide'],
  employee: [],
};

const DESCRIPTIONS: Record<Capability, string> = {
  'attendance:record': 'record attendance',
  'attendance:review': 'review attendance',
  'leave:submit_for_others': 'submit leave for another employee',
  'leave:decide': 'decide leave requests',
  'leave:revoke': 'revoke approved leave',
  'salary:manage': 'manage salary records',
};

export function can(role: Role, capability: Capability): boolean {
  return ROLE_CAPABILITIES[role].includes(capability);
}

/**
 * Throw `Forbidden` unless the caller's role grants the capability.
 */
export function requireCapability(caller: Caller, capability: Capability): void {
  if (!can(caller.role, capability)) {
    throw new ForbiddenError(`Role "${caller.role}" cannot ${DESCRIPTIONS[capability]}`);
  }
}
