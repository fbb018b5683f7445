import { buildEngineConfig, EngineConfig } from '../config/engine';
import { createWorkflowContext, WorkflowContext } from '../services/context';
import { WorkflowResult } from '../services/result';
import { MemoryLedgerStore } from '../store/memory.store';
import { Caller, Employee } from '../types';

export const HR: Caller = { id: 1, role: 'hr' };
export const MANAGER: Caller = { id: 2, role: 'manager' };

export interface TestHarness {
  store: MemoryLedgerStore;
  ctx: WorkflowContext;
}

/**
 * Fresh in-memory store with an HR officer (#1) and a manager (#2) already in
 * the `People` department.
 */
export function createHarness(overrides: Partial<EngineConfig> = {}): TestHarness {
  const store = new MemoryLedgerStore();
  store.addEmployee({ id: HR.id, name: 'Hana Officer', role: 'hr', department: 'People', leave_balance: 20 });
  store.addEmployee({ id: MANAGER.id, name: 'Mark Lead', role: 'manager', department: 'People', leave_balance: 20 });
  return { store, ctx: createWorkflowContext(store, buildEngineConfig(overrides)) };
}

export function addEmployee(
  store: MemoryLedgerStore,
  id: number,
  fields: Partial<Omit<Employee, 'id'>> = {}
): Employee {
  return store.addEmployee({
    id,
    name: `Employee ${id}`,
    role: 'employee',
    department: 'Engineering',
    leave_balance: 10,
    ...fields,
  });
}

export function asEmployee(id: number): Caller {
  return { id, role: 'employee' };
}

/** Let fire-and-forget event handlers finish. */
export function flushHandlers(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function unwrap<T, A>(result: WorkflowResult<T, A>): { data: T; advisory?: A } {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.error}: ${result.message}`);
  }
  return result;
}
