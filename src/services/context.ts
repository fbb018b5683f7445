import { EngineConfig } from '../config/engine';
import { WorkflowEventBus } from '../events/emitter';
import { LedgerStore } from '../store/ledger.store';
import { KeyedLock } from '../utils/lock';
import { LeaveBalanceLedger } from './balance.service';

/**
 * Everything a workflow operation needs, passed explicitly so the same
 * operations run against PostgreSQL in the server and the in-memory store in
 * tests.
 */
export interface WorkflowContext {
  store: LedgerStore;
  ledger: LeaveBalanceLedger;
  config: EngineConfig;
  events: WorkflowEventBus;
  /** Per-key serialization shared with the ledger. */
  locks: KeyedLock;
}

export function createWorkflowContext(
  store: LedgerStore,
  config: EngineConfig,
  events: WorkflowEventBus = new WorkflowEventBus()
): WorkflowContext {
  const locks = new KeyedLock();
  return { store, ledger: new LeaveBalanceLedger(store, locks), config, events, locks };
}
