import { LedgerStore } from '../store/ledger.store';
import { WorkflowEventBus } from './emitter';
import {
  handleApprovalNotification,
  handleAttendanceFlagNotification,
  handleRejectionNotification,
  handleRevocationNotification,
} from './handlers/notification.handler';
import { handleSalaryAnomalyLog } from './handlers/audit.handler';

/**
 * Register all event handlers.
 *
 * To add a new downstream action: register a new handler here. The
 * workflows themselves do not change.
 */
export function registerAllHandlers(bus: WorkflowEventBus, store: LedgerStore) {
  // ── Leave ────────────────────────────────────────────────────────────────
  bus.onWorkflowEvent('leave.approved', handleApprovalNotification(store));
  bus.onWorkflowEvent('leave.rejected', handleRejectionNotification(store));
  bus.onWorkflowEvent('leave.revoked', handleRevocationNotification(store));

  // ── Attendance ───────────────────────────────────────────────────────────
  bus.onWorkflowEvent('attendance.flagged', handleAttendanceFlagNotification(store));

  // ── Salary ───────────────────────────────────────────────────────────────
  bus.onWorkflowEvent('salary.flagged', handleSalaryAnomalyLog);

  console.log('[EventBus] All handlers registered');
}
