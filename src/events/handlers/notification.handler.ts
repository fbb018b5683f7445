import { LedgerStore } from '../../store/ledger.store';
import { WorkflowEventOf } from '../../types';

function describeLeave(event: WorkflowEventOf<'leave.approved' | 'leave.rejected' | 'leave.revoked'>): string {
  const lr = event.leaveRequest;
  return `${lr.leave_type} leave from ${lr.start_date} to ${lr.end_date}`;
}

/**
 * Notify the employee when their leave is approved.
 */
export function handleApprovalNotification(store: LedgerStore) {
  return async (event: WorkflowEventOf<'leave.approved'>): Promise<void> => {
    await store.createNotification(
      event.leaveRequest.employee_id,
      'leave_approved',
      `Your ${describeLeave(event)} has been approved. ${event.leaveRequest.days} day(s) were deducted from your balance.`
    );
    console.log(`[NotificationHandler] Sent approval notification for leave #${event.leaveRequest.id}`);
  };
}

export function handleRejectionNotification(store: LedgerStore) {
  return async (event: WorkflowEventOf<'leave.rejected'>): Promise<void> => {
    await store.createNotification(
      event.leaveRequest.employee_id,
      'leave_rejected',
      `Your ${describeLeave(event)} was rejected.`
    );
    console.log(`[NotificationHandler] Sent rejection notification for leave #${event.leaveRequest.id}`);
  };
}

/**
 * Tell the employee an approval was reversed and the days credited back.
 */
export function handleRevocationNotification(store: LedgerStore) {
  return async (event: WorkflowEventOf<'leave.revoked'>): Promise<void> => {
    await store.createNotification(
      event.leaveRequest.employee_id,
      'leave_revoked',
      `Your ${describeLeave(event)} was revoked by HR. ${event.leaveRequest.days} day(s) were credited back.`
    );
    console.log(`[NotificationHandler] Sent revocation notification for leave #${event.leaveRequest.id}`);
  };
}

export function handleAttendanceFlagNotification(store: LedgerStore) {
  return async (event: WorkflowEventOf<'attendance.flagged'>): Promise<void> => {
    const record = event.record;
    await store.createNotification(
      record.employee_id,
      'attendance_flagged',
      `Your attendance on ${record.date} (${record.status}) is awaiting review: ${(record.anomaly_reason ?? 'none').replace(/_/g, ' ')}.`
    );
    console.log(`[NotificationHandler] Sent attendance review notice for record #${record.id}`);
  };
}
