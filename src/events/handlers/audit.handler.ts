import { WorkflowEventOf } from '../../types';

/**
 * Payroll anomalies go to the HR dashboard count; here they are only logged
 * so the flagged entry can be traced back to the actor who keyed it in.
 */
export async function handleSalaryAnomalyLog(event: WorkflowEventOf<'salary.flagged'>): Promise<void> {
  const record = event.salaryRecord;
  console.warn(
    `[AuditHandler] Salary record #${record.id} (employee #${record.employee_id}, ${record.month}) flagged by entry from #${event.actor_id}: ${record.anomaly_summary}`
  );
}
