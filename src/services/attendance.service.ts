import {
  AttendanceAdvisory,
  AttendanceRecord,
  AttendanceStatus,
  Caller,
  IsoDate,
  ReviewDecision,
} from '../types';
import { attendanceProfile, flagAttendance, historyStart, windowStart } from '../engine/attendance.scorer';
import { InvalidTransitionError, NotFoundError } from '../errors/workflow';
import { requireCapability } from '../utils/capabilities';
import { addDays, todayIso } from '../utils/helpers';
import { WorkflowContext } from './context';
import { runWorkflow, WorkflowResult } from './result';

export interface RecordAttendanceInput {
  employeeId: number;
  date: IsoDate;
  status: AttendanceStatus;
}

/**
 * The employee's records the flagger weighs for a day: everything in the
 * history range except records a reviewer rejected.
 */
async function standingHistory(ctx: WorkflowContext, employeeId: number, date: IsoDate): Promise<AttendanceRecord[]> {
  const records = await ctx.store.listAttendanceInWindow(employeeId, {
    start: historyStart(date, ctx.config),
    end: date,
  });
  return records.filter((r) => r.review_status !== 'rejected');
}

// ─── Record Attendance ───────────────────────────────────────────────────────

/**
 * Create the attendance record for one employee-day and decide whether it
 * needs a human review. This only creates: a second record for the same day
 * fails with `DuplicateRecord`.
 */
export function recordAttendance(
  ctx: WorkflowContext,
  input: RecordAttendanceInput,
  caller: Caller
): Promise<WorkflowResult<AttendanceRecord, AttendanceAdvisory>> {
  return runWorkflow(async () => {
    requireCapability(caller, 'attendance:record');

    const employee = await ctx.store.getEmployee(input.employeeId);
    if (!employee) throw new NotFoundError('Employee', input.employeeId);

    const history = await standingHistory(ctx, employee.id, input.date);
    const current = { date: input.date, status: input.status };
    const assessment = flagAttendance(current, history, ctx.config);
    const from = windowStart(input.date, ctx.config);
    const profile = attendanceProfile([...history.filter((e) => e.date >= from && e.date < input.date), current]);

    const record = await ctx.store.createAttendanceRecord({
      employee_id: employee.id,
      date: input.date,
      status: input.status,
      review_status: assessment.flagged ? 'pending' : 'none',
      recorded_by: caller.id,
      anomaly_score: assessment.score,
      anomaly_reason: assessment.reason,
    });

    if (assessment.flagged) {
      console.log(`[Attendance] Record #${record.id} flagged for review (${assessment.reason}, score ${assessment.score})`);
      ctx.events.emitWorkflowEvent({ type: 'attendance.flagged', record, actor_id: caller.id });
    }

    return { data: record, advisory: { ...assessment, profile } };
  });
}

// ─── Review ──────────────────────────────────────────────────────────────────

export function reviewAttendance(
  ctx: WorkflowContext,
  recordId: number,
  decision: ReviewDecision,
  reviewerId: number,
  caller: Caller
): Promise<WorkflowResult<AttendanceRecord>> {
  return runWorkflow(async () => {
    requireCapability(caller, 'attendance:review');

    const updated = await ctx.store.updateAttendanceReview(recordId, decision, reviewerId);
    if (!updated) {
      const current = await ctx.store.getAttendanceRecord(recordId);
      if (!current) throw new NotFoundError('Attendance record', recordId);
      throw new InvalidTransitionError('attendance record', recordId, current.review_status, decision);
    }

    ctx.events.emitWorkflowEvent({ type: 'attendance.reviewed', record: updated, actor_id: caller.id });
    return { data: updated };
  });
}

// ─── Batch Re-scoring ────────────────────────────────────────────────────────

export interface RescoreOptions {
  /** Last day whose records are re-scored; defaults to today. */
  until?: IsoDate;
  /** How many days back from `until` to re-score. */
  days?: number;
  signal?: AbortSignal;
}

export interface RescoreSummary {
  scanned: number;
  /** Records moved from `none` to `pending` by this run. */
  flagged: number;
  aborted: boolean;
}

/**
 * Re-run the attendance flagger over records that are not yet decided.
 *
 * Only the advisory score and reason change, plus `none` → `pending` for a
 * record that now flags; a record a reviewer already decided is left alone.
 * Each record is written on its own, so aborting between records leaves
 * every record either fully re-scored or untouched.
 */
export async function rescoreAttendance(ctx: WorkflowContext, options: RescoreOptions = {}): Promise<RescoreSummary> {
  const until = options.until ?? todayIso();
  const from = addDays(until, -((options.days ?? ctx.config.attendanceWindowDays) - 1));
  const records = await ctx.store.listAttendanceForRescore({ start: from, end: until });

  const summary: RescoreSummary = { scanned: 0, flagged: 0, aborted: false };

  for (const record of records) {
    if (options.signal?.aborted) {
      summary.aborted = true;
      break;
    }

    const history = await standingHistory(ctx, record.employee_id, record.date);
    const assessment = flagAttendance(record, history, ctx.config);
    // Review status only moves forward: a pending record stays pending.
    const nextStatus = assessment.flagged || record.review_status === 'pending' ? 'pending' : 'none';

    await ctx.store.updateAttendanceScore(record.id, assessment.score, assessment.reason, nextStatus);
    summary.scanned++;
    if (nextStatus !== record.review_status) summary.flagged++;
  }

  return summary;
}
