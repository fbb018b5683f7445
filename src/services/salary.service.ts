import { Caller, IsoMonth, PayslipSummary, SalaryAssessment, SalaryRecord } from '../types';
import { attendanceDeductions, detectSalaryAnomaly, payslipSummary } from '../engine/salary.scorer';
import { InvalidAmountError, NotFoundError } from '../errors/workflow';
import { requireCapability } from '../utils/capabilities';
import { addMonths, isIsoMonth, monthBounds, roundTo } from '../utils/helpers';
import { WorkflowContext } from './context';
import { runWorkflow, WorkflowResult } from './result';

export interface SalaryInput {
  employeeId: number;
  month: IsoMonth;
  basicSalary: number;
  /** Left out to derive the deduction from the month's attendance. */
  deductions?: number;
}

export interface SalaryScore {
  employee_id: number;
  month: IsoMonth;
  basic_salary: number;
  deductions: number;
  net_pay: number;
  assessment: SalaryAssessment;
  payslip: PayslipSummary;
}

const TRAILING_MONTHS = 3;

/**
 * Work out the figures for a payroll entry and score them. Shared by the
 * dry-run and the persisting path so both see the same numbers.
 */
async function scoreFigures(ctx: WorkflowContext, input: SalaryInput): Promise<SalaryScore> {
  if (!isIsoMonth(input.month)) {
    throw new InvalidAmountError(`Month must be YYYY-MM, got "${input.month}"`);
  }
  if (!Number.isFinite(input.basicSalary) || input.basicSalary < 0) {
    throw new InvalidAmountError(`Basic salary must be a non-negative amount, got ${input.basicSalary}`);
  }

  const employee = await ctx.store.getEmployee(input.employeeId);
  if (!employee) throw new NotFoundError('Employee', input.employeeId);

  // Only records that stand count towards pay: unflagged or confirmed by a reviewer.
  const attendance = (await ctx.store.listAttendanceInWindow(employee.id, monthBounds(input.month))).filter(
    (a) => a.review_status === 'none' || a.review_status === 'approved'
  );
  const absentDays = attendance.filter((a) => a.status === 'absent').length;
  const lateDays = attendance.filter((a) => a.status === 'late').length;

  const deductions = roundTo(
    input.deductions ?? attendanceDeductions(input.basicSalary, absentDays, lateDays),
    2
  );
  if (deductions < 0) {
    throw new InvalidAmountError(`Deductions must not be negative, got ${deductions}`);
  }
  const netPay = roundTo(input.basicSalary - deductions, 2);
  if (netPay < 0) {
    throw new InvalidAmountError(`Deductions ${deductions} exceed basic salary ${input.basicSalary}`);
  }

  const previous = await ctx.store.listSalaryHistory(employee.id, TRAILING_MONTHS, input.month);
  const priorMonth = addMonths(input.month, -1);
  const ratings = await ctx.store.listRatings(employee.id, priorMonth, input.month);
  const roleChanges = await ctx.store.listRoleChanges(employee.id, priorMonth, input.month);

  const figures = { month: input.month, basic_salary: input.basicSalary, deductions, net_pay: netPay };
  const assessment = detectSalaryAnomaly(figures, { previous, ratings, roleChanges }, ctx.config);
  const payslip = payslipSummary({
    basic_salary: input.basicSalary,
    net_pay: netPay,
    anomaly_flag: assessment.anomalyFlag,
    anomaly_summary: assessment.summary,
    absentDays,
    lateDays,
  });

  return { employee_id: employee.id, ...figures, assessment, payslip };
}

// ─── Score ───────────────────────────────────────────────────────────────────

export function scoreSalary(
  ctx: WorkflowContext,
  input: SalaryInput,
  caller: Caller
): Promise<WorkflowResult<SalaryScore>> {
  return runWorkflow(async () => {
    requireCapability(caller, 'salary:manage');
    return { data: await scoreFigures(ctx, input) };
  });
}

// ─── Record ──────────────────────────────────────────────────────────────────

/**
 * Persist a payroll entry as the active record for its month. A corrective
 * re-entry supersedes the record it replaces; the old one is kept inactive.
 */
export function recordSalary(
  ctx: WorkflowContext,
  input: SalaryInput,
  caller: Caller
): Promise<WorkflowResult<SalaryRecord, PayslipSummary>> {
  return runWorkflow(async () => {
    requireCapability(caller, 'salary:manage');

    const scored = await scoreFigures(ctx, input);
    const record = await ctx.store.createSalaryRecord({
      employee_id: scored.employee_id,
      month: scored.month,
      basic_salary: scored.basic_salary,
      deductions: scored.deductions,
      net_pay: scored.net_pay,
      anomaly_flag: scored.assessment.anomalyFlag,
      anomaly_summary: scored.assessment.summary,
    });

    if (record.anomaly_flag) {
      ctx.events.emitWorkflowEvent({ type: 'salary.flagged', salaryRecord: record, actor_id: caller.id });
    }
    return { data: record, advisory: scored.payslip };
  });
}
