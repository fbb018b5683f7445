import { EngineConfig } from '../config/engine';
import { IsoMonth, PayslipSummary, PerformanceRating, RoleChange, SalaryAssessment, SalaryRule } from '../types';
import { addMonths, roundTo } from '../utils/helpers';

export interface SalaryFigures {
  month: IsoMonth;
  basic_salary: number;
  deductions: number;
  net_pay: number;
}

export interface SalaryHistory {
  /** Prior active records, any order; only the trailing three months are used. */
  previous: SalaryFigures[];
  ratings: PerformanceRating[];
  roleChanges: RoleChange[];
}

const TRAILING_MONTHS = 3;
const WORKING_DAYS_PER_MONTH = 22;

function money(value: number): string {
  return value.toFixed(2);
}

/**
 * Flag a payroll entry whose figures look off against the employee's own
 * recent payroll.
 */
export function detectSalaryAnomaly(
  record: SalaryFigures,
  history: SalaryHistory,
  config: Pick<EngineConfig, 'salaryDeviationPercent' | 'deductionFraction'>
): SalaryAssessment {
  const rules: SalaryRule[] = [];
  const lines: string[] = [];

  const earliest = addMonths(record.month, -TRAILING_MONTHS);
  const trailing = history.previous.filter((p) => p.month >= earliest && p.month < record.month);
  if (trailing.length > 0) {
    const average = trailing.reduce((sum, p) => sum + p.net_pay, 0) / trailing.length;
    if (average > 0) {
      const deviation = (Math.abs(record.net_pay - average) / average) * 100;
      if (deviation > config.salaryDeviationPercent) {
        rules.push('net_deviation');
        lines.push(
          `Net pay ${money(record.net_pay)} deviates ${deviation.toFixed(1)}% from the trailing ${TRAILING_MONTHS}-month average of ${money(average)} (limit ${config.salaryDeviationPercent}%).`
        );
      }
    }
  }

  if (record.basic_salary > 0) {
    const ratio = record.deductions / record.basic_salary;
    if (ratio > config.deductionFraction) {
      rules.push('deduction_ratio');
      lines.push(
        `Deductions ${money(record.deductions)} are ${(ratio * 100).toFixed(1)}% of basic salary (limit ${roundTo(config.deductionFraction * 100, 2)}%).`
      );
    }
  }

  const priorMonth = addMonths(record.month, -1);
  const prior = history.previous.find((p) => p.month === priorMonth);
  if (prior && prior.basic_salary !== record.basic_salary) {
    const inRange = (month: IsoMonth) => month >= priorMonth && month <= record.month;
    const explained =
      history.ratings.some((r) => inRange(r.month)) ||
      history.roleChanges.some((c) => inRange(c.effective_month));
    if (!explained) {
      rules.push('unexplained_basic_change');
      lines.push(
        `Basic salary changed from ${money(prior.basic_salary)} to ${money(record.basic_salary)} without a performance rating or role change.`
      );
    }
  }

  return {
    anomalyFlag: rules.length > 0,
    rules,
    summary: lines.length > 0 ? lines.join(' ') : 'No salary anomalies detected.',
  };
}

/**
 * Attendance-driven deduction: a full day's pay per absence and half a day per
 * late arrival, on a 22-working-day month. Never more than the basic salary.
 */
export function attendanceDeductions(basicSalary: number, absentDays: number, lateDays: number): number {
  const dailyRate = basicSalary / WORKING_DAYS_PER_MONTH;
  const deduction = dailyRate * absentDays + (dailyRate / 2) * lateDays;
  return roundTo(Math.min(basicSalary, Math.max(0, deduction)), 2);
}

export interface PayslipInput {
  basic_salary: number;
  net_pay: number;
  anomaly_flag: boolean;
  anomaly_summary: string;
  absentDays?: number;
  lateDays?: number;
}

export function payslipSummary(input: PayslipInput): PayslipSummary {
  const deduction = roundTo(Math.max(input.basic_salary - input.net_pay, 0), 2);
  const deductionRate = input.basic_salary > 0 ? roundTo((deduction / input.basic_salary) * 100, 1) : 0;

  const insights: string[] = [];
  const warnings: string[] = [];
  let headline: string;

  if (deduction === 0) {
    headline = 'Full payout expected for this month.';
    insights.push('No deductions were applied.');
  } else if (deductionRate >= 20) {
    headline = 'Significant deductions detected this month.';
  } else {
    headline = 'Minor deductions applied to this month.';
  }

  if (input.absentDays) insights.push(`${input.absentDays} day(s) marked absent.`);
  if (input.lateDays) insights.push(`${input.lateDays} day(s) marked late.`);
  if (insights.length === 0) insights.push('Attendance signals are stable for this period.');

  if (input.anomaly_flag) warnings.push(input.anomaly_summary);
  if (deduction > 0) {
    warnings.push(`Deduction total: ${money(deduction)} (${deductionRate.toFixed(1)}% of base pay).`);
  }

  return { headline, insights, warnings, deduction, deductionRate };
}
