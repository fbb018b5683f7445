import { EngineConfig } from '../config/engine';
import {
  Employee,
  IsoDate,
  LeaveRecommendation,
  LeaveRequest,
  PerformanceRating,
  RecommendationLabel,
} from '../types';
import { roundTo } from '../utils/helpers';

export interface LeaveRecommendationInput {
  employee: Employee;
  request: { start_date: IsoDate; end_date: IsoDate; days: number };
  /** The employee's own requests created inside the approval lookback window. */
  history: LeaveRequest[];
  /** Approved requests in the employee's department overlapping the requested span. */
  departmentLeave: LeaveRequest[];
  /** Head count of the department, the employee included. */
  departmentSize: number;
  ratings: PerformanceRating[];
}

const WEIGHTS = {
  balance: 0.4,
  history: 0.3,
  performance: 0.1,
  team: 0.2,
};

const NEUTRAL_PERFORMANCE = 0.5;

function label(score: number): RecommendationLabel {
  if (score >= 0.65) return 'recommend';
  if (score >= 0.4) return 'caution';
  return 'discourage';
}

function percent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

/**
 * Advisory score in [0, 1] for a leave request. Never decides anything on its
 * own: the approval workflow only stores the result for the approver.
 */
export function recommendLeave(
  input: LeaveRecommendationInput,
  config: Pick<EngineConfig, 'departmentCapacity'>
): LeaveRecommendation {
  const { employee, request } = input;
  const reasons: string[] = [];

  // ── Balance ──────────────────────────────────────────────────────────────
  const balance = Math.max(0, employee.leave_balance);
  const balanceRatio = balance + request.days > 0 ? balance / (balance + request.days) : 0;
  reasons.push(
    `Remaining balance ratio ${balanceRatio.toFixed(2)} (${balance} day(s) available, ${request.days} requested)`
  );

  // ── Approval history ─────────────────────────────────────────────────────
  const approved = input.history.filter((r) => r.status === 'approved').length;
  const rejected = input.history.filter((r) => r.status === 'rejected').length;
  const decided = approved + rejected;
  const approvalRate = decided > 0 ? approved / decided : 1;
  reasons.push(
    decided > 0
      ? `Approved ${approved} of ${decided} past request(s)`
      : 'No decided requests in the lookback window'
  );

  // ── Performance ──────────────────────────────────────────────────────────
  let performance = NEUTRAL_PERFORMANCE;
  if (input.ratings.length > 0) {
    const mean = input.ratings.reduce((sum, r) => sum + r.rating, 0) / input.ratings.length;
    performance = Math.min(1, Math.max(0, mean / 5));
    reasons.push(`Average performance rating ${mean.toFixed(1)} / 5`);
  } else {
    reasons.push('No performance ratings in the lookback window');
  }

  // ── Team availability ────────────────────────────────────────────────────
  const colleagues = Math.max(0, input.departmentSize - 1);
  const onLeave = new Set(
    input.departmentLeave.filter((r) => r.employee_id !== employee.id).map((r) => r.employee_id)
  ).size;
  const fraction = colleagues > 0 ? onLeave / colleagues : 0;
  const teamPenalty = Math.min(1, (fraction / config.departmentCapacity) ** 2);
  const overCapacity = colleagues > 0 && fraction >= config.departmentCapacity;

  reasons.push(
    colleagues > 0
      ? `${onLeave} of ${colleagues} colleague(s) in ${employee.department} on approved leave during this span (${percent(fraction)}, limit ${percent(config.departmentCapacity)})`
      : `No colleagues in ${employee.department}`
  );
  if (overCapacity) {
    reasons.push('Department capacity limit reached for this span');
  }

  let score =
    WEIGHTS.balance * balanceRatio +
    WEIGHTS.history * approvalRate +
    WEIGHTS.performance * performance +
    WEIGHTS.team * (1 - teamPenalty);
  if (overCapacity) score *= 0.5;
  score = roundTo(Math.min(1, Math.max(0, score)), 4);

  return { score, label: label(score), reasons };
}
