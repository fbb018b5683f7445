// ─── Enums ───────────────────────────────────────────────────────────────────

export type Role = 'hr' | 'manager' | 'employee';
export type AttendanceStatus = 'present' | 'absent' | 'late';
export type ReviewStatus = 'none' | 'pending' | 'approved' | 'rejected';
export type ReviewDecision = 'approved' | 'rejected';
export type LeaveType = 'annual' | 'sick' | 'casual' | 'unpaid';
export type LeaveStatus = 'pending' | 'approved' | 'rejected' | 'revoked';
export type LeaveDecision = 'approved' | 'rejected';

export type AttendanceFlagReason =
  | 'none'
  | 'excessive_absence'
  | 'excessive_lateness'
  | 'pattern_deviation';
export type AttendanceProfile = 'frequently_late' | 'irregular' | 'stable';
export type RecommendationLabel = 'recommend' | 'caution' | 'discourage';
export type SalaryRule = 'net_deviation' | 'deduction_ratio' | 'unexplained_basic_change';

/** ISO calendar date, `YYYY-MM-DD`. */
export type IsoDate = string;
/** Payroll month, `YYYY-MM`. */
export type IsoMonth = string;

// ─── Records ─────────────────────────────────────────────────────────────────

export interface Employee {
  id: number;
  name: string;
  role: Role;
  department: string;
  leave_balance: number;
}

export interface AttendanceRecord {
  id: number;
  employee_id: number;
  date: IsoDate;
  status: AttendanceStatus;
  review_status: ReviewStatus;
  recorded_by: number;
  reviewed_by: number | null;
  reviewed_at: Date | null;
  anomaly_score: number | null;
  anomaly_reason: AttendanceFlagReason | null;
  created_at: Date;
}

export interface LeaveRequest {
  id: number;
  employee_id: number;
  leave_type: LeaveType;
  start_date: IsoDate;
  end_date: IsoDate;
  days: number;
  reason: string | null;
  status: LeaveStatus;
  approver_id: number | null;
  decided_at: Date | null;
  recommendation_score: number | null;
  recommendation_label: RecommendationLabel | null;
  recommendation_reasons: string[];
  created_at: Date;
}

/** Membership row of the applied set: present iff the deduction is committed. */
export interface LeaveApplication {
  leave_request_id: number;
  employee_id: number;
  days: number;
  applied_at: Date;
}

export interface SalaryRecord {
  id: number;
  employee_id: number;
  month: IsoMonth;
  basic_salary: number;
  deductions: number;
  net_pay: number;
  anomaly_flag: boolean;
  anomaly_summary: string;
  active: boolean;
  superseded_by: number | null;
  created_at: Date;
}

export interface PerformanceRating {
  employee_id: number;
  month: IsoMonth;
  rating: number;
}

export interface RoleChange {
  employee_id: number;
  effective_month: IsoMonth;
  from_role: Role;
  to_role: Role;
}

export interface Notification {
  id: number;
  employee_id: number;
  type: string;
  message: string;
  created_at: Date;
}

// ─── Store Inputs ────────────────────────────────────────────────────────────

export interface NewAttendanceRecord {
  employee_id: number;
  date: IsoDate;
  status: AttendanceStatus;
  review_status: ReviewStatus;
  recorded_by: number;
  anomaly_score: number;
  anomaly_reason: AttendanceFlagReason;
}

export interface NewLeaveRequest {
  employee_id: number;
  leave_type: LeaveType;
  start_date: IsoDate;
  end_date: IsoDate;
  days: number;
  reason: string | null;
  recommendation_score: number;
  recommendation_label: RecommendationLabel;
  recommendation_reasons: string[];
}

export interface NewSalaryRecord {
  employee_id: number;
  month: IsoMonth;
  basic_salary: number;
  deductions: number;
  net_pay: number;
  anomaly_flag: boolean;
  anomaly_summary: string;
}

// ─── Callers ─────────────────────────────────────────────────────────────────

/** Identity handed over by the upstream auth layer. */
export interface Caller {
  id: number;
  role: Role;
}

// ─── Engine Assessments ──────────────────────────────────────────────────────

export interface AttendanceAssessment {
  flagged: boolean;
  reason: AttendanceFlagReason;
  score: number;
}

export interface AttendanceAdvisory extends AttendanceAssessment {
  /** Summary label over the trailing window, the new record included. */
  profile: AttendanceProfile;
}

export interface LeaveRecommendation {
  score: number;
  label: RecommendationLabel;
  reasons: string[];
}

export interface SalaryAssessment {
  anomalyFlag: boolean;
  rules: SalaryRule[];
  summary: string;
}

export interface PayslipSummary {
  headline: string;
  insights: string[];
  warnings: string[];
  deduction: number;
  deductionRate: number;
}

// ─── Event Types ─────────────────────────────────────────────────────────────

export type WorkflowEvent =
  | { type: 'attendance.flagged'; record: AttendanceRecord; actor_id: number }
  | { type: 'attendance.reviewed'; record: AttendanceRecord; actor_id: number }
  | { type: 'leave.submitted'; leaveRequest: LeaveRequest; actor_id: number }
  | { type: 'leave.approved'; leaveRequest: LeaveRequest; actor_id: number }
  | { type: 'leave.rejected'; leaveRequest: LeaveRequest; actor_id: number }
  | { type: 'leave.revoked'; leaveRequest: LeaveRequest; actor_id: number }
  | { type: 'salary.flagged'; salaryRecord: SalaryRecord; actor_id: number };

export type WorkflowEventType = WorkflowEvent['type'];
export type WorkflowEventOf<K extends WorkflowEventType> = Extract<WorkflowEvent, { type: K }>;

// ─── API Response Types ──────────────────────────────────────────────────────

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
  advisory?: unknown;
}
