import {
  AttendanceRecord,
  Employee,
  IsoDate,
  IsoMonth,
  LeaveRequest,
  LeaveStatus,
  NewAttendanceRecord,
  NewLeaveRequest,
  NewSalaryRecord,
  Notification,
  PerformanceRating,
  ReviewDecision,
  RoleChange,
  SalaryRecord,
  AttendanceFlagReason,
} from '../types';

export interface DateWindow {
  start: IsoDate;
  end: IsoDate;
}

/**
 * Durable record storage the workflows run against.
 *
 * `createAttendanceRecord` must reject a second row for the same
 * (employee, date) with a `DuplicateRecordError`, and
 * `insertLeaveApplication` must reject a second row for the same leave
 * request. `transaction` runs the callback so that either every write it
 * makes is kept or none is.
 */
export interface LedgerStore {
  transaction<T>(fn: (tx: LedgerStore) => Promise<T>): Promise<T>;

  // ── Employees ─────────────────────────────────────────────────────────────
  getEmployee(id: number): Promise<Employee | null>;
  listDepartmentMembers(department: string): Promise<Employee[]>;
  /** Compare-and-update; resolves false when the stored balance is no longer `expectedBalance`. */
  updateEmployeeBalance(id: number, newBalance: number, expectedBalance: number): Promise<boolean>;

  // ── Applied set ───────────────────────────────────────────────────────────
  isLeaveApplied(leaveRequestId: number): Promise<boolean>;
  insertLeaveApplication(leaveRequestId: number, employeeId: number, days: number): Promise<void>;
  deleteLeaveApplication(leaveRequestId: number): Promise<boolean>;

  // ── Attendance ────────────────────────────────────────────────────────────
  createAttendanceRecord(record: NewAttendanceRecord): Promise<AttendanceRecord>;
  getAttendanceRecord(id: number): Promise<AttendanceRecord | null>;
  /** Guarded update: resolves null unless the record is still `pending`. */
  updateAttendanceReview(id: number, decision: ReviewDecision, reviewerId: number): Promise<AttendanceRecord | null>;
  updateAttendanceScore(
    id: number,
    score: number,
    reason: AttendanceFlagReason,
    reviewStatus: 'none' | 'pending'
  ): Promise<void>;
  listAttendanceInWindow(employeeId: number, window: DateWindow): Promise<AttendanceRecord[]>;
  /** Records still open to re-flagging (`none` or `pending`) dated inside the window. */
  listAttendanceForRescore(window: DateWindow): Promise<AttendanceRecord[]>;

  // ── Leave ─────────────────────────────────────────────────────────────────
  createLeaveRequest(request: NewLeaveRequest): Promise<LeaveRequest>;
  getLeaveRequest(id: number): Promise<LeaveRequest | null>;
  /** Guarded update: resolves null unless the request is still in status `from`. */
  updateLeaveStatus(id: number, from: LeaveStatus, to: LeaveStatus, approverId: number | null): Promise<LeaveRequest | null>;
  listLeaveRequestsForEmployee(employeeId: number, statuses?: LeaveStatus[]): Promise<LeaveRequest[]>;
  /** Approved requests by members of `department` that overlap the window. */
  listApprovedLeaveInDepartment(department: string, window: DateWindow): Promise<LeaveRequest[]>;

  // ── Salary ────────────────────────────────────────────────────────────────
  /** Active records for the employee, newest month first, limited to `months` entries. */
  listSalaryHistory(employeeId: number, months: number, before: IsoMonth): Promise<SalaryRecord[]>;
  getActiveSalaryRecord(employeeId: number, month: IsoMonth): Promise<SalaryRecord | null>;
  /**
   * Insert as the active record for its month. Any record already active for
   * the same (employee, month) is deactivated and pointed at the new one.
   */
  createSalaryRecord(record: NewSalaryRecord): Promise<SalaryRecord>;

  // ── Supporting history ────────────────────────────────────────────────────
  listRatings(employeeId: number, fromMonth: IsoMonth, toMonth: IsoMonth): Promise<PerformanceRating[]>;
  listRoleChanges(employeeId: number, fromMonth: IsoMonth, toMonth: IsoMonth): Promise<RoleChange[]>;

  // ── Notifications ─────────────────────────────────────────────────────────
  createNotification(employeeId: number, type: string, message: string): Promise<Notification>;
}
