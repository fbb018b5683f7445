import {
  AttendanceFlagReason,
  AttendanceRecord,
  Employee,
  IsoMonth,
  LeaveApplication,
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
} from '../types';
import { AlreadyAppliedError, DuplicateRecordError, NotFoundError } from '../errors/workflow';
import { datesOverlap } from '../utils/helpers';
import { KeyedLock } from '../utils/lock';
import { DateWindow, LedgerStore } from './ledger.store';

interface MemoryState {
  employees: Employee[];
  attendance: AttendanceRecord[];
  leaveRequests: LeaveRequest[];
  applications: LeaveApplication[];
  salaries: SalaryRecord[];
  ratings: PerformanceRating[];
  roleChanges: RoleChange[];
  notifications: Notification[];
  nextId: number;
}

function emptyState(): MemoryState {
  return {
    employees: [],
    attendance: [],
    leaveRequests: [],
    applications: [],
    salaries: [],
    ratings: [],
    roleChanges: [],
    notifications: [],
    nextId: 1,
  };
}

/**
 * In-process `LedgerStore`. Transactions are serialized and roll back by
 * restoring a snapshot taken when they began. Returned records are copies,
 * so callers cannot mutate stored state by accident.
 */
export class MemoryLedgerStore implements LedgerStore {
  constructor(
    private readonly state: MemoryState = emptyState(),
    private readonly txLock: KeyedLock = new KeyedLock(),
    private readonly inTransaction = false
  ) {}

  // ── Seeding (not part of LedgerStore) ──────────────────────────────────────

  addEmployee(employee: Employee): Employee {
    this.state.employees.push({ ...employee });
    this.state.nextId = Math.max(this.state.nextId, employee.id + 1);
    return { ...employee };
  }

  addRating(rating: PerformanceRating): void {
    this.state.ratings.push({ ...rating });
  }

  addRoleChange(change: RoleChange): void {
    this.state.roleChanges.push({ ...change });
  }

  listNotifications(employeeId: number): Notification[] {
    return this.state.notifications.filter((n) => n.employee_id === employeeId).map((n) => ({ ...n }));
  }

  // ── Transactions ───────────────────────────────────────────────────────────

  async transaction<T>(fn: (tx: LedgerStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) return fn(this);

    return this.txLock.run('tx', async () => {
      const snapshot = structuredClone(this.state);
      try {
        return await fn(new MemoryLedgerStore(this.state, this.txLock, true));
      } catch (err) {
        Object.assign(this.state, snapshot);
        throw err;
      }
    });
  }

  // ── Employees ──────────────────────────────────────────────────────────────

  async getEmployee(id: number): Promise<Employee | null> {
    const employee = this.state.employees.find((e) => e.id === id);
    return employee ? { ...employee } : null;
  }

  async listDepartmentMembers(department: string): Promise<Employee[]> {
    return this.state.employees.filter((e) => e.department === department).map((e) => ({ ...e }));
  }

  async updateEmployeeBalance(id: number, newBalance: number, expectedBalance: number): Promise<boolean> {
    const employee = this.state.employees.find((e) => e.id === id);
    if (!employee || employee.leave_balance !== expectedBalance) return false;
    employee.leave_balance = newBalance;
    return true;
  }

  // ── Applied set ────────────────────────────────────────────────────────────

  async isLeaveApplied(leaveRequestId: number): Promise<boolean> {
    return this.state.applications.some((a) => a.leave_request_id === leaveRequestId);
  }

  async insertLeaveApplication(leaveRequestId: number, employeeId: number, days: number): Promise<void> {
    if (await this.isLeaveApplied(leaveRequestId)) {
      throw new AlreadyAppliedError(leaveRequestId);
    }
    this.state.applications.push({
      leave_request_id: leaveRequestId,
      employee_id: employeeId,
      days,
      applied_at: new Date(),
    });
  }

  async deleteLeaveApplication(leaveRequestId: number): Promise<boolean> {
    const before = this.state.applications.length;
    this.state.applications = this.state.applications.filter((a) => a.leave_request_id !== leaveRequestId);
    return this.state.applications.length < before;
  }

  // ── Attendance ─────────────────────────────────────────────────────────────

  async createAttendanceRecord(record: NewAttendanceRecord): Promise<AttendanceRecord> {
    const exists = this.state.attendance.some(
      (a) => a.employee_id === record.employee_id && a.date === record.date
    );
    if (exists) throw new DuplicateRecordError(record.employee_id, record.date);

    const created: AttendanceRecord = {
      id: this.state.nextId++,
      ...record,
      reviewed_by: null,
      reviewed_at: null,
      created_at: new Date(),
    };
    this.state.attendance.push(created);
    return { ...created };
  }

  async getAttendanceRecord(id: number): Promise<AttendanceRecord | null> {
    const record = this.state.attendance.find((a) => a.id === id);
    return record ? { ...record } : null;
  }

  async updateAttendanceReview(id: number, decision: ReviewDecision, reviewerId: number): Promise<AttendanceRecord | null> {
    const record = this.state.attendance.find((a) => a.id === id);
    if (!record || record.review_status !== 'pending') return null;
    record.review_status = decision;
    record.reviewed_by = reviewerId;
    record.reviewed_at = new Date();
    return { ...record };
  }

  async updateAttendanceScore(
    id: number,
    score: number,
    reason: AttendanceFlagReason,
    reviewStatus: 'none' | 'pending'
  ): Promise<void> {
    const record = this.state.attendance.find((a) => a.id === id);
    if (!record) throw new NotFoundError('Attendance record', id);
    if (record.review_status !== 'none' && record.review_status !== 'pending') return;
    record.anomaly_score = score;
    record.anomaly_reason = reason;
    record.review_status = reviewStatus;
  }

  async listAttendanceInWindow(employeeId: number, window: DateWindow): Promise<AttendanceRecord[]> {
    return this.state.attendance
      .filter((a) => a.employee_id === employeeId && a.date >= window.start && a.date <= window.end)
      .sort((a, b) => a.date.localeCompare(b.date))
      .map((a) => ({ ...a }));
  }

  async listAttendanceForRescore(window: DateWindow): Promise<AttendanceRecord[]> {
    return this.state.attendance
      .filter(
        (a) =>
          (a.review_status === 'none' || a.review_status === 'pending') &&
          a.date >= window.start &&
          a.date <= window.end
      )
      .sort((a, b) => a.id - b.id)
      .map((a) => ({ ...a }));
  }

  // ── Leave ──────────────────────────────────────────────────────────────────

  async createLeaveRequest(request: NewLeaveRequest): Promise<LeaveRequest> {
    const created: LeaveRequest = {
      id: this.state.nextId++,
      ...request,
      recommendation_reasons: [...request.recommendation_reasons],
      status: 'pending',
      approver_id: null,
      decided_at: null,
      created_at: new Date(),
    };
    this.state.leaveRequests.push(created);
    return { ...created, recommendation_reasons: [...created.recommendation_reasons] };
  }

  async getLeaveRequest(id: number): Promise<LeaveRequest | null> {
    const request = this.state.leaveRequests.find((r) => r.id === id);
    return request ? { ...request, recommendation_reasons: [...request.recommendation_reasons] } : null;
  }

  async updateLeaveStatus(
    id: number,
    from: LeaveStatus,
    to: LeaveStatus,
    approverId: number | null
  ): Promise<LeaveRequest | null> {
    const request = this.state.leaveRequests.find((r) => r.id === id);
    if (!request || request.status !== from) return null;
    request.status = to;
    if (approverId !== null) request.approver_id = approverId;
    request.decided_at = new Date();
    return { ...request, recommendation_reasons: [...request.recommendation_reasons] };
  }

  async listLeaveRequestsForEmployee(employeeId: number, statuses?: LeaveStatus[]): Promise<LeaveRequest[]> {
    return this.state.leaveRequests
      .filter((r) => r.employee_id === employeeId && (!statuses || statuses.includes(r.status)))
      .sort((a, b) => a.start_date.localeCompare(b.start_date))
      .map((r) => ({ ...r, recommendation_reasons: [...r.recommendation_reasons] }));
  }

  async listApprovedLeaveInDepartment(department: string, window: DateWindow): Promise<LeaveRequest[]> {
    const members = new Set(
      this.state.employees.filter((e) => e.department === department).map((e) => e.id)
    );
    return this.state.leaveRequests
      .filter(
        (r) =>
          members.has(r.employee_id) &&
          r.status === 'approved' &&
          datesOverlap(r.start_date, r.end_date, window.start, window.end)
      )
      .map((r) => ({ ...r, recommendation_reasons: [...r.recommendation_reasons] }));
  }

  // ── Salary ─────────────────────────────────────────────────────────────────

  async listSalaryHistory(employeeId: number, months: number, before: IsoMonth): Promise<SalaryRecord[]> {
    return this.state.salaries
      .filter((s) => s.employee_id === employeeId && s.active && s.month < before)
      .sort((a, b) => b.month.localeCompare(a.month))
      .slice(0, months)
      .map((s) => ({ ...s }));
  }

  async getActiveSalaryRecord(employeeId: number, month: IsoMonth): Promise<SalaryRecord | null> {
    const record = this.state.salaries.find((s) => s.employee_id === employeeId && s.month === month && s.active);
    return record ? { ...record } : null;
  }

  async createSalaryRecord(record: NewSalaryRecord): Promise<SalaryRecord> {
    const created: SalaryRecord = {
      id: this.state.nextId++,
      ...record,
      active: true,
      superseded_by: null,
      created_at: new Date(),
    };
    for (const existing of this.state.salaries) {
      if (existing.employee_id === record.employee_id && existing.month === record.month && existing.active) {
        existing.active = false;
        existing.superseded_by = created.id;
      }
    }
    this.state.salaries.push(created);
    return { ...created };
  }

  // ── Supporting history ─────────────────────────────────────────────────────

  async listRatings(employeeId: number, fromMonth: IsoMonth, toMonth: IsoMonth): Promise<PerformanceRating[]> {
    return this.state.ratings
      .filter((r) => r.employee_id === employeeId && r.month >= fromMonth && r.month <= toMonth)
      .map((r) => ({ ...r }));
  }

  async listRoleChanges(employeeId: number, fromMonth: IsoMonth, toMonth: IsoMonth): Promise<RoleChange[]> {
    return this.state.roleChanges
      .filter((c) => c.employee_id === employeeId && c.effective_month >= fromMonth && c.effective_month <= toMonth)
      .map((c) => ({ ...c }));
  }

  // ── Notifications ──────────────────────────────────────────────────────────

  async createNotification(employeeId: number, type: string, message: string): Promise<Notification> {
    const notification: Notification = {
      id: this.state.nextId++,
      employee_id: employeeId,
      type,
      message,
      created_at: new Date(),
    };
    this.state.notifications.push(notification);
    return { ...notification };
  }
}
