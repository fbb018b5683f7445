import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { withTransaction } from '../config/database';
import { AlreadyAppliedError, DuplicateRecordError } from '../errors/workflow';
import {
  AttendanceFlagReason,
  AttendanceRecord,
  Employee,
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
} from '../types';
import { DateWindow, LedgerStore } from './ledger.store';

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}

/**
 * PostgreSQL-backed store. Outside a transaction every call runs on the pool;
 * inside one, every call runs on the transaction's client.
 */
export class PgLedgerStore implements LedgerStore {
  constructor(
    private readonly pool: Pool,
    private readonly client: PoolClient | null = null
  ) {}

  private query<R extends QueryResultRow>(text: string, values: unknown[] = []): Promise<QueryResult<R>> {
    return this.client ? this.client.query<R>(text, values) : this.pool.query<R>(text, values);
  }

  async transaction<T>(fn: (tx: LedgerStore) => Promise<T>): Promise<T> {
    if (this.client) return fn(this);
    return withTransaction((client) => fn(new PgLedgerStore(this.pool, client)), this.pool);
  }

  // ─── Employees ─────────────────────────────────────────────────────────────

  async getEmployee(id: number): Promise<Employee | null> {
    const result = await this.query<Employee>(
      'SELECT id, name, role, department, leave_balance FROM employees WHERE id = $1',
      [id]
    );
    return result.rows[0] || null;
  }

  async listDepartmentMembers(department: string): Promise<Employee[]> {
    const result = await this.query<Employee>(
      'SELECT id, name, role, department, leave_balance FROM employees WHERE department = $1 ORDER BY id',
      [department]
    );
    return result.rows;
  }

  async updateEmployeeBalance(id: number, newBalance: number, expectedBalance: number): Promise<boolean> {
    const result = await this.query(
      'UPDATE employees SET leave_balance = $2 WHERE id = $1 AND leave_balance = $3',
      [id, newBalance, expectedBalance]
    );
    return (result.rowCount ?? 0) > 0;
  }

  // ─── Applied set ───────────────────────────────────────────────────────────

  async isLeaveApplied(leaveRequestId: number): Promise<boolean> {
    const result = await this.query('SELECT 1 FROM leave_applications WHERE leave_request_id = $1', [leaveRequestId]);
    return result.rows.length > 0;
  }

  async insertLeaveApplication(leaveRequestId: number, employeeId: number, days: number): Promise<void> {
    try {
      await this.query(
        'INSERT INTO leave_applications (leave_request_id, employee_id, days) VALUES ($1, $2, $3)',
        [leaveRequestId, employeeId, days]
      );
    } catch (err) {
      if (isUniqueViolation(err)) throw new AlreadyAppliedError(leaveRequestId);
      throw err;
    }
  }

  async deleteLeaveApplication(leaveRequestId: number): Promise<boolean> {
    const result = await this.query('DELETE FROM leave_applications WHERE leave_request_id = $1', [leaveRequestId]);
    return (result.rowCount ?? 0) > 0;
  }

  // ─── Attendance ────────────────────────────────────────────────────────────

  async createAttendanceRecord(record: NewAttendanceRecord): Promise<AttendanceRecord> {
    try {
      const result = await this.query<AttendanceRecord>(
        `INSERT INTO attendance_records (
          employee_id, date, status, review_status, recorded_by, anomaly_score, anomaly_reason
        ) VALUES ($1, $2, $3, $4, $5, $6, $7)
        RETURNING *`,
        [
          record.employee_id, record.date, record.status, record.review_status,
          record.recorded_by, record.anomaly_score, record.anomaly_reason,
        ]
      );
      const created = result.rows[0];
      if (!created) throw new Error('Attendance insert returned no row');
      return created;
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateRecordError(record.employee_id, record.date);
      throw err;
    }
  }

  async getAttendanceRecord(id: number): Promise<AttendanceRecord | null> {
    const result = await this.query<AttendanceRecord>('SELECT * FROM attendance_records WHERE id = $1', [id]);
    return result.rows[0] || null;
  }

  async updateAttendanceReview(id: number, decision: ReviewDecision, reviewerId: number): Promise<AttendanceRecord | null> {
    const result = await this.query<AttendanceRecord>(
      `UPDATE attendance_records
       SET review_status = $2, reviewed_by = $3, reviewed_at = NOW()
       WHERE id = $1 AND review_status = 'pending'
       RETURNING *`,
      [id, decision, reviewerId]
    );
    return result.rows[0] || null;
  }

  async updateAttendanceScore(
    id: number,
    score: number,
    reason: AttendanceFlagReason,
    reviewStatus: 'none' | 'pending'
  ): Promise<void> {
    // The status guard keeps a concurrent human review from being overwritten.
    await this.query(
      `UPDATE attendance_records
       SET anomaly_score = $2, anomaly_reason = $3, review_status = $4
       WHERE id = $1 AND review_status IN ('none', 'pending')`,
      [id, score, reason, reviewStatus]
    );
  }

  async listAttendanceInWindow(employeeId: number, window: DateWindow): Promise<AttendanceRecord[]> {
    const result = await this.query<AttendanceRecord>(
      `SELECT * FROM attendance_records
       WHERE employee_id = $1 AND date BETWEEN $2 AND $3
       ORDER BY date`,
      [employeeId, window.start, window.end]
    );
    return result.rows;
  }

  async listAttendanceForRescore(window: DateWindow): Promise<AttendanceRecord[]> {
    const result = await this.query<AttendanceRecord>(
      `SELECT * FROM attendance_records
       WHERE review_status IN ('none', 'pending') AND date BETWEEN $1 AND $2
       ORDER BY id`,
      [window.start, window.end]
    );
    return result.rows;
  }

  // ─── Leave ─────────────────────────────────────────────────────────────────

  async createLeaveRequest(request: NewLeaveRequest): Promise<LeaveRequest> {
    const result = await this.query<LeaveRequest>(
      `INSERT INTO leave_requests (
        employee_id, leave_type, start_date, end_date, days, reason,
        recommendation_score, recommendation_label, recommendation_reasons
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING *`,
      [
        request.employee_id, request.leave_type, request.start_date, request.end_date,
        request.days, request.reason, request.recommendation_score,
        request.recommendation_label, JSON.stringify(request.recommendation_reasons),
      ]
    );
    const created = result.rows[0];
    if (!created) throw new Error('Leave request insert returned no row');
    return created;
  }

  async getLeaveRequest(id: number): Promise<LeaveRequest | null> {
    const result = await this.query<LeaveRequest>('SELECT * FROM leave_requests WHERE id = $1', [id]);
    return result.rows[0] || null;
  }

  async updateLeaveStatus(
    id: number,
    from: LeaveStatus,
    to: LeaveStatus,
    approverId: number | null
  ): Promise<LeaveRequest | null> {
    const result = await this.query<LeaveRequest>(
      `UPDATE leave_requests
       SET status = $3, approver_id = COALESCE($4, approver_id), decided_at = NOW()
       WHERE id = $1 AND status = $2
       RETURNING *`,
      [id, from, to, approverId]
    );
    return result.rows[0] || null;
  }

  async listLeaveRequestsForEmployee(employeeId: number, statuses?: LeaveStatus[]): Promise<LeaveRequest[]> {
    const result = statuses
      ? await this.query<LeaveRequest>(
        'SELECT * FROM leave_requests WHERE employee_id = $1 AND status = ANY($2) ORDER BY start_date',
        [employeeId, statuses]
      )
      : await this.query<LeaveRequest>(
        'SELECT * FROM leave_requests WHERE employee_id = $1 ORDER BY start_date',
        [employeeId]
      );
    return result.rows;
  }

  async listApprovedLeaveInDepartment(department: string, window: DateWindow): Promise<LeaveRequest[]> {
    const result = await this.query<LeaveRequest>(
      `SELECT lr.* FROM leave_requests lr
       JOIN employees e ON lr.employee_id = e.id
       WHERE e.department = $1
         AND lr.status = 'approved'
         AND lr.start_date <= $3
         AND lr.end_date >= $2`,
      [department, window.start, window.end]
    );
    return result.rows;
  }

  // ─── Salary ────────────────────────────────────────────────────────────────

  async listSalaryHistory(employeeId: number, months: number, before: IsoMonth): Promise<SalaryRecord[]> {
    const result = await this.query<SalaryRecord>(
      `SELECT * FROM salary_records
       WHERE employee_id = $1 AND active AND month < $2
       ORDER BY month DESC
       LIMIT $3`,
      [employeeId, before, months]
    );
    return result.rows;
  }

  async getActiveSalaryRecord(employeeId: number, month: IsoMonth): Promise<SalaryRecord | null> {
    const result = await this.query<SalaryRecord>(
      'SELECT * FROM salary_records WHERE employee_id = $1 AND month = $2 AND active',
      [employeeId, month]
    );
    return result.rows[0] || null;
  }

  async createSalaryRecord(record: NewSalaryRecord): Promise<SalaryRecord> {
    if (!this.client) {
      return withTransaction((client) => new PgLedgerStore(this.pool, client).createSalaryRecord(record), this.pool);
    }

    // The partial unique index admits one active row per month, so the old
    // row is switched off before the insert and linked to its successor after.
    const previous = await this.query<{ id: number }>(
      `UPDATE salary_records SET active = FALSE
       WHERE employee_id = $1 AND month = $2 AND active
       RETURNING id`,
      [record.employee_id, record.month]
    );

    const result = await this.query<SalaryRecord>(
      `INSERT INTO salary_records (
        employee_id, month, basic_salary, deductions, net_pay, anomaly_flag, anomaly_summary
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING *`,
      [
        record.employee_id, record.month, record.basic_salary, record.deductions,
        record.net_pay, record.anomaly_flag, record.anomaly_summary,
      ]
    );
    const created = result.rows[0];
    if (!created) throw new Error('Salary insert returned no row');

    const previousIds = previous.rows.map((row) => row.id);
    if (previousIds.length > 0) {
      await this.query('UPDATE salary_records SET superseded_by = $1 WHERE id = ANY($2)', [created.id, previousIds]);
    }
    return created;
  }

  // ─── Supporting history ────────────────────────────────────────────────────

  async listRatings(employeeId: number, fromMonth: IsoMonth, toMonth: IsoMonth): Promise<PerformanceRating[]> {
    const result = await this.query<PerformanceRating>(
      `SELECT employee_id, month, rating FROM performance_ratings
       WHERE employee_id = $1 AND month BETWEEN $2 AND $3
       ORDER BY month`,
      [employeeId, fromMonth, toMonth]
    );
    return result.rows;
  }

  async listRoleChanges(employeeId: number, fromMonth: IsoMonth, toMonth: IsoMonth): Promise<RoleChange[]> {
    const result = await this.query<RoleChange>(
      `SELECT employee_id, effective_month, from_role, to_role FROM role_changes
       WHERE employee_id = $1 AND effective_month BETWEEN $2 AND $3
       ORDER BY effective_month`,
      [employeeId, fromMonth, toMonth]
    );
    return result.rows;
  }

  // ─── Notifications ─────────────────────────────────────────────────────────

  async createNotification(employeeId: number, type: string, message: string): Promise<Notification> {
    const result = await this.query<Notification>(
      `INSERT INTO notifications (employee_id, type, message)
       VALUES ($1, $2, $3)
       RETURNING id, employee_id, type, message, created_at`,
      [employeeId, type, message]
    );
    const created = result.rows[0];
    if (!created) throw new Error('Notification insert returned no row');
    return created;
  }
}
