import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryLedgerStore } from '../store/memory.store';
import { addEmployee, asEmployee, createHarness, HR, MANAGER, TestHarness, unwrap } from '../test/fixtures';
import { decideLeave, revokeLeave, submitLeave, SubmitLeaveInput } from './leave.service';

function annual(startDate: string, endDate: string, employeeId = 10): SubmitLeaveInput {
  return { employeeId, leaveType: 'annual', startDate, endDate };
}

describe('leave service', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createHarness();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function balanceOf(id: number): Promise<number | undefined> {
    return (await h.store.getEmployee(id))?.leave_balance;
  }

  // ─── submit ─────────────────────────────────────────────────────────────────

  describe('submitLeave', () => {
    it('stores a pending request with its recommendation', async () => {
      addEmployee(h.store, 10, { leave_balance: 10 });

      const { data, advisory } = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-05'), asEmployee(10)));

      expect(data).toMatchObject({ status: 'pending', days: 5, recommendation_score: 0.8167, recommendation_label: 'recommend' });
      expect(advisory?.reasons[0]).toBe('Remaining balance ratio 0.67 (10 day(s) available, 5 requested)');
      expect(await balanceOf(10)).toBe(10);
    });

    it('refuses a request the balance cannot cover and stores nothing', async () => {
      addEmployee(h.store, 10, { leave_balance: 3 });

      const result = await submitLeave(h.ctx, annual('2024-07-01', '2024-07-05'), asEmployee(10));

      expect(result).toEqual({
        success: false,
        error: 'InsufficientBalance',
        message: 'Insufficient leave balance. Required: 5, Available: 3',
      });
      expect(await h.store.listLeaveRequestsForEmployee(10)).toEqual([]);
    });

    it('refuses a request overlapping an open one', async () => {
      addEmployee(h.store, 10);
      const first = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-05'), asEmployee(10)));

      const second = await submitLeave(h.ctx, annual('2024-07-04', '2024-07-08'), asEmployee(10));

      expect(second).toEqual({
        success: false,
        error: 'OverlappingRequest',
        message: `Leave from 2024-07-04 to 2024-07-08 overlaps with existing request #${first.data.id}`,
      });
    });

    it('lets a rejected request be filed again and remembers the rejection', async () => {
      addEmployee(h.store, 10);
      const first = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-02'), asEmployee(10)));
      await decideLeave(h.ctx, first.data.id, 'rejected', MANAGER.id, MANAGER);

      const again = unwrap(await submitLeave(h.ctx, annual('2024-07-02', '2024-07-03'), asEmployee(10)));

      expect(again.advisory?.reasons[1]).toBe('Approved 0 of 1 past request(s)');
    });

    it('refuses a range that ends before it starts', async () => {
      addEmployee(h.store, 10);

      const result = await submitLeave(h.ctx, annual('2024-07-05', '2024-07-01'), asEmployee(10));

      expect(result).toEqual({
        success: false,
        error: 'InvalidDateRange',
        message: 'End date 2024-07-01 is before start date 2024-07-05',
      });
    });

    it('only lets HR file on behalf of someone else', async () => {
      addEmployee(h.store, 10);
      addEmployee(h.store, 11);

      expect(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-02'), asEmployee(11))).toEqual({
        success: false,
        error: 'Forbidden',
        message: 'Role "employee" cannot submit leave for another employee',
      });
      expect((await submitLeave(h.ctx, annual('2024-07-01', '2024-07-02'), HR)).success).toBe(true);
    });

    it('lets only one of two simultaneous overlapping submissions through', async () => {
      addEmployee(h.store, 10);

      const results = await Promise.all([
        submitLeave(h.ctx, annual('2024-07-01', '2024-07-03'), asEmployee(10)),
        submitLeave(h.ctx, annual('2024-07-02', '2024-07-04'), asEmployee(10)),
      ]);

      expect(results.map((r) => (r.success ? 'ok' : r.error))).toEqual(['ok', 'OverlappingRequest']);
    });
  });

  // ─── decide ─────────────────────────────────────────────────────────────────

  describe('decideLeave', () => {
    it('deducts on approval and refuses a second decision', async () => {
      addEmployee(h.store, 10, { leave_balance: 10 });
      const submitted = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-05'), asEmployee(10)));

      const approved = unwrap(await decideLeave(h.ctx, submitted.data.id, 'approved', MANAGER.id, MANAGER));
      expect(approved.data).toMatchObject({ status: 'approved', approver_id: MANAGER.id });
      expect(approved.data.decided_at).toBeInstanceOf(Date);
      expect(await balanceOf(10)).toBe(5);

      const again = await decideLeave(h.ctx, submitted.data.id, 'approved', HR.id, HR);
      expect(again).toEqual({
        success: false,
        error: 'InvalidTransition',
        message: `Cannot move leave request #${submitted.data.id} from "approved" to "approved"`,
      });
      expect(await balanceOf(10)).toBe(5);
    });

    it('rejects without touching the balance', async () => {
      addEmployee(h.store, 10);
      const submitted = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-05'), asEmployee(10)));

      const rejected = unwrap(await decideLeave(h.ctx, submitted.data.id, 'rejected', HR.id, HR));

      expect(rejected.data.status).toBe('rejected');
      expect(await balanceOf(10)).toBe(10);
      expect((await decideLeave(h.ctx, submitted.data.id, 'approved', HR.id, HR)).success).toBe(false);
    });

    it('leaves the request pending when the balance keeps changing underneath', async () => {
      addEmployee(h.store, 10, { leave_balance: 10 });
      const submitted = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-05'), asEmployee(10)));
      vi.spyOn(MemoryLedgerStore.prototype, 'updateEmployeeBalance').mockResolvedValue(false);
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      const result = await decideLeave(h.ctx, submitted.data.id, 'approved', MANAGER.id, MANAGER);

      expect(result).toEqual({
        success: false,
        error: 'Conflict',
        message: 'Could not update the balance of employee #10; try again',
      });
      expect(await h.store.getLeaveRequest(submitted.data.id)).toMatchObject({ status: 'pending', approver_id: null });
      expect(await balanceOf(10)).toBe(10);
      expect(await h.store.isLeaveApplied(submitted.data.id)).toBe(false);
    });

    it('approves exactly one of two concurrent requests the balance can only cover once', async () => {
      addEmployee(h.store, 10, { leave_balance: 6 });
      const a = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-04'), asEmployee(10)));
      const b = unwrap(await submitLeave(h.ctx, annual('2024-08-01', '2024-08-04'), asEmployee(10)));

      const results = await Promise.all([
        decideLeave(h.ctx, a.data.id, 'approved', MANAGER.id, MANAGER),
        decideLeave(h.ctx, b.data.id, 'approved', HR.id, HR),
      ]);

      expect(results.filter((r) => r.success)).toHaveLength(1);
      expect(results.filter((r) => !r.success && r.error === 'InsufficientBalance')).toHaveLength(1);
      expect(await balanceOf(10)).toBe(2);
      const statuses = (await h.store.listLeaveRequestsForEmployee(10)).map((r) => r.status).sort();
      expect(statuses).toEqual(['approved', 'pending']);
    });

    it('does not deduct again for a request already in the applied set', async () => {
      addEmployee(h.store, 10);
      const submitted = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-05'), asEmployee(10)));
      await h.store.insertLeaveApplication(submitted.data.id, 10, 5);

      const result = unwrap(await decideLeave(h.ctx, submitted.data.id, 'approved', MANAGER.id, MANAGER));

      expect(result.data.status).toBe('approved');
      expect(await balanceOf(10)).toBe(10);
    });

    it('forbids deciding your own request', async () => {
      const submitted = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-02', MANAGER.id), MANAGER));

      const result = await decideLeave(h.ctx, submitted.data.id, 'approved', MANAGER.id, MANAGER);

      expect(result).toEqual({ success: false, error: 'Forbidden', message: 'Cannot decide your own leave request' });
    });

    it('requires an approver role', async () => {
      addEmployee(h.store, 10);
      addEmployee(h.store, 11);
      const submitted = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-02'), asEmployee(10)));

      const result = await decideLeave(h.ctx, submitted.data.id, 'approved', 11, asEmployee(11));

      expect(result).toEqual({ success: false, error: 'Forbidden', message: 'Role "employee" cannot decide leave requests' });
    });

    it('reports a missing request', async () => {
      expect(await decideLeave(h.ctx, 404, 'approved', HR.id, HR)).toEqual({
        success: false,
        error: 'NotFound',
        message: 'Leave request #404 not found',
      });
    });

    it('keeps every balance non-negative through a run of submissions and decisions', async () => {
      addEmployee(h.store, 10, { leave_balance: 7 });
      const spans: [string, string][] = [
        ['2024-07-01', '2024-07-03'],
        ['2024-07-10', '2024-07-13'],
        ['2024-07-20', '2024-07-21'],
        ['2024-08-01', '2024-08-05'],
      ];

      for (const [start, end] of spans) {
        const submitted = await submitLeave(h.ctx, annual(start, end), asEmployee(10));
        if (submitted.success) {
          await decideLeave(h.ctx, submitted.data.id, 'approved', MANAGER.id, MANAGER);
        }
        expect(await balanceOf(10)).toBeGreaterThanOrEqual(0);
      }
      expect(await balanceOf(10)).toBe(0);
    });
  });

  // ─── revoke ─────────────────────────────────────────────────────────────────

  describe('revokeLeave', () => {
    it('credits the days back and ends in revoked', async () => {
      addEmployee(h.store, 10, { leave_balance: 10 });
      const submitted = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-05'), asEmployee(10)));
      await decideLeave(h.ctx, submitted.data.id, 'approved', MANAGER.id, MANAGER);

      const revoked = unwrap(await revokeLeave(h.ctx, submitted.data.id, HR));

      expect(revoked.data.status).toBe('revoked');
      expect(await balanceOf(10)).toBe(10);
      expect(await revokeLeave(h.ctx, submitted.data.id, HR)).toMatchObject({ success: false, error: 'InvalidTransition' });
    });

    it('is reserved to HR', async () => {
      expect(await revokeLeave(h.ctx, 1, MANAGER)).toEqual({
        success: false,
        error: 'Forbidden',
        message: 'Role "manager" cannot revoke approved leave',
      });
    });

    it('refuses an approved request whose days were never deducted', async () => {
      addEmployee(h.store, 10);
      const submitted = unwrap(await submitLeave(h.ctx, annual('2024-07-01', '2024-07-05'), asEmployee(10)));
      await h.store.updateLeaveStatus(submitted.data.id, 'pending', 'approved', MANAGER.id);

      const result = await revokeLeave(h.ctx, submitted.data.id, HR);

      expect(result).toMatchObject({ success: false, error: 'NotApplied' });
      expect((await h.store.getLeaveRequest(submitted.data.id))?.status).toBe('approved');
      expect(await balanceOf(10)).toBe(10);
    });
  });
});
