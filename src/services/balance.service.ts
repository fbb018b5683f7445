import { Employee } from '../types';
import { LedgerStore } from '../store/ledger.store';
import {
  AlreadyAppliedError,
  ConflictError,
  InsufficientBalanceError,
  NotAppliedError,
  NotFoundError,
} from '../errors/workflow';
import { KeyedLock } from '../utils/lock';

const MAX_CAS_ATTEMPTS = 5;

/** Extra writes that must commit together with the balance change. */
export type LedgerHook = (tx: LedgerStore) => Promise<void>;

/**
 * Leave Balance Ledger.
 *
 * Owns `leave_balance`: every change goes through `apply` or `reverse`, runs
 * under a per-employee lock, and writes the balance and the applied-set row in
 * one store transaction. The balance update itself is a compare-and-update, so
 * writers in other processes are caught as well.
 */
export class LeaveBalanceLedger {
  constructor(
    private readonly store: LedgerStore,
    private readonly lock: KeyedLock = new KeyedLock()
  ) {}

  reserveCheck(employee: Employee, days: number): boolean {
    return employee.leave_balance >= days;
  }

  /**
   * Deduct `days` for `leaveRequestId`. A request already in the applied set
   * fails with `AlreadyApplied` and changes nothing.
   */
  async apply(employeeId: number, leaveRequestId: number, days: number, within?: LedgerHook): Promise<Employee> {
    const updated = await this.lock.run(`employee:${employeeId}`, () =>
      this.store.transaction(async (tx) => {
        if (await tx.isLeaveApplied(leaveRequestId)) {
          throw new AlreadyAppliedError(leaveRequestId);
        }
        const employee = await this.adjust(tx, employeeId, -days);
        await tx.insertLeaveApplication(leaveRequestId, employeeId, days);
        if (within) await within(tx);
        return employee;
      })
    );

    console.log(`[Ledger] Deducted ${days} day(s) for leave #${leaveRequestId}; employee #${employeeId} now has ${updated.leave_balance}`);
    return updated;
  }

  /**
   * Credit `days` back for a request that was applied earlier.
   */
  async reverse(employeeId: number, leaveRequestId: number, days: number, within?: LedgerHook): Promise<Employee> {
    const updated = await this.lock.run(`employee:${employeeId}`, () =>
      this.store.transaction(async (tx) => {
        if (!(await tx.isLeaveApplied(leaveRequestId))) {
          throw new NotAppliedError(leaveRequestId);
        }
        const employee = await this.adjust(tx, employeeId, days);
        await tx.deleteLeaveApplication(leaveRequestId);
        if (within) await within(tx);
        return employee;
      })
    );

    console.log(`[Ledger] Credited ${days} day(s) back for leave #${leaveRequestId}; employee #${employeeId} now has ${updated.leave_balance}`);
    return updated;
  }

  private async adjust(tx: LedgerStore, employeeId: number, delta: number): Promise<Employee> {
    for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
      const employee = await tx.getEmployee(employeeId);
      if (!employee) throw new NotFoundError('Employee', employeeId);

      const next = employee.leave_balance + delta;
      if (next < 0) {
        throw new InsufficientBalanceError(-delta, employee.leave_balance);
      }
      if (await tx.updateEmployeeBalance(employeeId, next, employee.leave_balance)) {
        return { ...employee, leave_balance: next };
      }
      console.warn(`[Ledger] Balance for employee #${employeeId} changed underneath us (attempt ${attempt})`);
    }
    throw new ConflictError(`Could not update the balance of employee #${employeeId}; try again`);
  }
}
