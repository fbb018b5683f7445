import { describe, it, expect, beforeEach } from 'vitest';
import { DuplicateRecordError } from '../errors/workflow';
import { MemoryLedgerStore } from './memory.store';

describe('MemoryLedgerStore', () => {
  let store: MemoryLedgerStore;

  beforeEach(() => {
    store = new MemoryLedgerStore();
    store.addEmployee({ id: 10, name: 'Eli Dev', role: 'employee', department: 'Engineering', leave_balance: 10 });
  });

  it('discards every write of a failed transaction', async () => {
    await expect(
      store.transaction(async (tx) => {
        await tx.updateEmployeeBalance(10, 4, 10);
        await tx.insertLeaveApplication(100, 10, 6);
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect((await store.getEmployee(10))?.leave_balance).toBe(10);
    expect(await store.isLeaveApplied(100)).toBe(false);
  });

  it('runs a nested transaction inside the outer one', async () => {
    await store.transaction((tx) => tx.transaction((inner) => inner.updateEmployeeBalance(10, 7, 10)));

    expect((await store.getEmployee(10))?.leave_balance).toBe(7);
  });

  it('only updates the balance when it still holds the expected value', async () => {
    expect(await store.updateEmployeeBalance(10, 5, 9)).toBe(false);
    expect(await store.updateEmployeeBalance(10, 5, 10)).toBe(true);
  });

  it('keeps one attendance record per employee and day', async () => {
    const record = {
      employee_id: 10,
      date: '2024-03-04',
      status: 'present' as const,
      review_status: 'none' as const,
      recorded_by: 2,
      anomaly_score: 0,
      anomaly_reason: 'none' as const,
    };
    await store.createAttendanceRecord(record);

    await expect(store.createAttendanceRecord(record)).rejects.toBeInstanceOf(DuplicateRecordError);
  });

  it('points a superseded salary record at its replacement', async () => {
    const base = { employee_id: 10, month: '2024-06', deductions: 0, anomaly_flag: false, anomaly_summary: '' };
    const first = await store.createSalaryRecord({ ...base, basic_salary: 5000, net_pay: 5000 });
    const second = await store.createSalaryRecord({ ...base, basic_salary: 5200, net_pay: 5200 });

    expect(await store.getActiveSalaryRecord(10, '2024-06')).toMatchObject({ id: second.id, superseded_by: null });
    expect(first.active).toBe(true);
    expect(await store.listSalaryHistory(10, 3, '2024-07')).toEqual([expect.objectContaining({ id: second.id })]);
  });

  it('returns copies that cannot change stored state', async () => {
    const employee = await store.getEmployee(10);
    if (employee) employee.leave_balance = 0;

    expect((await store.getEmployee(10))?.leave_balance).toBe(10);
  });
});
