import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG } from '../config/engine';
import { Employee, LeaveRequest, LeaveStatus } from '../types';
import { recommendLeave } from './leave.scorer';

const employee: Employee = { id: 10, name: 'Eli Dev', role: 'employee', department: 'Engineering', leave_balance: 10 };

function leave(id: number, employeeId: number, status: LeaveStatus): LeaveRequest {
  return {
    id,
    employee_id: employeeId,
    leave_type: 'annual',
    start_date: '2024-07-01',
    end_date: '2024-07-02',
    days: 2,
    reason: null,
    status,
    approver_id: null,
    decided_at: null,
    recommendation_score: null,
    recommendation_label: null,
    recommendation_reasons: [],
    created_at: new Date('2024-06-01T00:00:00Z'),
  };
}

const span = { start_date: '2024-07-01', end_date: '2024-07-05', days: 5 };

describe('recommendLeave', () => {
  it('recommends a request with plenty of balance and no history', () => {
    const result = recommendLeave(
      { employee, request: span, history: [], departmentLeave: [], departmentSize: 1, ratings: [] },
      DEFAULT_ENGINE_CONFIG
    );

    expect(result.score).toBe(0.8167);
    expect(result.label).toBe('recommend');
    expect(result.reasons).toEqual([
      'Remaining balance ratio 0.67 (10 day(s) available, 5 requested)',
      'No decided requests in the lookback window',
      'No performance ratings in the lookback window',
      'No colleagues in Engineering',
    ]);
  });

  it('discourages a request when the department is already at capacity', () => {
    const result = recommendLeave(
      {
        employee: { ...employee, leave_balance: 2 },
        request: { start_date: '2024-07-01', end_date: '2024-07-02', days: 2 },
        history: [leave(1, 10, 'approved'), leave(2, 10, 'rejected'), leave(3, 10, 'pending')],
        departmentLeave: [leave(4, 11, 'approved'), leave(5, 11, 'approved'), leave(6, 12, 'approved')],
        departmentSize: 5,
        ratings: [
          { employee_id: 10, month: '2024-05', rating: 4 },
          { employee_id: 10, month: '2024-06', rating: 5 },
        ],
      },
      DEFAULT_ENGINE_CONFIG
    );

    expect(result.score).toBe(0.22);
    expect(result.label).toBe('discourage');
    expect(result.reasons).toEqual([
      'Remaining balance ratio 0.50 (2 day(s) available, 2 requested)',
      'Approved 1 of 2 past request(s)',
      'Average performance rating 4.5 / 5',
      '2 of 4 colleague(s) in Engineering on approved leave during this span (50%, limit 30%)',
      'Department capacity limit reached for this span',
    ]);
  });

  it('cautions when the balance is thin and some colleagues are away', () => {
    const result = recommendLeave(
      {
        employee: { ...employee, leave_balance: 1 },
        request: { start_date: '2024-07-01', end_date: '2024-07-03', days: 3 },
        history: [],
        departmentLeave: [leave(7, 11, 'approved')],
        departmentSize: 11,
        ratings: [],
      },
      DEFAULT_ENGINE_CONFIG
    );

    expect(result.score).toBe(0.6278);
    expect(result.label).toBe('caution');
    expect(result.reasons[3]).toBe(
      '1 of 10 colleague(s) in Engineering on approved leave during this span (10%, limit 30%)'
    );
  });

  it('does not count the employee among colleagues on leave', () => {
    const result = recommendLeave(
      { employee, request: span, history: [], departmentLeave: [leave(8, 10, 'approved')], departmentSize: 3, ratings: [] },
      DEFAULT_ENGINE_CONFIG
    );

    expect(result.reasons[3]).toBe(
      '0 of 2 colleague(s) in Engineering on approved leave during this span (0%, limit 30%)'
    );
  });
});
