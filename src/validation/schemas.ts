import { z } from 'zod';
import { isIsoDate, isIsoMonth } from '../utils/helpers';

export const isoDate = z.string().refine(isIsoDate, 'must be a YYYY-MM-DD date');
export const isoMonth = z.string().refine(isIsoMonth, 'must be a YYYY-MM month');

export const idParam = z.object({ id: z.coerce.number().int().positive() });

export const recordAttendanceBody = z.object({
  employee_id: z.number().int().positive(),
  date: isoDate,
  status: z.enum(['present', 'absent', 'late']),
});

export const reviewDecisionBody = z.object({
  decision: z.enum(['approved', 'rejected']),
});

export const submitLeaveBody = z.object({
  employee_id: z.number().int().positive(),
  leave_type: z.enum(['annual', 'sick', 'casual', 'unpaid']),
  start_date: isoDate,
  end_date: isoDate,
  reason: z.string().max(500).optional(),
});

export const leaveDecisionBody = z.object({
  decision: z.enum(['approved', 'rejected']),
});

export const salaryBody = z.object({
  employee_id: z.number().int().positive(),
  month: isoMonth,
  basic_salary: z.number().nonnegative(),
  deductions: z.number().optional(),
});
