import { Request, Response } from 'express';
import { callerFrom } from '../middleware/caller';
import { WorkflowContext } from '../services/context';
import { recordSalary, SalaryInput, scoreSalary } from '../services/salary.service';
import { salaryBody } from '../validation/schemas';
import { sendResult } from './respond';

function salaryInput(req: Request): SalaryInput {
  const body = salaryBody.parse(req.body);
  return {
    employeeId: body.employee_id,
    month: body.month,
    basicSalary: body.basic_salary,
    deductions: body.deductions,
  };
}

export function salaryController(ctx: WorkflowContext) {
  /** Dry run: the assessment and payslip summary, nothing stored. */
  async function score(req: Request, res: Response) {
    const caller = callerFrom(req);
    sendResult(res, await scoreSalary(ctx, salaryInput(req), caller));
  }

  async function record(req: Request, res: Response) {
    const caller = callerFrom(req);
    sendResult(res, await recordSalary(ctx, salaryInput(req), caller), 201);
  }

  return { score, record };
}
