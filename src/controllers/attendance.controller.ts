import { Request, Response } from 'express';
import { callerFrom } from '../middleware/caller';
import { recordAttendance, reviewAttendance } from '../services/attendance.service';
import { WorkflowContext } from '../services/context';
import { idParam, recordAttendanceBody, reviewDecisionBody } from '../validation/schemas';
import { sendResult } from './respond';

export function attendanceController(ctx: WorkflowContext) {
  // ─── Record ────────────────────────────────────────────────────────────────

  async function record(req: Request, res: Response) {
    const caller = callerFrom(req);
    const body = recordAttendanceBody.parse(req.body);

    const result = await recordAttendance(
      ctx,
      { employeeId: body.employee_id, date: body.date, status: body.status },
      caller
    );
    sendResult(res, result, 201);
  }

  // ─── Review ────────────────────────────────────────────────────────────────

  async function review(req: Request, res: Response) {
    const caller = callerFrom(req);
    const { id } = idParam.parse(req.params);
    const { decision } = reviewDecisionBody.parse(req.body);

    sendResult(res, await reviewAttendance(ctx, id, decision, caller.id, caller));
  }

  return { record, review };
}
