import { Request, Response } from 'express';
import { callerFrom } from '../middleware/caller';
import { WorkflowContext } from '../services/context';
import { decideLeave, revokeLeave, submitLeave } from '../services/leave.service';
import { idParam, leaveDecisionBody, submitLeaveBody } from '../validation/schemas';
import { sendResult } from './respond';

export function leaveController(ctx: WorkflowContext) {
  // ─── Submit ────────────────────────────────────────────────────────────────

  async function submit(req: Request, res: Response) {
    const caller = callerFrom(req);
    const body = submitLeaveBody.parse(req.body);

    const result = await submitLeave(
      ctx,
      {
        employeeId: body.employee_id,
        leaveType: body.leave_type,
        startDate: body.start_date,
        endDate: body.end_date,
        reason: body.reason,
      },
      caller
    );
    sendResult(res, result, 201);
  }

  // ─── Approve / Reject ──────────────────────────────────────────────────────

  async function decide(req: Request, res: Response) {
    const caller = callerFrom(req);
    const { id } = idParam.parse(req.params);
    const { decision } = leaveDecisionBody.parse(req.body);

    sendResult(res, await decideLeave(ctx, id, decision, caller.id, caller));
  }

  // ─── Revoke ────────────────────────────────────────────────────────────────

  async function revoke(req: Request, res: Response) {
    const caller = callerFrom(req);
    const { id } = idParam.parse(req.params);

    sendResult(res, await revokeLeave(ctx, id, caller));
  }

  return { submit, decide, revoke };
}
