import { Caller, IsoDate, LeaveDecision, LeaveRecommendation, LeaveRequest, LeaveType } from '../types';
import { recommendLeave } from '../engine/leave.scorer';
import {
  AlreadyAppliedError,
  ForbiddenError,
  InsufficientBalanceError,
  InvalidDateRangeError,
  InvalidTransitionError,
  NotFoundError,
  OverlappingRequestError,
} from '../errors/workflow';
import { LedgerStore } from '../store/ledger.store';
import { requireCapability } from '../utils/capabilities';
import { addDays, datesOverlap, inclusiveDayCount, monthOf } from '../utils/helpers';
import { WorkflowContext } from './context';
import { runWorkflow, WorkflowResult } from './result';

export interface SubmitLeaveInput {
  employeeId: number;
  leaveType: LeaveType;
  startDate: IsoDate;
  endDate: IsoDate;
  reason?: string;
}

async function requireLeaveRequest(store: LedgerStore, id: number): Promise<LeaveRequest> {
  const request = await store.getLeaveRequest(id);
  if (!request) throw new NotFoundError('Leave request', id);
  return request;
}

/**
 * Guarded status move inside the ledger transaction. Throwing here rolls the
 * balance change back together with the status.
 */
async function moveStatus(
  tx: LedgerStore,
  request: LeaveRequest,
  from: LeaveRequest['status'],
  to: LeaveRequest['status'],
  approverId: number | null
): Promise<void> {
  const moved = await tx.updateLeaveStatus(request.id, from, to, approverId);
  if (!moved) {
    const current = await requireLeaveRequest(tx, request.id);
    throw new InvalidTransitionError('leave request', request.id, current.status, to);
  }
}

// ─── Submit ──────────────────────────────────────────────────────────────────

/**
 * Create a pending leave request. The balance check here is a pre-check
 * only; nothing is reserved, and the balance is checked again at approval.
 */
export function submitLeave(
  ctx: WorkflowContext,
  input: SubmitLeaveInput,
  caller: Caller
): Promise<WorkflowResult<LeaveRequest, LeaveRecommendation>> {
  return runWorkflow(async () => {
    if (caller.id !== input.employeeId) {
      requireCapability(caller, 'leave:submit_for_others');
    }
    if (input.endDate < input.startDate) {
      throw new InvalidDateRangeError(input.startDate, input.endDate);
    }

    const employee = await ctx.store.getEmployee(input.employeeId);
    if (!employee) throw new NotFoundError('Employee', input.employeeId);

    // Serialized per employee so two overlapping submissions cannot both pass the check.
    return ctx.locks.run(`leave-submit:${employee.id}`, async () => {
      const open = await ctx.store.listLeaveRequestsForEmployee(employee.id, ['pending', 'approved']);
      const clash = open.find((r) => datesOverlap(r.start_date, r.end_date, input.startDate, input.endDate));
      if (clash) {
        throw new OverlappingRequestError(input.startDate, input.endDate, clash.id);
      }

      const days = inclusiveDayCount(input.startDate, input.endDate);
      if (!ctx.ledger.reserveCheck(employee, days)) {
        throw new InsufficientBalanceError(days, employee.leave_balance);
      }

      // ── Recommendation inputs, anchored on the start date so retries score the same ──
      const lookbackStart = addDays(input.startDate, -ctx.config.approvalLookbackDays);
      const history = (await ctx.store.listLeaveRequestsForEmployee(employee.id)).filter(
        (r) => r.start_date >= lookbackStart && r.start_date < input.startDate
      );
      const members = await ctx.store.listDepartmentMembers(employee.department);
      const departmentLeave = await ctx.store.listApprovedLeaveInDepartment(employee.department, {
        start: input.startDate,
        end: input.endDate,
      });
      const ratings = await ctx.store.listRatings(employee.id, monthOf(lookbackStart), monthOf(input.startDate));

      const recommendation = recommendLeave(
        {
          employee,
          request: { start_date: input.startDate, end_date: input.endDate, days },
          history,
          departmentLeave,
          departmentSize: members.length,
          ratings,
        },
        ctx.config
      );

      const leaveRequest = await ctx.store.createLeaveRequest({
        employee_id: employee.id,
        leave_type: input.leaveType,
        start_date: input.startDate,
        end_date: input.endDate,
        days,
        reason: input.reason ?? null,
        recommendation_score: recommendation.score,
        recommendation_label: recommendation.label,
        recommendation_reasons: recommendation.reasons,
      });

      ctx.events.emitWorkflowEvent({ type: 'leave.submitted', leaveRequest, actor_id: caller.id });
      return { data: leaveRequest, advisory: recommendation };
    });
  });
}

// ─── Decide ──────────────────────────────────────────────────────────────────

/**
 * Approve or reject a pending request. Approval deducts the balance and moves
 * the status in one transaction; if the balance no longer covers the request
 * the call fails with `InsufficientBalance` and the request stays pending.
 */
export function decideLeave(
  ctx: WorkflowContext,
  requestId: number,
  decision: LeaveDecision,
  approverId: number,
  caller: Caller
): Promise<WorkflowResult<LeaveRequest>> {
  return runWorkflow(async () => {
    requireCapability(caller, 'leave:decide');

    const request = await requireLeaveRequest(ctx.store, requestId);
    if (request.status !== 'pending') {
      throw new InvalidTransitionError('leave request', request.id, request.status, decision);
    }
    if (request.employee_id === approverId || request.employee_id === caller.id) {
      throw new ForbiddenError('Cannot decide your own leave request');
    }

    if (decision === 'rejected') {
      await moveStatus(ctx.store, request, 'pending', 'rejected', approverId);
    } else {
      try {
        await ctx.ledger.apply(request.employee_id, request.id, request.days, (tx) =>
          moveStatus(tx, request, 'pending', 'approved', approverId)
        );
      } catch (err) {
        if (!(err instanceof AlreadyAppliedError)) throw err;
        // The days are already deducted; only the status may still need to catch up.
        console.warn(`[LeaveService] Leave #${request.id} was already applied; not deducting again`);
        await moveStatus(ctx.store, request, 'pending', 'approved', approverId);
      }
    }

    const decided = await requireLeaveRequest(ctx.store, request.id);
    ctx.events.emitWorkflowEvent({
      type: decision === 'approved' ? 'leave.approved' : 'leave.rejected',
      leaveRequest: decided,
      actor_id: caller.id,
    });
    return { data: decided };
  });
}

// ─── Revoke ──────────────────────────────────────────────────────────────────

/**
 * HR-only reversal of an approved request: credits the days back and moves
 * the request to the terminal `revoked` status.
 */
export function revokeLeave(
  ctx: WorkflowContext,
  requestId: number,
  caller: Caller
): Promise<WorkflowResult<LeaveRequest>> {
  return runWorkflow(async () => {
    requireCapability(caller, 'leave:revoke');

    const request = await requireLeaveRequest(ctx.store, requestId);
    if (request.status !== 'approved') {
      throw new InvalidTransitionError('leave request', request.id, request.status, 'revoked');
    }

    await ctx.ledger.reverse(request.employee_id, request.id, request.days, (tx) =>
      moveStatus(tx, request, 'approved', 'revoked', caller.id)
    );

    const revoked = await requireLeaveRequest(ctx.store, request.id);
    ctx.events.emitWorkflowEvent({ type: 'leave.revoked', leaveRequest: revoked, actor_id: caller.id });
    return { data: revoked };
  });
}
