import { Response } from 'express';
import { ErrorKind } from '../errors/workflow';
import { WorkflowResult } from '../services/result';
import { ApiResponse } from '../types';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  Forbidden: 403,
  NotFound: 404,
  DuplicateRecord: 409,
  OverlappingRequest: 409,
  InvalidTransition: 409,
  AlreadyApplied: 409,
  NotApplied: 409,
  Conflict: 409,
  InsufficientBalance: 422,
  InvalidDateRange: 400,
  InvalidAmount: 400,
  ConfigurationError: 500,
};

export function statusFor(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/**
 * Send a workflow result in the `ApiResponse` envelope.
 */
export function sendResult<T, A>(res: Response, result: WorkflowResult<T, A>, successStatus = 200): void {
  if (!result.success) {
    const body: ApiResponse = { success: false, error: result.error, message: result.message };
    res.status(statusFor(result.error)).json(body);
    return;
  }
  const body: ApiResponse<T> = { success: true, data: result.data };
  if (result.advisory !== undefined) body.advisory = result.advisory;
  res.status(successStatus).json(body);
}
