export type ErrorKind =
  | 'DuplicateRecord'
  | 'InvalidTransition'
  | 'Forbidden'
  | 'InsufficientBalance'
  | 'AlreadyApplied'
  | 'OverlappingRequest'
  | 'NotApplied'
  | 'ConfigurationError'
  | 'NotFound'
  | 'InvalidDateRange'
  | 'InvalidAmount'
  | 'Conflict';

export class WorkflowError extends Error {
  constructor(
    message: string,
    public kind: ErrorKind
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

export class DuplicateRecordError extends WorkflowError {
  constructor(employeeId: number, date: string) {
    super(`Attendance for employee #${employeeId} on ${date} is already recorded`, 'DuplicateRecord');
    this.name = 'DuplicateRecordError';
  }
}

export class InvalidTransitionError extends WorkflowError {
  constructor(entity: string, id: number, from: string, to: string) {
    super(`Cannot move ${entity} #${id} from "${from}" to "${to}"`, 'InvalidTransition');
    this.name = 'InvalidTransitionError';
  }
}

export class ForbiddenError extends WorkflowError {
  constructor(message: string) {
    super(message, 'Forbidden');
    this.name = 'ForbiddenError';
  }
}

export class InsufficientBalanceError extends WorkflowError {
  constructor(required: number, available: number) {
    super(`Insufficient leave balance. Required: ${required}, Available: ${available}`, 'InsufficientBalance');
    this.name = 'InsufficientBalanceError';
  }
}

export class AlreadyAppliedError extends WorkflowError {
  constructor(leaveRequestId: number) {
    super(`Leave request #${leaveRequestId} has already been applied to the balance`, 'AlreadyApplied');
    this.name = 'AlreadyAppliedError';
  }
}

export class OverlappingRequestError extends WorkflowError {
  constructor(startDate: string, endDate: string, existingId: number) {
    super(
      `Leave from ${startDate} to ${endDate} overlaps with existing request #${existingId}`,
      'OverlappingRequest'
    );
    this.name = 'OverlappingRequestError';
  }
}

export class NotAppliedError extends WorkflowError {
  constructor(leaveRequestId: number) {
    super(`Leave request #${leaveRequestId} was never applied to the balance`, 'NotApplied');
    this.name = 'NotAppliedError';
  }
}

export class ConfigurationError extends WorkflowError {
  constructor(message: string) {
    super(message, 'ConfigurationError');
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends WorkflowError {
  constructor(entity: string, id: number) {
    super(`${entity} #${id} not found`, 'NotFound');
    this.name = 'NotFoundError';
  }
}

export class InvalidDateRangeError extends WorkflowError {
  constructor(startDate: string, endDate: string) {
    super(`End date ${endDate} is before start date ${startDate}`, 'InvalidDateRange');
    this.name = 'InvalidDateRangeError';
  }
}

export class InvalidAmountError extends WorkflowError {
  constructor(message: string) {
    super(message, 'InvalidAmount');
    this.name = 'InvalidAmountError';
  }
}

export class ConflictError extends WorkflowError {
  constructor(message: string) {
    super(message, 'Conflict');
    this.name = 'ConflictError';
  }
}
