import { ErrorKind, WorkflowError } from '../errors/workflow';

export type WorkflowResult<T, A = never> =
  | { success: true; data: T; advisory?: A }
  | { success: false; error: ErrorKind; message: string };

export interface WorkflowOutcome<T, A> {
  data: T;
  advisory?: A;
}

/**
 * Run a workflow step and turn a `WorkflowError` into a failure result.
 * Anything else is a bug or an infrastructure failure and is rethrown.
 */
export async function runWorkflow<T, A = never>(
  fn: () => Promise<WorkflowOutcome<T, A>>
): Promise<WorkflowResult<T, A>> {
  try {
    const outcome = await fn();
    return { success: true, ...outcome };
  } catch (err) {
    if (err instanceof WorkflowError) {
      return { success: false, error: err.kind, message: err.message };
    }
    throw err;
  }
}
