import { EventEmitter } from 'events';
import { WorkflowEvent, WorkflowEventOf, WorkflowEventType } from '../types';

function subjectOf(event: WorkflowEvent): string {
  switch (event.type) {
    case 'attendance.flagged':
    case 'attendance.reviewed':
      return `attendance #${event.record.id}`;
    case 'salary.flagged':
      return `salary record #${event.salaryRecord.id}`;
    default:
      return `leave #${event.leaveRequest.id}`;
  }
}

/**
 * Event bus for record lifecycle events.
 *
 * Handlers run after the state change has been committed and never block the
 * caller. Each handler catches its own errors, so one failing handler does
 * not stop the others and never rolls back the transition that raised it.
 */
export class WorkflowEventBus extends EventEmitter {
  emitWorkflowEvent(event: WorkflowEvent) {
    console.log(`[EventBus] Emitting ${event.type} for ${subjectOf(event)}`);
    this.emit(event.type, event);
  }

  /**
   * Register a handler that runs asynchronously and catches its own errors.
   */
  onWorkflowEvent<K extends WorkflowEventType>(
    eventType: K,
    handler: (event: WorkflowEventOf<K>) => Promise<void>
  ) {
    this.on(eventType, (event: WorkflowEventOf<K>) => {
      handler(event).catch((err: unknown) => {
        console.error(
          `[EventBus] Handler failed for ${eventType} on ${subjectOf(event)}:`,
          err instanceof Error ? err.message : err
        );
      });
    });
  }
}

export const workflowEventBus = new WorkflowEventBus();
