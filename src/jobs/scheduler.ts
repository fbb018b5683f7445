import cron from 'node-cron';
import { ConfigurationError } from '../errors/workflow';
import { rescoreAttendance } from '../services/attendance.service';
import { WorkflowContext } from '../services/context';

export const DEFAULT_RESCORE_CRON = '15 2 * * *';

export interface ScheduledJobs {
  /** Stop the schedule and abort a re-scoring run that is still going. */
  stop(): void;
}

/**
 * Nightly attendance re-scoring.
 *
 * Re-runs the flagger over the last window of undecided records so that
 * entries recorded out of order are judged against their full history.
 * Overlapping runs are skipped rather than queued.
 */
export function startScheduledJobs(
  ctx: WorkflowContext,
  expression: string = process.env.RESCORE_CRON || DEFAULT_RESCORE_CRON
): ScheduledJobs {
  if (!cron.validate(expression)) {
    throw new ConfigurationError(`RESCORE_CRON is not a valid cron expression: "${expression}"`);
  }

  let running: AbortController | null = null;

  const task = cron.schedule(expression, async () => {
    if (running) {
      console.warn('[Scheduler] Previous attendance re-scoring still running; skipping this tick');
      return;
    }
    running = new AbortController();
    console.log('[Scheduler] Running attendance re-scoring...');
    try {
      const summary = await rescoreAttendance(ctx, { signal: running.signal });
      console.log(
        `[Scheduler] Re-scored ${summary.scanned} record(s), ${summary.flagged} newly flagged${summary.aborted ? ' (aborted)' : ''}`
      );
    } catch (err) {
      console.error('[Scheduler] Error re-scoring attendance:', err);
    } finally {
      running = null;
    }
  });

  console.log(`[Scheduler] Scheduled jobs started (attendance re-scoring at "${expression}")`);

  return {
    stop() {
      task.stop();
      running?.abort();
    },
  };
}
