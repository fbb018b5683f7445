import pool from './config/database';
import { loadEngineConfig } from './config/engine';
import { createApp } from './app';
import { workflowEventBus } from './events/emitter';
import { registerAllHandlers } from './events/register';
import { startScheduledJobs } from './jobs/scheduler';
import { createWorkflowContext } from './services/context';
import { PgLedgerStore } from './store/pg.store';

const PORT = parseInt(process.env.PORT || '8000');

const store = new PgLedgerStore(pool);
const ctx = createWorkflowContext(store, loadEngineConfig(), workflowEventBus);

// ─── Start ───────────────────────────────────────────────────────────────────
registerAllHandlers(ctx.events, store);
const jobs = startScheduledJobs(ctx);

const server = createApp(ctx).listen(PORT, () => {
  console.log(`\nHR records engine running on http://localhost:${PORT}`);
  console.log(`   Health: http://localhost:${PORT}/health`);
  console.log(`   Attendance: http://localhost:${PORT}/api/attendance`);
  console.log(`   Leaves: http://localhost:${PORT}/api/leaves`);
  console.log(`   Salaries: http://localhost:${PORT}/api/salaries\n`);
});

function shutdown(signal: string) {
  console.log(`[Server] ${signal} received, shutting down`);
  jobs.stop();
  server.close(() => {
    pool.end().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[Server] Error closing the database pool:', err);
        process.exit(1);
      }
    );
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
