import express from 'express';
import { errorHandler, notFound } from './middleware/errorHandler';
import { attendanceRoutes } from './routes/attendance.routes';
import { leaveRoutes } from './routes/leave.routes';
import { salaryRoutes } from './routes/salary.routes';
import { WorkflowContext } from './services/context';

export function createApp(ctx: WorkflowContext) {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(express.json());

  // ─── Health check ──────────────────────────────────────────────────────────
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // ─── Routes ────────────────────────────────────────────────────────────────
  app.use('/api/attendance', attendanceRoutes(ctx));
  app.use('/api/leaves', leaveRoutes(ctx));
  app.use('/api/salaries', salaryRoutes(ctx));

  // ─── Error handling ────────────────────────────────────────────────────────
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
