import 'dotenv/config';
import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { createPipeline } from './bootstrap';
import { loadConfig } from './config';
import { DatabaseManager } from './database';
import { logError, logInfo } from './logger';
import { createRouter } from './routes';

const config = loadConfig();
const app = express();

const db = new DatabaseManager(config.dbPath);
const pipeline = createPipeline(config, db);

app.use(
  cors({
    origin: ['http://localhost:3000', 'http://localhost:5173'],
    credentials: true,
  })
);

app.use(express.json({ limit: '1mb' }));

app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();
  res.on('finish', () => {
    logInfo('Request handled', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Date.now() - start,
    });
  });
  next();
});

app.get('/', (req: Request, res: Response) => {
  res.json({
    message: 'Schedule Reconciler API',
    version: '1.0.0',
    endpoints: {
      health: '/api/health',
      startRun: 'POST /api/runs',
      currentRun: '/api/runs/current',
      latestRun: '/api/runs/latest',
      cancelRun: 'POST /api/runs/cancel',
      stats: '/api/stats',
    },
  });
});

app.use(createRouter(db, pipeline));

app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
  logError('Unhandled error', { error: err.message, path: req.path });
  res.status(500).json({
    error: 'Internal server error',
    message: process.env.NODE_ENV === 'development' ? err.message : undefined,
  });
});

app.use((req: Request, res: Response) => {
  res.status(404).json({ error: 'Not found' });
});

function shutdown(signal: string): void {
  logInfo('Shutting down gracefully', { signal });
  pipeline.cancel();
  server.close();
  db.close();
  process.exit(0);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

const server = app.listen(config.port, () => {
  logInfo('Schedule Reconciler API listening', {
    url: `http://localhost:${config.port}`,
    database: config.dbPath,
    timezone: config.timezone,
  });
});

export { app, db, server };
