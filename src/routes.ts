import express, { Request, Response } from 'express';
import { DatabaseManager } from './database';
import { errorMessage, logError } from './logger';
import { PipelineBusyError, ReconciliationPipeline } from './pipeline';

export function createRouter(db: DatabaseManager, pipeline: ReconciliationPipeline): express.Router {
  const router = express.Router();

  router.post('/api/runs', (req: Request, res: Response) => {
    try {
      const report = pipeline.start();
      res.status(202).json(report);
    } catch (error) {
      if (error instanceof PipelineBusyError) {
        return res.status(409).json({ error: error.message, run_id: error.runId });
      }
      logError('Error starting run', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to start run' });
    }
  });

  router.get('/api/runs/current', (req: Request, res: Response) => {
    const status = pipeline.getStatus();
    if (!status) {
      return res.json({ status: 'idle' });
    }
    res.json(status);
  });

  router.get('/api/runs/latest', (req: Request, res: Response) => {
    const report = pipeline.getLastReport();
    if (!report) {
      return res.status(404).json({ error: 'No run has finished yet' });
    }
    res.json(report);
  });

  router.post('/api/runs/cancel', (req: Request, res: Response) => {
    if (!pipeline.cancel()) {
      return res.status(404).json({ error: 'No run in progress' });
    }
    res.json({ status: 'cancelling' });
  });

  router.get('/api/stats', (req: Request, res: Response) => {
    try {
      res.json(db.getStats());
    } catch (error) {
      logError('Error fetching stats', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to fetch stats' });
    }
  });

  router.get('/api/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', running: pipeline.isRunning(), timestamp: new Date().toISOString() });
  });

  return router;
}
