import express, { type Request, type Response } from 'express';

import { JobStore } from '../services/jobStore';
import { serializeJob } from './serializers';

export function createJobRouter(jobStore: JobStore): express.Router {
  const router = express.Router();

  router.get('/:jobId', (req: Request, res: Response) => {
    const job = jobStore.getJob(req.params.jobId);

    if (!job) {
      return res.status(404).json({ message: 'Job not found.' });
    }

    return res.json({ job: serializeJob(req, job) });
  });

  router.delete('/:jobId', async (req: Request, res: Response) => {
    try {
      const removed = await jobStore.remove(req.params.jobId);
      if (!removed) {
        return res.status(404).json({ message: 'Job not found.' });
      }
      return res.status(204).end();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown cleanup error.';
      return res.status(500).json({ message: errorMessage });
    }
  });

  return router;
}
