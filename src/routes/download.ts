import express, { type Request, type Response } from 'express';
import fs from 'fs';

import { JobStore } from '../services/jobStore';

export function createDownloadRouter(jobStore: JobStore): express.Router {
  const router = express.Router();

  router.get('/:jobId/:fileIndex', (req: Request, res: Response) => {
    const { jobId, fileIndex } = req.params;
    const job = jobStore.getJob(jobId);

    if (!job) {
      return res.status(404).json({ message: 'Job not found.' });
    }

    const index = Number(fileIndex);
    const file = Number.isInteger(index) ? job.files[index] : undefined;

    if (!file) {
      return res.status(404).json({ message: 'Output file not found.' });
    }

    if (!fs.existsSync(file.absolutePath)) {
      return res.status(404).json({ message: 'Converted file not found on disk.' });
    }

    res.attachment(file.name);
    res.setHeader('Content-Type', 'application/octet-stream');

    const readStream = fs.createReadStream(file.absolutePath);
    readStream.on('error', (error: NodeJS.ErrnoException) => {
      if (!res.headersSent) {
        const status = error.code === 'ENOENT' ? 404 : 500;
        res.status(status).json({ message: 'Failed to read converted file.' });
      }
    });

    readStream.pipe(res);
    return undefined;
  });

  return router;
}
