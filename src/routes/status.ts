import express, { type Request, type Response } from 'express';

import { ConverterService } from '../services/converterService';

export function createStatusRouter(converterService: ConverterService): express.Router {
  const router = express.Router();

  router.get('/', async (_req: Request, res: Response) => {
    try {
      const installed = await converterService.checkInstallation();
      return res.json({
        converter: {
          path: converterService.getExecutablePath(),
          installed
        }
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown status error.';
      return res.status(500).json({ message: errorMessage });
    }
  });

  return router;
}
