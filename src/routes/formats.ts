import express, { type Request, type Response } from 'express';

import { OUTPUT_FORMATS, SUPPORTED_EXTENSIONS } from '../config/formats';

export const formatsRouter = express.Router();

formatsRouter.get('/', (_req: Request, res: Response) => {
  res.json({
    formats: {
      source: SUPPORTED_EXTENSIONS.map((extension) => extension.replace(/^\./, '')),
      target: OUTPUT_FORMATS
    }
  });
});
