import express, { type Request, type Response } from 'express';
import fs from 'fs';
import multer from 'multer';
import path from 'path';

import { isOutputFormat, isSupportedFile } from '../config/formats';
import { StagingArea } from '../config/storage';
import { BatchDriverClient } from '../services/batchDriverClient';
import { JobStore } from '../services/jobStore';
import { serializeJob } from './serializers';

interface ConvertDirectoryBody {
  sourcePath?: unknown;
  outputPath?: unknown;
  outputFormat?: unknown;
  verbose?: unknown;
}

export interface ConversionRouterOptions {
  defaultOutputDir: string;
  defaultOutputFormat?: string;
  maxUploadBytes?: number;
}

const DEFAULT_MAX_UPLOAD_BYTES = 200 * 1024 * 1024;

function readString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function readBoolean(value: unknown): boolean {
  return value === true || value === 'true' || value === 'on';
}

/**
 * Multipart filenames arrive as UTF-8 bytes read as latin1. Names that do not
 * survive re-decoding were sent in some other charset and are kept as given.
 */
export function decodeUploadName(name: string): string {
  if (/[^\x00-\xff]/.test(name)) {
    return name;
  }
  const decoded = Buffer.from(name, 'latin1').toString('utf8');
  return decoded.includes('\uFFFD') ? name : decoded;
}

export function createConversionRouter(
  driver: BatchDriverClient,
  jobStore: JobStore,
  options: ConversionRouterOptions
): express.Router {
  const router = express.Router();
  const defaultFormat = options.defaultOutputFormat ?? 'md';
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES },
    fileFilter: (_req, file, cb) => {
      cb(null, isSupportedFile(decodeUploadName(file.originalname)));
    }
  });

  router.post('/directory', async (req: Request, res: Response) => {
    const body: ConvertDirectoryBody = req.body ?? {};
    const sourcePath = readString(body.sourcePath);
    const outputPath = readString(body.outputPath) || options.defaultOutputDir;
    const outputFormat = readString(body.outputFormat) || defaultFormat;
    const verbose = readBoolean(body.verbose);

    if (!sourcePath) {
      return res.status(400).json({ message: 'Please select a source directory.' });
    }

    if (!isOutputFormat(outputFormat)) {
      return res.status(400).json({ message: `Unsupported output format "${outputFormat}".` });
    }

    const absoluteSourcePath = path.resolve(sourcePath);
    if (!fs.existsSync(absoluteSourcePath)) {
      return res.status(404).json({ message: `Directory not found: ${sourcePath}` });
    }

    const absoluteOutputPath = path.resolve(outputPath);
    const result = await driver.run({
      sourcePath: absoluteSourcePath,
      outputPath: absoluteOutputPath,
      outputFormat,
      verbose
    });

    if (!result.success) {
      return res.status(500).json({
        success: false,
        message: 'Error during conversion.',
        output: result.output
      });
    }

    return res.status(200).json({
      success: true,
      message: 'Conversion completed successfully.',
      outputPath: absoluteOutputPath,
      output: result.output
    });
  });

  router.post('/upload', upload.array('files'), async (req: Request, res: Response) => {
    const files = Array.isArray(req.files) ? req.files : [];
    const outputFormat = readString(req.body?.outputFormat) || defaultFormat;

    if (files.length === 0) {
      return res.status(400).json({ message: 'At least one supported file is required.' });
    }

    if (!isOutputFormat(outputFormat)) {
      return res.status(400).json({ message: `Unsupported output format "${outputFormat}".` });
    }

    let area: StagingArea | undefined;

    try {
      area = await jobStore.stage();

      for (const file of files) {
        const filename = path.basename(decodeUploadName(file.originalname));
        await fs.promises.writeFile(path.join(area.sourceDir, filename), file.buffer);
      }

      const result = await driver.run({
        sourcePath: area.sourceDir,
        outputPath: area.outputDir,
        outputFormat,
        verbose: true
      });

      if (!result.success) {
        await jobStore.discard(area);
        return res.status(500).json({
          success: false,
          message: 'Error during conversion.',
          output: result.output
        });
      }

      const job = await jobStore.register(area, outputFormat);

      return res.status(200).json({
        success: true,
        message: job.files.length > 0 ? 'Files converted successfully.' : 'No output files were generated.',
        output: result.output,
        job: serializeJob(req, job)
      });
    } catch (error) {
      if (area) {
        await jobStore.discard(area).catch(() => undefined);
      }
      const errorMessage = error instanceof Error ? error.message : 'Unknown conversion error.';
      return res.status(500).json({ message: errorMessage });
    }
  });

  return router;
}
