import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import path from 'path';

import { ensureStagingRoot } from './config/storage';
import { loadSettings, Settings } from './config/settings';
import { createConversionRouter } from './routes/conversion';
import { createDownloadRouter } from './routes/download';
import { formatsRouter } from './routes/formats';
import { createJobRouter } from './routes/jobs';
import { createStatusRouter } from './routes/status';
import { BatchDriverClient } from './services/batchDriverClient';
import { CommandRunner, SpawnCommandRunner } from './services/commandRunner';
import { ConverterService } from './services/converterService';
import { JobStore } from './services/jobStore';

export interface AppContext {
  app: express.Express;
  settings: Settings;
  converterService: ConverterService;
  driver: BatchDriverClient;
  jobStore: JobStore;
}

export interface AppOverrides {
  settings?: Partial<Settings>;
  runner?: CommandRunner;
  publicDir?: string;
}

export async function createApp(overrides: AppOverrides = {}): Promise<AppContext> {
  const settings: Settings = { ...loadSettings(), ...overrides.settings };
  await ensureStagingRoot(settings.stagingRoot);

  const app = express();
  const runner = overrides.runner ?? new SpawnCommandRunner();
  const converterService = new ConverterService(runner, { executablePath: settings.converterPath });
  const driver = new BatchDriverClient(runner, settings.batchDriver);
  const jobStore = new JobStore(settings.stagingRoot);

  console.log(`Using staging directory: ${settings.stagingRoot}`);
  console.log(`Using converter executable: ${converterService.getExecutablePath()}`);
  console.log(`Using batch driver: ${[settings.batchDriver.command, ...settings.batchDriver.args].join(' ')}`);

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  const publicDir = overrides.publicDir ?? path.resolve(process.cwd(), 'public');
  app.use(express.static(publicDir));

  app.use('/convert', createConversionRouter(driver, jobStore, { defaultOutputDir: settings.defaultOutputDir }));
  app.use('/jobs', createJobRouter(jobStore));
  app.use('/download', createDownloadRouter(jobStore));
  app.use('/formats', formatsRouter);
  app.use('/status', createStatusRouter(converterService));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      res.status(400).json({ message: error.message });
      return;
    }

    const message = error instanceof Error ? error.message : 'Unknown server error.';
    res.status(500).json({ message });
  });

  return { app, settings, converterService, driver, jobStore };
}
