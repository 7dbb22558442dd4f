import os from 'os';
import path from 'path';

export interface Settings {
  port: number;
  host: string;
  converterPath: string;
  dialogPath: string;
  defaultOutputDir: string;
  stagingRoot: string;
  batchDriver: {
    command: string;
    args: string[];
  };
}

const DEFAULT_PORT = 3100;

function readString(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

function readPort(value: string | undefined): number {
  const parsed = Number(value ?? DEFAULT_PORT);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_PORT;
}

/**
 * The web service runs the batch CLI from the same build, so the default
 * script sits next to this module's compiled output.
 */
function defaultBatchDriverScript(): string {
  return path.resolve(__dirname, '..', 'cli', 'batch.js');
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    port: readPort(env.PORT),
    host: readString(env.HOST, 'localhost'),
    converterPath: readString(env.CONVERTER_PATH, 'docling'),
    dialogPath: readString(env.DIALOG_PATH, 'zenity'),
    defaultOutputDir: readString(env.DEFAULT_OUTPUT_DIR, 'docling-output'),
    stagingRoot: path.resolve(readString(env.STAGING_ROOT, path.join(os.tmpdir(), 'docling-batch'))),
    batchDriver: {
      command: process.execPath,
      args: [readString(env.BATCH_DRIVER_SCRIPT, defaultBatchDriverScript())]
    }
  };
}
