#!/usr/bin/env node
import 'dotenv/config';

import { loadSettings } from '../config/settings';
import { buildBatchProgram, runBatchCommand } from './commands/batch';
import { createTerminalContext } from './context';
import { EXIT_CODES } from './exitCodes';
import { exitOnInterrupt } from './signals';

const settings = loadSettings();
const ctx = createTerminalContext(settings, { dialog: true });

exitOnInterrupt(ctx.colors);

const program = buildBatchProgram(settings.defaultOutputDir, async (options) => {
  process.exitCode = await runBatchCommand(options, ctx);
});

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : 'Unknown error';
  ctx.output.err(ctx.colors.red(`Error: ${message}`));
  process.exitCode = EXIT_CODES.unexpectedError;
});
