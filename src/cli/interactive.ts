#!/usr/bin/env node
import 'dotenv/config';

import { loadSettings } from '../config/settings';
import { runInteractive } from './commands/interactive';
import { createTerminalContext } from './context';
import { exitOnInterrupt } from './signals';

const ctx = createTerminalContext(loadSettings(), { dialog: false });

exitOnInterrupt(ctx.colors);

void runInteractive(ctx).then((code) => {
  process.exitCode = code;
});
