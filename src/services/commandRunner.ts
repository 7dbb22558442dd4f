import { spawn } from 'child_process';

import { CommandResult } from '../types/conversion';

export interface RunOptions {
  timeoutMs?: number;
}

/**
 * Runs an external program to completion and captures its output. Everything
 * that talks to the converter, the dialog program or the batch CLI goes
 * through this interface so tests can substitute a fake.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args);

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      if (options.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
        }, options.timeoutMs);
      }

      const finish = (result: CommandResult): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        resolve(result);
      };

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          finish({ exitCode: null, stdout, stderr, notFound: true, timedOut });
          return;
        }

        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        reject(error);
      });

      child.on('close', (code: number | null) => {
        finish({ exitCode: code, stdout, stderr, notFound: false, timedOut });
      });
    });
  }
}
