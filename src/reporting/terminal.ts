import chalk from 'chalk';
import ora from 'ora';
import path from 'path';

import { Colorizer, ProgressReporter } from './types';

export const chalkColors: Colorizer = {
  red: (text) => chalk.red(text),
  yellow: (text) => chalk.yellow(text),
  green: (text) => chalk.green(text),
  cyan: (text) => chalk.cyan(text),
  blue: (text) => chalk.blue(text)
};

export interface SpinnerOptions {
  /** Where the spinner renders; ora defaults to stderr. */
  stream?: NodeJS.WritableStream;
  /** Where `write` prints converter output. */
  output?: NodeJS.WritableStream;
  /** Animate the spinner; when false, only start and finish lines are printed. */
  isEnabled?: boolean;
}

export class SpinnerProgressReporter implements ProgressReporter {
  private readonly output: NodeJS.WritableStream;
  private spinner?: ora.Ora;
  private total = 0;
  private position = 0;
  private label = '';

  constructor(private readonly options: SpinnerOptions = {}) {
    this.output = options.output ?? process.stdout;
  }

  start(total: number, label: string): void {
    this.total = total;
    this.position = 0;
    this.label = label;
    const { stream, isEnabled } = this.options;
    this.spinner = ora({
      text: `${label} [0/${total}]`,
      indent: 2,
      ...(stream ? { stream } : {}),
      ...(isEnabled !== undefined ? { isEnabled } : {})
    }).start();
  }

  advance(file: string): void {
    this.position += 1;
    if (this.spinner) {
      this.spinner.text = `${this.label} [${this.position}/${this.total}] ${path.basename(file)}`;
    }
  }

  write(message: string): void {
    const spinner = this.spinner;
    if (!spinner?.isSpinning) {
      this.output.write(`${message}\n`);
      return;
    }

    spinner.clear();
    this.output.write(`${message}\n`);
    spinner.render();
  }

  stop(): void {
    if (!this.spinner) {
      return;
    }

    this.spinner.succeed(`${this.label} [${this.position}/${this.total}]`);
    this.spinner = undefined;
  }
}
