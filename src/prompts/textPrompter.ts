import readline from 'readline';

import { OperatorCancelledError } from '../errors';
import { Colorizer, plainColors } from '../reporting/types';
import { NoticeLevel, PathPrompter } from './types';

export interface TextPrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  colors?: Colorizer;
  /** Forces terminal handling (raw keys, Ctrl-C as SIGINT) on or off. */
  terminal?: boolean;
}

export class TextPrompter implements PathPrompter {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly colors: Colorizer;
  private readonly terminal?: boolean;
  private rl?: readline.Interface;

  constructor(options: TextPrompterOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.colors = options.colors ?? plainColors;
    this.terminal = options.terminal;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  ask(question: string): Promise<string | null> {
    const rl = this.getInterface();

    return new Promise((resolve, reject) => {
      const detach = (): void => {
        rl.removeListener('SIGINT', onInterrupt);
        rl.removeListener('close', onClose);
        this.rl = undefined;
      };
      const onInterrupt = (): void => {
        detach();
        rl.close();
        reject(new OperatorCancelledError());
      };
      const onClose = (): void => {
        detach();
        reject(new OperatorCancelledError());
      };

      rl.once('SIGINT', onInterrupt);
      rl.once('close', onClose);

      rl.question(`${question} `, (answer) => {
        rl.removeListener('SIGINT', onInterrupt);
        rl.removeListener('close', onClose);
        resolve(answer);
      });
    });
  }

  async confirm(question: string): Promise<boolean> {
    const answer = await this.ask(`${question} [y/n]`);
    const normalized = (answer ?? '').trim().toLowerCase();
    return normalized === 'y' || normalized === 'yes';
  }

  async notify(level: NoticeLevel, message: string): Promise<void> {
    const color = level === 'error' ? this.colors.red : this.colors.yellow;
    this.output.write(`${color(message)}\n`);
  }

  close(): void {
    const rl = this.rl;
    this.rl = undefined;
    rl?.close();
  }

  private getInterface(): readline.Interface {
    if (!this.rl) {
      this.rl = readline.createInterface({ input: this.input, output: this.output, terminal: this.terminal });
    }
    return this.rl;
  }
}
