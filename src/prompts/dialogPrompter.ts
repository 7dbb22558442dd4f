import { CommandRunner } from '../services/commandRunner';
import { NoticeLevel, PathPrompter } from './types';

export interface DialogPrompterOptions {
  executablePath?: string;
  title?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

const AVAILABILITY_TIMEOUT_MS = 5_000;

/**
 * Desktop dialogs through a zenity-compatible program. Exit code 0 means the
 * operator confirmed, 1 means they dismissed the dialog.
 */
export class DialogPrompter implements PathPrompter {
  private readonly executablePath: string;
  private readonly title: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;
  private availability?: boolean;

  constructor(private readonly runner: CommandRunner, options: DialogPrompterOptions = {}) {
    this.executablePath = options.executablePath ?? 'zenity';
    this.title = options.title ?? 'Docling';
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
  }

  async isAvailable(): Promise<boolean> {
    if (this.availability !== undefined) {
      return this.availability;
    }

    if (!this.hasDisplay()) {
      this.availability = false;
      return false;
    }

    const result = await this.runner.run(this.executablePath, ['--version'], { timeoutMs: AVAILABILITY_TIMEOUT_MS });
    this.availability = !result.notFound && !result.timedOut && result.exitCode === 0;
    return this.availability;
  }

  async ask(question: string): Promise<string | null> {
    const result = await this.runner.run(this.executablePath, [
      '--entry',
      `--title=${this.title}`,
      `--text=${question}`
    ]);

    if (result.exitCode !== 0) {
      return null;
    }

    return result.stdout.replace(/\r?\n$/, '');
  }

  async confirm(question: string): Promise<boolean> {
    const result = await this.runner.run(this.executablePath, ['--question', '--title=Exit', `--text=${question}`]);
    return result.exitCode === 0;
  }

  async notify(level: NoticeLevel, message: string): Promise<void> {
    const title = level === 'error' ? 'Invalid path' : 'Empty input';
    await this.runner.run(this.executablePath, [`--${level}`, `--title=${title}`, `--text=${message}`]);
  }

  close(): void {}

  private hasDisplay(): boolean {
    if (this.platform === 'darwin' || this.platform === 'win32') {
      return true;
    }
    return Boolean(this.env.DISPLAY || this.env.WAYLAND_DISPLAY);
  }
}
