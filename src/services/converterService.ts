import fs from 'fs';

import { ConversionOutcome } from '../types/conversion';
import { CommandRunner } from './commandRunner';

export interface ConverterServiceOptions {
  executablePath?: string;
  installationTimeoutMs?: number;
}

export interface ConvertFileOptions {
  inputFile: string;
  outputDir: string;
  outputFormat?: string;
}

const DEFAULT_CONVERTER_PATH = 'docling';
const DEFAULT_INSTALLATION_TIMEOUT_MS = 10_000;

export class ConverterService {
  private readonly executablePath: string;
  private readonly installationTimeoutMs: number;

  constructor(private readonly runner: CommandRunner, options: ConverterServiceOptions = {}) {
    this.executablePath = options.executablePath ?? DEFAULT_CONVERTER_PATH;
    this.installationTimeoutMs = options.installationTimeoutMs ?? DEFAULT_INSTALLATION_TIMEOUT_MS;
  }

  getExecutablePath(): string {
    return this.executablePath;
  }

  buildArgs(options: ConvertFileOptions): string[] {
    const args: string[] = [];
    const format = options.outputFormat?.trim();

    if (format) {
      args.push('--to', format);
    }
    args.push('--output', options.outputDir, options.inputFile);

    return args;
  }

  async convert(options: ConvertFileOptions): Promise<ConversionOutcome> {
    try {
      await fs.promises.mkdir(options.outputDir, { recursive: true });
    } catch (error) {
      return {
        inputFile: options.inputFile,
        outputDir: options.outputDir,
        success: false,
        exitCode: null,
        stdout: '',
        stderr: '',
        missingExecutable: false,
        destinationError: error instanceof Error ? error.message : String(error)
      };
    }

    const result = await this.runner.run(this.executablePath, this.buildArgs(options));

    return {
      inputFile: options.inputFile,
      outputDir: options.outputDir,
      success: !result.notFound && result.exitCode === 0,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      missingExecutable: result.notFound
    };
  }

  async checkInstallation(): Promise<boolean> {
    const result = await this.runner.run(this.executablePath, ['--help'], {
      timeoutMs: this.installationTimeoutMs
    });

    return !result.notFound && !result.timedOut && result.exitCode === 0;
  }
}
