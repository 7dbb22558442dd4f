import { CommandRunner } from './commandRunner';

export interface BatchDriverCommand {
  command: string;
  args: string[];
}

export interface DriverRequest {
  sourcePath: string;
  outputPath: string;
  outputFormat: string;
  verbose: boolean;
}

export interface DriverResult {
  success: boolean;
  output: string;
}

/**
 * Runs the batch CLI as a child process on behalf of the web service. Only
 * a zero exit status counts as success.
 */
export class BatchDriverClient {
  constructor(private readonly runner: CommandRunner, private readonly driver: BatchDriverCommand) {}

  buildArgs(request: DriverRequest): string[] {
    const args = [...this.driver.args, request.sourcePath, '--output', request.outputPath, '--to', request.outputFormat];

    if (request.verbose) {
      args.push('--verbose');
    }

    return args;
  }

  async run(request: DriverRequest): Promise<DriverResult> {
    try {
      const result = await this.runner.run(this.driver.command, this.buildArgs(request));

      if (result.notFound) {
        return {
          success: false,
          output: `Error running conversion: batch driver "${this.driver.command}" could not be launched.`
        };
      }

      return {
        success: result.exitCode === 0,
        output: result.stdout + result.stderr
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return { success: false, output: `Error running conversion: ${message}` };
    }
  }
}
