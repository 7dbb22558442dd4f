import fs from 'fs';
import path from 'path';

import { hasErrorCode } from '../errors';
import { Colorizer, plainColors, plainProgress, ProgressReporter } from '../reporting/types';
import { BatchSummary, ConversionFailure, ConversionOutcome, DestinationLayout, FailureReason } from '../types/conversion';
import { ConverterService } from './converterService';
import { writeFailureReport } from './failureReport';

export interface BatchPlan {
  source: string;
  outputRoot: string;
  files: string[];
  outputFormat?: string;
  skipExisting?: boolean;
  verbose?: boolean;
  layout?: DestinationLayout;
  writeReport?: boolean;
  progressLabel?: string;
}

export interface BatchConverterOptions {
  reporter?: ProgressReporter;
  colors?: Colorizer;
}

export function resolveDestination(
  file: string,
  source: string,
  outputRoot: string,
  sourceIsDirectory: boolean,
  layout: DestinationLayout = 'mirror'
): string {
  if (layout === 'flat' || !sourceIsDirectory) {
    return outputRoot;
  }

  const relativeParent = path.relative(source, path.dirname(file));
  if (relativeParent === '..' || relativeParent.startsWith(`..${path.sep}`) || path.isAbsolute(relativeParent)) {
    return outputRoot;
  }

  return path.join(outputRoot, relativeParent);
}

export async function hasExistingOutput(destinationDir: string, inputFile: string): Promise<boolean> {
  const stem = path.parse(inputFile).name;

  try {
    const entries = await fs.promises.readdir(destinationDir);
    return entries.some((entry) => entry.startsWith(stem));
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

async function isDirectory(target: string): Promise<boolean> {
  const stats = await fs.promises.stat(target);
  return stats.isDirectory();
}

/**
 * Converts files one at a time. A failing file is recorded and the loop moves
 * on; nothing here throws for a per-file problem.
 */
export class BatchConverter {
  private readonly reporter: ProgressReporter;
  private readonly colors: Colorizer;

  constructor(private readonly converter: ConverterService, options: BatchConverterOptions = {}) {
    this.reporter = options.reporter ?? plainProgress;
    this.colors = options.colors ?? plainColors;
  }

  async run(plan: BatchPlan): Promise<BatchSummary> {
    const source = path.resolve(plan.source);
    const outputRoot = path.resolve(plan.outputRoot);
    const sourceIsDirectory = await isDirectory(source);
    const verbose = plan.verbose ?? false;

    const summary: BatchSummary = {
      source,
      outputRoot,
      files: [...plan.files],
      converted: [],
      skipped: [],
      failures: []
    };

    let missingReported = false;

    this.reporter.start(plan.files.length, plan.progressLabel ?? 'Converting');
    try {
      for (const file of plan.files) {
        this.reporter.advance(file);

        const destination = resolveDestination(file, source, outputRoot, sourceIsDirectory, plan.layout);

        if (plan.skipExisting && (await hasExistingOutput(destination, file))) {
          summary.skipped.push(file);
          continue;
        }

        const outcome = await this.converter.convert({
          inputFile: file,
          outputDir: destination,
          outputFormat: plan.outputFormat
        });

        if (outcome.missingExecutable) {
          if (!missingReported) {
            this.reporter.write(
              this.colors.red(
                `Converter executable '${this.converter.getExecutablePath()}' not found on PATH. Install it and try again.`
              )
            );
            missingReported = true;
          }
          summary.failures.push(this.toFailure(outcome));
          continue;
        }

        if (outcome.destinationError !== undefined) {
          this.reporter.write(
            this.colors.red(
              `Cannot create output directory ${outcome.outputDir} for ${file}: ${outcome.destinationError}`
            )
          );
          summary.failures.push(this.toFailure(outcome));
          continue;
        }

        this.emitOutput(outcome, verbose);

        if (outcome.success) {
          summary.converted.push(file);
        } else {
          summary.failures.push(this.toFailure(outcome));
        }
      }
    } finally {
      this.reporter.stop();
    }

    if (summary.failures.length > 0 && (plan.writeReport ?? true)) {
      summary.reportPath = await writeFailureReport(
        summary.failures.map((failure) => failure.file),
        outputRoot
      );
    }

    return summary;
  }

  private emitOutput(outcome: ConversionOutcome, verbose: boolean): void {
    const stdout = outcome.stdout.trimEnd();
    const stderr = outcome.stderr.trimEnd();

    if (verbose) {
      if (stdout) {
        this.reporter.write(stdout);
      }
      if (stderr) {
        this.reporter.write(stderr);
      }
    }

    if (outcome.success) {
      return;
    }

    this.reporter.write(this.colors.red(`Conversion failed for ${outcome.inputFile}: exit code ${outcome.exitCode}`));
    if (!verbose && stderr) {
      this.reporter.write(stderr);
    }
  }

  private toFailure(outcome: ConversionOutcome): ConversionFailure {
    return {
      file: outcome.inputFile,
      reason: this.failureReason(outcome),
      exitCode: outcome.exitCode,
      stderr: outcome.stderr
    };
  }

  private failureReason(outcome: ConversionOutcome): FailureReason {
    if (outcome.missingExecutable) {
      return 'converter-missing';
    }
    return outcome.destinationError !== undefined ? 'destination-unavailable' : 'non-zero-exit';
  }
}
