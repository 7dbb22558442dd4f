import { Command } from 'commander';
import fs from 'fs';
import { z } from 'zod';

import { OperatorCancelledError, SourceNotFoundError } from '../../errors';
import { BatchConverter } from '../../services/batchConverter';
import { collectFiles } from '../../services/fileEnumerator';
import { expandPath, resolveSourcePath } from '../../services/pathResolver';
import { CliContext } from '../context';
import { EXIT_CODES, ExitCode } from '../exitCodes';

const BatchOptionsSchema = z.object({
  source: z.string().optional(),
  output: z.string().min(1),
  to: z.string().min(1).optional(),
  skipExisting: z.boolean().optional(),
  verbose: z.boolean().optional()
});

export type BatchCommandOptions = z.infer<typeof BatchOptionsSchema>;

export function buildBatchProgram(
  defaultOutput: string,
  action: (options: BatchCommandOptions) => Promise<void>
): Command {
  const program = new Command();

  program
    .name('docling-batch')
    .description('Convert a file or a directory tree with the docling CLI')
    .argument('[source]', 'File or directory to convert; directories are walked recursively')
    .option('--output <dir>', 'Directory that receives the converted artifacts', defaultOutput)
    .option('--to <format>', 'Output format passed through to the converter (e.g. md, json)')
    .option('--skip-existing', 'Skip files whose output already exists in the destination directory')
    .option('--verbose', 'Print the converter output for every processed file')
    .showHelpAfterError()
    .action(async (source: string | undefined, opts: Record<string, unknown>) => {
      await action(BatchOptionsSchema.parse({ ...opts, source }));
    });

  return program;
}

export async function runBatchCommand(options: BatchCommandOptions, ctx: CliContext): Promise<ExitCode> {
  const { colors } = ctx;

  let source: string;
  try {
    source = await resolveSourcePath(options.source, { prompters: ctx.prompters });
  } catch (error) {
    if (error instanceof SourceNotFoundError) {
      ctx.output.err(colors.red(error.message));
      return EXIT_CODES.sourceNotFound;
    }
    if (error instanceof OperatorCancelledError) {
      ctx.output.err(colors.yellow(error.message));
      return EXIT_CODES.cancelled;
    }
    throw error;
  }

  const outputRoot = expandPath(options.output);
  const files = await collectFiles(source, {
    exclude: [outputRoot],
    onUnreadable: (directory) => ctx.output.err(colors.yellow(`Skipping unreadable directory ${directory}.`))
  });

  if (files.length === 0) {
    ctx.output.out(colors.yellow('No supported files found to process.'));
    return EXIT_CODES.success;
  }

  await fs.promises.mkdir(outputRoot, { recursive: true });

  const batch = new BatchConverter(ctx.converter, { reporter: ctx.reporter, colors });
  const summary = await batch.run({
    source,
    outputRoot,
    files,
    outputFormat: options.to,
    skipExisting: options.skipExisting,
    verbose: options.verbose
  });

  if (summary.failures.length > 0) {
    ctx.output.err(
      colors.red(`Finished with ${summary.failures.length} failure(s). See ${summary.reportPath} for details.`)
    );
    return EXIT_CODES.conversionFailures;
  }

  ctx.output.out(colors.green('Conversion completed successfully.'));
  return EXIT_CODES.success;
}
