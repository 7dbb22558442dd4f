import path from 'path';

import { OperatorCancelledError } from '../../errors';
import { BatchConverter } from '../../services/batchConverter';
import { collectFiles } from '../../services/fileEnumerator';
import { resolveSourcePath } from '../../services/pathResolver';
import { CliContext } from '../context';
import { EXIT_CODES, ExitCode } from '../exitCodes';

export const INTERACTIVE_OUTPUT_DIRNAME = 'output';

/**
 * Prompts for a directory and converts everything in it into
 * `<directory>/output`. Failures are listed on the console only.
 */
export async function runInteractive(ctx: CliContext): Promise<ExitCode> {
  const { colors } = ctx;

  ctx.output.out(colors.cyan('Interactive directory conversion'));
  ctx.output.out('This tool converts supported files with docling.\n');

  try {
    const source = await resolveSourcePath(undefined, {
      prompters: ctx.prompters,
      question: 'Enter the path of the directory to process:',
      requireDirectory: true
    });
    ctx.output.out(colors.green(`Selected directory: ${source}`));

    const outputRoot = path.join(source, INTERACTIVE_OUTPUT_DIRNAME);
    const files = await collectFiles(source, {
      exclude: [outputRoot],
      onUnreadable: (directory) => ctx.output.err(colors.yellow(`Skipping unreadable directory ${directory}.`))
    });

    if (files.length === 0) {
      ctx.output.out(colors.yellow('No supported files found in the directory.'));
      return EXIT_CODES.success;
    }

    ctx.output.out(colors.blue(`Found ${files.length} file(s) to process.`));

    const batch = new BatchConverter(ctx.converter, { reporter: ctx.reporter, colors });
    const summary = await batch.run({
      source,
      outputRoot,
      files,
      layout: 'flat',
      writeReport: false,
      progressLabel: 'Processing'
    });

    if (summary.failures.length > 0) {
      ctx.output.out(colors.red(`Processing finished with ${summary.failures.length} failure(s).`));
      for (const failure of summary.failures) {
        ctx.output.out(`  - ${failure.file}`);
      }
      return EXIT_CODES.conversionFailures;
    }

    ctx.output.out(colors.green('Processing finished successfully!'));
    return EXIT_CODES.success;
  } catch (error) {
    if (error instanceof OperatorCancelledError) {
      ctx.output.out(colors.yellow(`\n${error.message}`));
      return EXIT_CODES.cancelled;
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    ctx.output.out(colors.red(`Unexpected error: ${message}`));
    return EXIT_CODES.unexpectedError;
  }
}
