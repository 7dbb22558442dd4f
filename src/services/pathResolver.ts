import fs from 'fs';
import os from 'os';
import path from 'path';

import { OperatorCancelledError, SourceNotFoundError } from '../errors';
import { PathPrompter } from '../prompts/types';

export interface ResolvePathOptions {
  prompters: PathPrompter[];
  question?: string;
  requireDirectory?: boolean;
}

const DEFAULT_QUESTION = 'Which directory should be converted?';

export function expandPath(candidate: string): string {
  const trimmed = candidate.trim();

  if (trimmed === '~') {
    return os.homedir();
  }
  if (trimmed.startsWith('~/') || trimmed.startsWith('~\\')) {
    return path.join(os.homedir(), trimmed.slice(2));
  }

  return path.resolve(trimmed);
}

async function statOrUndefined(target: string): Promise<fs.Stats | undefined> {
  try {
    return await fs.promises.stat(target);
  } catch {
    return undefined;
  }
}

export async function selectPrompter(prompters: PathPrompter[]): Promise<PathPrompter> {
  for (const prompter of prompters) {
    if (await prompter.isAvailable()) {
      return prompter;
    }
  }

  throw new Error('No prompt is available to ask for a source path.');
}

async function promptForPath(prompter: PathPrompter, question: string, requireDirectory: boolean): Promise<string> {
  for (;;) {
    const answer = await prompter.ask(question);

    if (answer === null) {
      if (await prompter.confirm('No directory provided. Do you want to exit?')) {
        throw new OperatorCancelledError('No directory provided.');
      }
      continue;
    }

    if (!answer.trim()) {
      await prompter.notify('warning', 'A path is required.');
      continue;
    }

    const candidate = expandPath(answer);
    const stats = await statOrUndefined(candidate);

    if (!stats) {
      const suffix = requireDirectory ? ' or is not a directory.' : '. Try again.';
      await prompter.notify('error', `The path '${candidate}' does not exist${suffix}`);
      continue;
    }

    if (requireDirectory && !stats.isDirectory()) {
      await prompter.notify('error', `The path '${candidate}' does not exist or is not a directory.`);
      continue;
    }

    return candidate;
  }
}

/**
 * Resolves the source path from an explicit candidate or, when none is
 * given, by prompting until the operator enters a path that exists.
 */
export async function resolveSourcePath(candidate: string | undefined, options: ResolvePathOptions): Promise<string> {
  if (candidate !== undefined && candidate.trim()) {
    const resolved = expandPath(candidate);
    if (!(await statOrUndefined(resolved))) {
      throw new SourceNotFoundError(resolved);
    }
    return resolved;
  }

  const prompter = await selectPrompter(options.prompters);
  try {
    return await promptForPath(prompter, options.question ?? DEFAULT_QUESTION, options.requireDirectory ?? false);
  } finally {
    prompter.close();
  }
}
