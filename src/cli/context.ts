import { Settings } from '../config/settings';
import { DialogPrompter } from '../prompts/dialogPrompter';
import { TextPrompter } from '../prompts/textPrompter';
import { PathPrompter } from '../prompts/types';
import { chalkColors, SpinnerProgressReporter } from '../reporting/terminal';
import { Colorizer, ProgressReporter } from '../reporting/types';
import { CommandRunner, SpawnCommandRunner } from '../services/commandRunner';
import { ConverterService } from '../services/converterService';

export interface CliOutput {
  out(message: string): void;
  err(message: string): void;
}

/**
 * Everything a CLI command needs from the outside world. Tests build one
 * from fakes; the executables build it from the terminal.
 */
export interface CliContext {
  converter: ConverterService;
  reporter: ProgressReporter;
  colors: Colorizer;
  prompters: PathPrompter[];
  output: CliOutput;
}

export const processOutput: CliOutput = {
  out: (message) => {
    console.log(message);
  },
  err: (message) => {
    console.error(message);
  }
};

export function createTerminalContext(settings: Settings, options: { dialog: boolean }): CliContext {
  const runner: CommandRunner = new SpawnCommandRunner();
  const colors = chalkColors;
  const textPrompter = new TextPrompter({ colors });
  const prompters: PathPrompter[] = options.dialog
    ? [new DialogPrompter(runner, { executablePath: settings.dialogPath }), textPrompter]
    : [textPrompter];

  return {
    converter: new ConverterService(runner, { executablePath: settings.converterPath }),
    reporter: new SpinnerProgressReporter(),
    colors,
    prompters,
    output: processOutput
  };
}
