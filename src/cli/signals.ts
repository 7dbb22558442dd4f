import { Colorizer } from '../reporting/types';
import { EXIT_CODES } from './exitCodes';

/**
 * An operator interrupt during a run ends the process with a message instead
 * of a stack trace. The converter child shares the process group and receives
 * the same signal.
 */
export function exitOnInterrupt(colors: Colorizer): void {
  process.once('SIGINT', () => {
    console.log(colors.yellow('\nOperation cancelled by user.'));
    process.exit(EXIT_CODES.cancelled);
  });
}
