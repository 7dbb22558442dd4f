export type ColorName = 'red' | 'yellow' | 'green' | 'cyan' | 'blue';

export type Colorizer = Record<ColorName, (text: string) => string>;

/**
 * Per-file progress display. `write` prints a line without corrupting the
 * progress display.
 */
export interface ProgressReporter {
  start(total: number, label: string): void;
  advance(file: string): void;
  write(message: string): void;
  stop(): void;
}

const identity = (text: string): string => text;

export const plainColors: Colorizer = {
  red: identity,
  yellow: identity,
  green: identity,
  cyan: identity,
  blue: identity
};

export const plainProgress: ProgressReporter = {
  start: () => undefined,
  advance: () => undefined,
  write: (message: string) => {
    console.log(message);
  },
  stop: () => undefined
};
