export const EXIT_CODES = {
  success: 0,
  sourceNotFound: 1,
  unexpectedError: 1,
  conversionFailures: 2,
  cancelled: 130
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
