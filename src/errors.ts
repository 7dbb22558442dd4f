export class SourceNotFoundError extends Error {
  constructor(public readonly sourcePath: string) {
    super(`Source path ${sourcePath} does not exist.`);
    this.name = 'SourceNotFoundError';
  }
}

export class OperatorCancelledError extends Error {
  constructor(message = 'Operation cancelled by user.') {
    super(message);
    this.name = 'OperatorCancelledError';
  }
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
