export type CallTreeErrorCode =
  | 'SEARCH_TOOL_MISSING'
  | 'IO'
  | 'CACHE_CORRUPT'
  | 'MALFORMED_GREP_LINE'
  | 'WORKER_FAILED'
  | 'USAGE'
  | 'CONFIG';

/** Fatal failure of a run. Nothing catches these except the CLI and HTTP boundaries. */
export class CallTreeError extends Error {
  constructor(
    readonly code: CallTreeErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'CallTreeError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNodeErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
