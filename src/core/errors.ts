export enum ErrorCode {
  INVALID_COMMAND = 'INVALID_COMMAND',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  CONTEXT_NOT_FOUND = 'CONTEXT_NOT_FOUND',
  CONFIG_KEY_NOT_FOUND = 'CONFIG_KEY_NOT_FOUND',
  NO_DEFAULT_CONFIGURED = 'NO_DEFAULT_CONFIGURED',
  NO_CONFIG_FOR_CONTEXT = 'NO_CONFIG_FOR_CONTEXT',
  CONFIG_PARSE_FAILURE = 'CONFIG_PARSE_FAILURE',
  CONFIG_WRITE_FAILURE = 'CONFIG_WRITE_FAILURE',
  CONFIG_READ_FAILURE = 'CONFIG_READ_FAILURE',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
}

const EXIT_CODES: Record<ErrorCode, number> = {
  [ErrorCode.INVALID_COMMAND]: 1,
  [ErrorCode.VALIDATION_FAILED]: 1,
  [ErrorCode.CONTEXT_NOT_FOUND]: 1,
  [ErrorCode.CONFIG_KEY_NOT_FOUND]: 1,
  [ErrorCode.NO_DEFAULT_CONFIGURED]: 1,
  [ErrorCode.NO_CONFIG_FOR_CONTEXT]: 1,
  [ErrorCode.INVALID_ARGUMENT]: 1,
  [ErrorCode.CONFIG_READ_FAILURE]: 2,
  [ErrorCode.CONFIG_WRITE_FAILURE]: 2,
  [ErrorCode.CONFIG_PARSE_FAILURE]: 3,
};

export interface CmdctxErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class CmdctxError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, opts: CmdctxErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'CmdctxError';
    this.code = code;
    this.details = opts.details;
  }

  /**
   * Message for terminal output. Includes the underlying cause when there is one.
   */
  toUserMessage(): string {
    const cause = this.cause;
    if (cause instanceof Error && cause.message && !this.message.includes(cause.message)) {
      return `${this.message}: ${cause.message}`;
    }
    return this.message;
  }

  getExitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export function isCmdctxError(error: unknown, code?: ErrorCode): error is CmdctxError {
  if (!(error instanceof CmdctxError)) return false;
  return code === undefined || error.code === code;
}
