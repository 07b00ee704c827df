export enum WifiErrorCode {
  // Radio Errors (10xx)
  RADIO_DISABLED = 1001,
  RADIO_STATE_UNAVAILABLE = 1002,

  // Profile Errors (11xx)
  PROFILE_CREATION_FAILED = 1101,

  // Command Errors (12xx)
  CONNECT_EXECUTION_FAILED = 1201,
  DISCONNECT_EXECUTION_FAILED = 1202,
  SCAN_EXECUTION_FAILED = 1203,

  // Configuration Errors (2xxx)
  CONFIG_INVALID = 2001,
  UNSUPPORTED_PLATFORM = 2002,

  // General Errors (9xxx)
  UNKNOWN_ERROR = 9000,
  INVALID_PARAMETER = 9002,
}

export interface WifiErrorDetails {
  code: WifiErrorCode;
  name: string;
  message: string;
  context?: Record<string, unknown> | undefined;
  timestamp: string;
}

export class WifiError extends Error {
  readonly code: WifiErrorCode;
  readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly timestamp: Date;

  constructor(
    code: WifiErrorCode,
    message: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'WifiError';
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;
    this.timestamp = new Date();

    Error.captureStackTrace?.(this, WifiError);
  }

  toJSON(): WifiErrorDetails {
    return {
      code: this.code,
      name: WifiErrorCode[this.code],
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }

  static fromError(err: unknown, code: WifiErrorCode = WifiErrorCode.UNKNOWN_ERROR): WifiError {
    if (err instanceof WifiError) return err;
    if (err instanceof Error) return new WifiError(code, err.message, { cause: err });
    return new WifiError(code, String(err));
  }
}

/**
 * Raised by a ProcessExecutor when the command could not be run at all
 * (missing binary, permission denied). A command that ran and exited
 * non-zero is not an execution error.
 */
export class CommandExecutionError extends Error {
  readonly command: string;
  readonly args: readonly string[];
  readonly cause?: Error | undefined;

  constructor(command: string, args: readonly string[], cause?: Error) {
    super(`Failed to run ${command}: ${cause?.message ?? 'unknown error'}`);
    this.name = 'CommandExecutionError';
    this.command = command;
    this.args = args;
    this.cause = cause;
  }
}

/**
 * Wraps a failed command invocation in a WifiError of the given kind.
 */
export function executionFailure(
  code: WifiErrorCode,
  operation: string,
  error: unknown
): WifiError {
  const cause = error instanceof Error ? error : new Error(String(error));
  const context: Record<string, unknown> = { operation };
  if (error instanceof CommandExecutionError) {
    context['command'] = error.command;
  }
  return new WifiError(code, `${operation} failed: ${cause.message}`, { cause, context });
}

export function getErrorCode(error: unknown): WifiErrorCode | undefined {
  if (error instanceof WifiError) {
    return error.code;
  }
  return undefined;
}
