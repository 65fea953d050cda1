/**
 * Typed errors for the results tooling.
 *
 * - ResultsToolError (base)
 *   - CommandError (child process exited non-zero)
 *   - UsageError (bad flags or values, exit code 2)
 */

export enum ErrorCode {
  COMMAND_FAILED = 'E1001',
  USAGE_INVALID = 'E2001',
}

export class ResultsToolError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'ResultsToolError';
    this.code = code;
  }
}

export class CommandError extends ResultsToolError {
  public readonly exitCode: number;
  public readonly cmd: string[];

  constructor(cmd: string[], exitCode: number, output: string) {
    super(
      ErrorCode.COMMAND_FAILED,
      `Command failed (${exitCode}): ${cmd.join(' ')}\n${output}`
    );
    this.name = 'CommandError';
    this.cmd = cmd;
    this.exitCode = exitCode;
  }
}

export class UsageError extends ResultsToolError {
  constructor(message: string) {
    super(ErrorCode.USAGE_INVALID, message);
    this.name = 'UsageError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}
