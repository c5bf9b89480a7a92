/**
 * @opsdeck/shared - Error Classes
 * Structured error handling for opsdeck commands and services
 */

export class OpsError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number = 1,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'OpsError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OpsError);
    }
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      exitCode: this.exitCode,
      details: this.details,
    };
  }
}

/**
 * A local or remote command exited unsuccessfully.
 * `status` is the exit status, or null when the process was killed by a signal.
 */
export class ExecuteError extends OpsError {
  public readonly command: string;
  public readonly status: number | null;
  public readonly signal?: number | string;
  public readonly output?: string;

  constructor(params: { command: string; status: number | null; signal?: number | string; output?: string }) {
    const reason = params.status === null
      ? `was terminated by signal ${params.signal ?? 'unknown'}`
      : `failed with exit status ${params.status}`;
    super(
      `Command \`${params.command}\` ${reason}`,
      'EXECUTE_FAILED',
      params.status ?? 130,
      { command: params.command, status: params.status, signal: params.signal },
    );
    this.name = 'ExecuteError';
    this.command = params.command;
    this.status = params.status;
    this.signal = params.signal;
    this.output = params.output;
  }
}

export class ResolutionError extends OpsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RESOLUTION_FAILED', 1, details);
    this.name = 'ResolutionError';
  }
}

export class ArchiveError extends OpsError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot add ${path} to archive: ${reason}`, 'ARCHIVE_IO', 1, { path });
    this.name = 'ArchiveError';
    this.path = path;
  }
}

export interface HostFailure {
  id: string;
  group: string;
  exitStatus?: number;
  reason?: string;
  /** stdout and stderr lines of the host, in arrival order. */
  output?: string;
}

/** One or more hosts of a fan-out failed; raised after every host has finished. */
export class FanoutError extends OpsError {
  public readonly command: string;
  public readonly failures: HostFailure[];

  constructor(command: string, failures: HostFailure[]) {
    const summary = failures
      .map(f => f.exitStatus !== undefined
        ? `${f.id} (${f.group}) exited with status ${f.exitStatus}`
        : `${f.id} (${f.group}) failed: ${f.reason ?? 'unknown error'}`)
      .join('; ');
    super(
      `Command \`${command}\` failed on ${failures.length} host(s): ${summary}`,
      'FANOUT_FAILED',
      1,
      { command, failures },
    );
    this.name = 'FanoutError';
    this.command = command;
    this.failures = failures;
  }
}

export class UserMessageError extends OpsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'USER_MESSAGE', 1, details);
    this.name = 'UserMessageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
