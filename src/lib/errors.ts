/**
 * Error taxonomy shared by the connection manager, the executor and the
 * remote file resolver.
 */

export type RemoteHostErrorCode =
  | 'CONNECTION_FAILED'
  | 'SESSION_FAILED'
  | 'CONNECTION_NOT_FOUND'
  | 'COMMAND_FAILED'
  | 'EXECUTION_FAILED'
  | 'OUTPUT_MALFORMED'
  | 'FILE_NOT_FOUND'
  | 'IO_ERROR'
  | 'UNKNOWN_ERROR';

export class RemoteHostError extends Error {
  readonly code: RemoteHostErrorCode;

  constructor(message: string, code: RemoteHostErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'RemoteHostError';
    this.code = code;
  }
}

/**
 * @description Returns the message of whatever was thrown.
 */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class ConnectionError extends RemoteHostError {
  /**
   * @param serverName The server identity the connection was opened for.
   * @param target The dial target, `address:port`.
   */
  constructor(
    public readonly serverName: string,
    public readonly target: string,
    cause: unknown
  ) {
    super(
      `unable to connect to ${serverName} (${target}): ${describeCause(cause)}`,
      'CONNECTION_FAILED',
      cause
    );
    this.name = 'ConnectionError';
  }
}

export class SessionError extends RemoteHostError {
  constructor(public readonly serverName: string, cause: unknown) {
    super(
      `unable to execute on ${serverName}: ${describeCause(cause)}`,
      'SESSION_FAILED',
      cause
    );
    this.name = 'SessionError';
  }
}

export class NotFoundError extends RemoteHostError {
  constructor(public readonly serverName: string) {
    super(
      `no connection found for server ${serverName}`,
      'CONNECTION_NOT_FOUND'
    );
    this.name = 'NotFoundError';
  }
}

export class CommandError extends RemoteHostError {
  constructor(
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(`command failed with exit ${exitCode}: ${stderr}`, 'COMMAND_FAILED');
    this.name = 'CommandError';
  }
}

export class RemoteExecutionError extends RemoteHostError {
  constructor(
    public readonly serverName: string,
    public readonly command: string,
    reason: string
  ) {
    super(
      `unable to execute on ${serverName}: ${reason}`,
      'EXECUTION_FAILED'
    );
    this.name = 'RemoteExecutionError';
  }
}

export class OutputFormatError extends RemoteHostError {
  constructor(message: string) {
    super(message, 'OUTPUT_MALFORMED');
    this.name = 'OutputFormatError';
  }
}

export class FileNotFoundError extends RemoteHostError {
  constructor(public readonly path: string) {
    super(`File ${path} not found`, 'FILE_NOT_FOUND');
    this.name = 'FileNotFoundError';
  }
}

export class IOError extends RemoteHostError {
  constructor(public readonly path: string, cause: unknown) {
    super(`Cannot read ${path}: ${describeCause(cause)}`, 'IO_ERROR', cause);
    this.name = 'IOError';
  }
}

/**
 * @description Maps anything thrown into the taxonomy, keeping typed errors as they are.
 */
export function toRemoteHostError(raw: unknown): RemoteHostError {
  if (raw instanceof RemoteHostError) {
    return raw;
  }

  return new RemoteHostError(describeCause(raw), 'UNKNOWN_ERROR', raw);
}
