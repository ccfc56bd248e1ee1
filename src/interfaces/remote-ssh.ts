import type { HostKeyPolicy } from '../lib/host-key';
import type { RemoteExecutionError } from '../lib/errors';
import type { Server } from '../classes/server';
import type { Connection } from '../classes/connection-manager';

export interface ConnectionManagerOptions {
  /**
   * @description How the identity of the responding host is checked.
   */
  hostKeyPolicy: HostKeyPolicy;
  /**
   * @description The dial and handshake timeout in milliseconds, 10000 when omitted.
   */
  readyTimeout?: number;
}

export type ExitStatus =
  | { kind: 'exited'; code: number }
  | { kind: 'signalled'; signal: string }
  | { kind: 'unobserved' };

export interface CommandResult {
  command: string;
  stdout: string;
  stderr: string;
  /**
   * @description The remote exit code, 0 when the process exited cleanly or no exit status was observed.
   */
  exitCode: number;
  exitStatus: ExitStatus;
}

export interface CommandOutcome {
  result: Readonly<CommandResult>;
  /**
   * @description Set when the run ended without an exit status, null otherwise.
   */
  error: RemoteExecutionError | null;
}

export interface ExecuteOptions {
  /**
   * @description The password primed on stdin and scrubbed from stdout. Defaults to the server's sudo password.
   */
  sudoPassword?: string;
  onStdout?: (chunk: Buffer) => void;
  onStderr?: (chunk: Buffer) => void;
}

/**
 * @description Runs one command against a server that already has an open connection.
 */
export interface CommandExecutor {
  execute(
    command: string,
    server: Server,
    options?: ExecuteOptions
  ): Promise<CommandOutcome>;
}

/**
 * @description Hands out the connection of a server, opening it when needed.
 */
export interface ConnectionOpener {
  open(server: Server): Promise<Connection>;
}
