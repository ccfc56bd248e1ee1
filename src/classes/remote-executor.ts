import type { SSHExecCommandResponse } from 'node-ssh';
import type { ClientChannel, PseudoTtyOptions } from 'ssh2';
import {
  CommandExecutor,
  CommandOutcome,
  CommandResult,
  ExecuteOptions,
  ExitStatus,
} from '../interfaces';
import {
  NotFoundError,
  RemoteExecutionError,
  SessionError,
  describeCause,
} from '../lib/errors';
import { scrubSudoPassword } from '../lib/scrub';
import { Connection, ConnectionManager } from './connection-manager';
import { Server } from './server';

/**
 * sudo only prompts, and only reads a piped password, inside a terminal.
 */
export const TERMINAL: PseudoTtyOptions = {
  term: 'xterm',
  rows: 40,
  cols: 80,
  modes: { ECHO: 1, TTY_OP_ISPEED: 14400, TTY_OP_OSPEED: 14400 },
};

export class RemoteExecutor implements CommandExecutor {
  private connections: ConnectionManager;

  constructor(connections: ConnectionManager) {
    this.connections = connections;
  }

  /**
   * Execute a command on a server whose connection is already open
   *
   * The priming password is written to stdin before anything else and its
   * echo is scrubbed from stdout afterwards. Commands on the same server run
   * one at a time.
   */
  async execute(
    command: string,
    server: Server,
    options: ExecuteOptions = {}
  ): Promise<CommandOutcome> {
    const connection = this.connections.get(server.name);
    if (!connection) {
      throw new NotFoundError(server.name);
    }

    return this.connections.withServerLock(server.name, () =>
      this.run(connection, command, server, options)
    );
  }

  /**
   * Test the connection to the remote server
   */
  async testConnection(server: Server): Promise<boolean> {
    try {
      const { result, error } = await this.execute(
        'echo "Connection test successful"',
        server
      );
      return error === null && result.exitCode === 0;
    } catch (error) {
      console.error(`Connection test failed: ${describeCause(error)}`);
      return false;
    }
  }

  /**
   * Get remote server information
   */
  async getServerInfo(
    server: Server
  ): Promise<{ hostname: string; uptime: string }> {
    const hostname = await this.execute('hostname', server);
    const uptime = await this.execute('uptime', server);

    return {
      hostname: hostname.result.stdout.trim(),
      uptime: uptime.result.stdout.trim(),
    };
  }

  private async run(
    connection: Connection,
    command: string,
    server: Server,
    options: ExecuteOptions
  ): Promise<CommandOutcome> {
    const sudoPassword = options.sudoPassword ?? server.sudoPassword;
    const session: { channel?: ClientChannel } = {};

    let response: SSHExecCommandResponse;
    try {
      response = await connection.ssh.execCommand(command, {
        stdin: `${sudoPassword}\n`,
        execOptions: { pty: TERMINAL },
        noTrim: true,
        onChannel: (channel) => {
          session.channel = channel;
        },
        onStdout: options.onStdout,
        onStderr: options.onStderr,
      });
    } catch (error) {
      throw new SessionError(server.name, error);
    } finally {
      this.releaseSession(server, session.channel);
    }

    const exitStatus = toExitStatus(response.code, response.signal);
    const result: Readonly<CommandResult> = Object.freeze({
      command,
      stdout: scrubSudoPassword(response.stdout, sudoPassword),
      stderr: response.stderr,
      exitCode: exitStatus.kind === 'exited' ? exitStatus.code : 0,
      exitStatus,
    });
    server.recordCommand(result);

    return {
      result,
      error:
        exitStatus.kind === 'exited'
          ? null
          : new RemoteExecutionError(
              server.name,
              command,
              exitStatus.kind === 'signalled'
                ? `terminated by signal ${exitStatus.signal}`
                : 'no exit status received'
            ),
    };
  }

  private releaseSession(server: Server, channel?: ClientChannel): void {
    if (!channel) return;

    try {
      channel.close();
    } catch (error) {
      if (describeCause(error) !== 'EOF') {
        console.error(
          `Failed to close session on ${server.name}: ${describeCause(error)}`
        );
      }
    }
  }
}

export function toExitStatus(
  code: number | null,
  signal: string | null
): ExitStatus {
  if (code !== null) return { kind: 'exited', code };
  if (signal !== null) return { kind: 'signalled', signal };
  return { kind: 'unobserved' };
}
