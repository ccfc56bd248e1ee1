import shellEscape from 'shell-escape';
import {
  CommandExecutor,
  ConnectionOpener,
  RemoteFileOptions,
  ResourceState,
} from '../interfaces';
import { CommandError, OutputFormatError } from '../lib/errors';
import { Server } from './server';

export const ID_SEPARATOR = '-';
export const REDACTED = '(sensitive value)';

/**
 * Reads the identity and content of a remote file in one round trip:
 * `stat` for the inode, `cat` for the body.
 */
export class RemoteFileResolver {
  private connections: ConnectionOpener;
  private executor: CommandExecutor;

  constructor(connections: ConnectionOpener, executor: CommandExecutor) {
    this.connections = connections;
    this.executor = executor;
  }

  /**
   * Resolve the state of a remote file, CommandError when it is missing or unreadable
   */
  async resolve(
    server: Server,
    options: RemoteFileOptions
  ): Promise<ResourceState> {
    await this.connections.open(server);

    const command = buildReadCommand(options.path, options.privileged ?? false);
    const { result, error } = await this.executor.execute(command, server);

    if (error) {
      throw error;
    }
    if (result.exitCode !== 0) {
      throw new CommandError(result.exitCode, result.stderr);
    }

    const { inode, content } = parseReadOutput(result.stdout);
    const id = `${server.address}${ID_SEPARATOR}${inode}`;

    return options.sensitive
      ? { id, content: '', sensitiveContent: content }
      : { id, content, sensitiveContent: '' };
  }
}

export function buildReadCommand(path: string, privileged: boolean): string {
  const sudo = privileged ? 'sudo ' : '';
  const target = shellEscape([path]);
  return `${sudo}stat -c '%i' ${target}; ${sudo}cat ${target}`;
}

/**
 * Split the combined output. Line 0 is left over by the
 * interactive shell, line 1 is the inode, the rest is the file.
 */
export function parseReadOutput(stdout: string): {
  inode: string;
  content: string;
} {
  const lines = stdout.split('\n');
  const inode = (lines[1] ?? '').trim();

  // the output may be file content, keep it out of the message
  if (!/^\d+$/.test(inode)) {
    throw new OutputFormatError(
      `expected an inode on the second line of output (${lines.length} lines received)`
    );
  }

  const content = lines
    .slice(2)
    .join('\n')
    .replace(/\r?\n$/, '');

  return { inode, content };
}

/** Copy of the state that is safe to print or log */
export function redactResourceState(state: ResourceState): ResourceState {
  return {
    ...state,
    sensitiveContent: state.sensitiveContent ? REDACTED : '',
  };
}
