import { Command } from 'commander';
import chalk from 'chalk';
import { ConnectionManager } from '../classes/connection-manager';
import { RemoteExecutor } from '../classes/remote-executor';
import {
  ConnectionCliOptions,
  resolveHostKeyPolicy,
  resolveReadyTimeout,
} from '../lib/config';
import { toRemoteHostError } from '../lib/errors';
import { ValidationError } from '../lib/sanitization';

export function addConnectionOptions(command: Command): Command {
  return command
    .option('-H, --host <host>', 'Remote server hostname or IP address')
    .option('-u, --username <username>', 'SSH username')
    .option('-p, --port <port>', 'SSH port (default: 22)')
    .option('--name <name>', 'Server identity (default: the host)')
    .option(
      '--password <password>',
      'SSH password (not recommended for production)'
    )
    .option('--private-key <path>', 'Path to private key file')
    .option('--passphrase <passphrase>', 'Passphrase for private key')
    .option('--sudo-password <password>', 'Password fed to sudo prompts')
    .option(
      '--host-fingerprint <fingerprint>',
      'Expected SHA256 host key fingerprint (default: accept any host)'
    )
    .option(
      '--timeout <timeout>',
      'Connection timeout in milliseconds (default: 10000)'
    );
}

export function createConnectionManager(
  options: ConnectionCliOptions
): ConnectionManager {
  const hostKeyPolicy = resolveHostKeyPolicy(options);
  if (hostKeyPolicy.kind === 'accept-any') {
    console.log(
      chalk.yellow(
        '⚠️  Host key is not verified, pass --host-fingerprint to pin it'
      )
    );
  }

  return new ConnectionManager({
    hostKeyPolicy,
    readyTimeout: resolveReadyTimeout(options),
  });
}

/**
 * @description Runs a command body with a fresh manager and executor, closing every connection afterwards.
 */
export async function withRemote(
  options: ConnectionCliOptions,
  body: (manager: ConnectionManager, executor: RemoteExecutor) => Promise<void>
): Promise<void> {
  const manager = createConnectionManager(options);
  try {
    await body(manager, new RemoteExecutor(manager));
  } finally {
    await manager.disposeAll();
  }
}

export function reportError(action: string, error: unknown): void {
  if (error instanceof ValidationError) {
    console.error(chalk.red(`✗ Validation Error: ${error.message}`));
    return;
  }

  const typed = toRemoteHostError(error);
  console.error(chalk.red(`✗ Error ${action}: ${typed.message}`));
  console.error(chalk.dim(`  code: ${typed.code}`));
}
