import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { ConnectionManager } from '../../classes/connection-manager';
import { RemoteExecutor } from '../../classes/remote-executor';
import {
  ConnectionCliOptions,
  loadServerGroup,
} from '../../lib/config';
import { sanitizeFilePath } from '../../lib/sanitization';
import { createConnectionManager, reportError } from '../options';

type GroupCliOptions = Pick<
  ConnectionCliOptions,
  'hostFingerprint' | 'timeout'
> & {
  file: string;
  test?: boolean;
};

export function registerGroupCommands(program: Command) {
  const groupCmd = program
    .command('group')
    .description('Server group commands');

  // example: npx tsx src/cli/index.ts group connect --file ./servers.json --test
  groupCmd
    .command('connect')
    .description('Connect to every server of a group and show the connections')
    .requiredOption('-f, --file <path>', 'Server group JSON file')
    .option('--test', 'Run a connection test on every connected server')
    .option(
      '--host-fingerprint <fingerprint>',
      'Expected SHA256 host key fingerprint (default: accept any host)'
    )
    .option(
      '--timeout <timeout>',
      'Connection timeout in milliseconds (default: 10000)'
    )
    .action(async (options: GroupCliOptions) => {
      let manager: ConnectionManager | undefined;
      try {
        const group = loadServerGroup(sanitizeFilePath(options.file, 'group file'));
        manager = createConnectionManager(options);
        const executor = new RemoteExecutor(manager);

        console.log(
          chalk.bold(
            `🔐 Connecting to ${group.servers.length} server(s) of "${group.name}"...`
          )
        );
        const connections = await manager.openAll(group);

        const table = new Table({
          head: ['Server', 'Address', 'User', 'Status', 'Connection ID'],
          colWidths: [20, 24, 12, 12, 40],
        });

        for (const server of group.servers) {
          const connection = connections.find((c) => c.server.name === server.name);
          let status = connection ? chalk.green('CONNECTED') : chalk.red('FAILED');

          if (connection && options.test) {
            const isConnected = await executor.testConnection(server);
            status = isConnected ? chalk.green('TESTED') : chalk.yellow('UNTESTED');
          }

          table.push([
            server.name,
            server.getFullAddress(),
            server.user,
            status,
            connection ? connection.id : server.lastError?.message ?? '-',
          ]);
        }

        console.log(table.toString());
        console.log(
          chalk.dim(
            `\n${connections.length} of ${group.servers.length} server(s) connected`
          )
        );

        if (connections.length < group.servers.length) {
          process.exitCode = 1;
        }
      } catch (error) {
        reportError('connecting server group', error);
        process.exitCode = 1;
      } finally {
        await manager?.disposeAll();
      }
    });
}
