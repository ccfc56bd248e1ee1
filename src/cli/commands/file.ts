import { Command } from 'commander';
import chalk from 'chalk';
import {
  RemoteFileResolver,
  redactResourceState,
} from '../../classes/remote-file';
import { ConnectionCliOptions, resolveServer } from '../../lib/config';
import { CommandError } from '../../lib/errors';
import { sanitizeRemotePath } from '../../lib/sanitization';
import { addConnectionOptions, reportError, withRemote } from '../options';

interface FileReadCliOptions extends ConnectionCliOptions {
  path: string;
  privileged?: boolean;
  sensitive?: boolean;
  showSensitive?: boolean;
}

export function registerFileCommands(program: Command) {
  const fileCmd = program
    .command('file')
    .description('Remote file commands');

  // example: npx tsx src/cli/index.ts file read --host 10.0.0.5 --username deploy --password secret --path /etc/hostname
  addConnectionOptions(
    fileCmd
      .command('read')
      .description('Show the identity and content of a remote file')
      .requiredOption('--path <path>', 'Path to the file on the remote host')
      .option('--privileged', 'Read the file through sudo')
      .option('--sensitive', 'Treat the content as sensitive')
      .option('--show-sensitive', 'Print sensitive content instead of hiding it')
  ).action(async (options: FileReadCliOptions) => {
    try {
      const remotePath = sanitizeRemotePath(options.path);
      const server = resolveServer(options);

      await withRemote(options, async (manager, executor) => {
        const resolver = new RemoteFileResolver(manager, executor);
        const state = await resolver.resolve(server, {
          path: remotePath,
          privileged: Boolean(options.privileged),
          sensitive: Boolean(options.sensitive),
        });
        const shown = options.showSensitive ? state : redactResourceState(state);

        console.log(chalk.bold(`\n📄 ${remotePath} on ${server.name}`));
        console.log(`ID: ${shown.id}`);
        if (options.sensitive) {
          console.log(`${chalk.yellow('Sensitive Content:')}\n${shown.sensitiveContent}`);
        } else {
          console.log(`${chalk.green('Content:')}\n${shown.content}`);
        }
      });
    } catch (error) {
      if (error instanceof CommandError) {
        console.error(
          chalk.red(`✗ Unable to get file info: ${error.message}`)
        );
      } else {
        reportError('reading remote file', error);
      }
      process.exitCode = 1;
    }
  });
}
