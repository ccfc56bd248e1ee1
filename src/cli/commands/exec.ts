import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { ConnectionCliOptions, resolveServer } from '../../lib/config';
import { sanitizeCommand } from '../../lib/sanitization';
import { addConnectionOptions, reportError, withRemote } from '../options';

interface ExecCliOptions extends ConnectionCliOptions {
  command: string[];
  quiet?: boolean;
}

export function registerExecCommands(program: Command) {
  // example: npx tsx src/cli/index.ts exec --host 10.0.0.5 --username deploy --private-key ~/.ssh/id_ed25519 -c "uptime" "sudo systemctl status nginx"
  addConnectionOptions(
    program
      .command('exec')
      .description('Run commands on a remote server, one after the other')
      .requiredOption('-c, --command <command...>', 'Commands to execute')
      .option('-q, --quiet', 'Only print the history table')
  ).action(async (options: ExecCliOptions) => {
    try {
      const commands = options.command.map(sanitizeCommand);
      const server = resolveServer(options);

      await withRemote(options, async (manager, executor) => {
        await manager.open(server);

        for (const command of commands) {
          const { result, error } = await executor.execute(command, server);

          if (!options.quiet) {
            console.log(chalk.bold(`\n$ ${command}`));
            if (result.stdout) {
              console.log(`${chalk.green('STDOUT:')}\n${result.stdout}`);
            }
            if (result.stderr) {
              console.log(`${chalk.red('STDERR:')}\n${result.stderr}`);
            }
          }
          if (error) {
            console.error(chalk.red(`✗ ${error.message}`));
          }
        }

        const table = new Table({
          head: ['#', 'Command', 'Exit Code', 'Status', 'Output Lines'],
          colWidths: [5, 30, 11, 12, 14],
        });

        server.history.forEach((result, index) => {
          const status =
            result.exitStatus.kind === 'exited'
              ? result.exitCode === 0
                ? chalk.green('OK')
                : chalk.red('FAILED')
              : chalk.magenta(result.exitStatus.kind.toUpperCase());

          table.push([
            index + 1,
            result.command.length > 27
              ? result.command.substring(0, 27) + '...'
              : result.command,
            result.exitCode,
            status,
            result.stdout ? result.stdout.split('\n').length : 0,
          ]);
        });

        console.log(chalk.bold(`\n📋 History for ${server.name}:`));
        console.log(table.toString());

        if (server.history.some((result) => result.exitCode !== 0)) {
          process.exitCode = 1;
        }
      });
    } catch (error) {
      reportError('executing commands', error);
      process.exitCode = 1;
    }
  });
}
