import { Command } from 'commander';
import chalk from 'chalk';
import { ConnectionCliOptions, resolveServer } from '../../lib/config';
import { describeCause } from '../../lib/errors';
import { addConnectionOptions, reportError, withRemote } from '../options';

export function registerSSHCommands(program: Command) {
  // example: npx tsx src/cli/index.ts ssh-test --host 127.0.0.1 --username user --password password --port 2222
  addConnectionOptions(
    program
      .command('ssh-test')
      .description('Test SSH connection to remote server')
  ).action(async (options: ConnectionCliOptions) => {
    console.log(chalk.bold('🔐 Testing SSH Connection...'));

    try {
      const server = resolveServer(options);

      console.log(
        chalk.dim(`Connecting to ${server.user}@${server.getFullAddress()}\n`)
      );
      if (server.password) {
        console.log(chalk.yellow('⚠️  Using password authentication'));
      }
      if (server.privateKeyPath) {
        console.log(chalk.blue('🔑 Using private key authentication'));
      }

      await withRemote(options, async (manager, executor) => {
        console.log(chalk.dim('Establishing connection...'));
        const connection = await manager.open(server);

        console.log(chalk.dim('Testing connection...'));
        const isConnected = await executor.testConnection(server);

        if (!isConnected) {
          console.log(chalk.red('❌ SSH connection test failed'));
          process.exitCode = 1;
          return;
        }

        console.log(chalk.green('✅ SSH connection test successful!'));
        console.log(chalk.dim(`Connection ID: ${connection.id}`));

        // Get server info for additional verification
        try {
          const serverInfo = await executor.getServerInfo(server);
          console.log(chalk.dim('\n📋 Server Information:'));
          console.log(chalk.cyan(`   Hostname: ${serverInfo.hostname}`));
          console.log(chalk.cyan(`   Uptime: ${serverInfo.uptime}`));
        } catch (error) {
          console.log(
            chalk.yellow(
              `⚠️  Could not retrieve server information: ${describeCause(error)}`
            )
          );
        }
      });

      console.log(chalk.dim('Connection closed'));
    } catch (error) {
      reportError('testing SSH connection', error);
      process.exitCode = 1;
    }
  });
}
