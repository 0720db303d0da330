import { Command } from 'commander';
import chalk from 'chalk';
import { WebSocketChannel, loadConfig, withChannel } from '@fleetwatch/core';
import { errorMessage, parseDuration, pingResultSchema } from '@fleetwatch/shared';
import { globalOptions, setupLogging } from '../utils/cli.js';

export const pingCommand = new Command('ping')
  .argument('<host>', 'Host running the metrics agent, as name or name:port')
  .description('Check that a host answers metric queries')
  .action(async (host: string, _options: unknown, command: Command) => {
    const globals = globalOptions(command);
    setupLogging(globals);

    try {
      const { config } = await loadConfig({ path: globals.config });
      const result = await withChannel(
        () =>
          WebSocketChannel.open(host, config.auth, {
            port: config.agentPort,
            connectTimeout: parseDuration(config.connectTimeout),
            queryTimeout: parseDuration(config.queryTimeout),
          }),
        async (channel) => pingResultSchema.parse(await channel.query('ping')),
      );

      console.log(chalk.green(`\n  Agent on ${host} is alive!`));
      console.log(`  Hostname: ${result.hostname}`);
      console.log(`  Version:  ${result.version}`);
      console.log(`  Uptime:   ${result.uptime}s\n`);
    } catch (err) {
      console.log(chalk.red(`\n  Agent on ${host} is not reachable: ${errorMessage(err)}\n`));
      process.exitCode = 1;
    }
  });
