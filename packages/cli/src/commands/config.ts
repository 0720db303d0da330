import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, maskSecrets } from '@fleetwatch/core';
import { globalOptions, reportError, setupLogging } from '../utils/cli.js';

export const configCommand = new Command('config')
  .description('Show the resolved configuration with secrets masked')
  .action(async (_options: unknown, command: Command) => {
    const globals = globalOptions(command);
    setupLogging(globals);

    try {
      const { config, source } = await loadConfig({ path: globals.config });
      console.error(chalk.gray(source ? `Config file: ${source}` : 'No config file found, using defaults'));
      console.log(JSON.stringify(maskSecrets(config), null, 2));
    } catch (err) {
      reportError(err);
    }
  });
