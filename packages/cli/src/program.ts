import { Command } from 'commander';
import chalk from 'chalk';
import { FLEETWATCH_VERSION } from '@fleetwatch/shared';
import { diskCommand } from './commands/disk.js';
import { pollCommand } from './commands/poll.js';
import { agentCommand } from './commands/agent.js';
import { pingCommand } from './commands/ping.js';
import { configCommand } from './commands/config.js';

export function createProgram(): Command {
  return new Command()
    .name('fleetwatch')
    .version(FLEETWATCH_VERSION, '-v, --version')
    .description(chalk.bold('fleetwatch') + ': disk space checks and fleet CPU polling with mail alerts')
    .option('-c, --config <path>', 'Path to a fleetwatch config file')
    .option('--verbose', 'Log debug output to stderr')
    .addCommand(diskCommand)
    .addCommand(pollCommand)
    .addCommand(agentCommand)
    .addCommand(pingCommand)
    .addCommand(configCommand);
}
