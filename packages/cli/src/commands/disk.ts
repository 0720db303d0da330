import { Command } from 'commander';
import { checkDisk, loadConfig } from '@fleetwatch/core';
import { formatDiskLine } from '../utils/format.js';
import { globalOptions, reportError, setupLogging } from '../utils/cli.js';
import { parsePercent } from '../utils/options.js';

interface DiskCommandOptions {
  threshold?: number;
  mount?: string;
  json?: boolean;
}

export const diskCommand = new Command('disk')
  .option('-t, --threshold <percent>', 'Warn when free space falls below this percentage', parsePercent)
  .option('-m, --mount <path>', 'Mount point of the volume to check')
  .option('--json', 'Output as JSON')
  .description('Check free space on the local primary volume')
  .action(async (options: DiskCommandOptions, command: Command) => {
    const globals = globalOptions(command);
    setupLogging(globals);

    try {
      const { config } = await loadConfig({ path: globals.config });
      const status = await checkDisk({
        threshold: options.threshold ?? config.disk.threshold,
        mount: options.mount ?? config.disk.mount,
      });

      if (options.json) {
        console.log(JSON.stringify(status, null, 2));
        return;
      }

      console.log(formatDiskLine(status));
    } catch (err) {
      reportError(err);
    }
  });
