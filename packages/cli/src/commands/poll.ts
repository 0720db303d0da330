import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { dispatchAlerts, loadConfig, pollFleet, pollOptionsFromConfig } from '@fleetwatch/core';
import type { HostResult } from '@fleetwatch/shared';
import { renderResultTable } from '../ui/Table.js';
import { formatHostProgress } from '../utils/format.js';
import { globalOptions, reportError, setupLogging } from '../utils/cli.js';
import {
  parseDurationOption,
  parseHostList,
  parsePercent,
  parsePositiveInt,
} from '../utils/options.js';

interface PollCommandOptions {
  threshold?: number;
  hosts?: string[];
  samples?: number;
  interval?: number;
  timeout?: number;
  json?: boolean;
}

export const pollCommand = new Command('poll')
  .option('-t, --threshold <percent>', 'CPU percentage that triggers an alert', parsePercent)
  .option('-H, --hosts <list>', 'Comma-separated hosts to poll', parseHostList)
  .option('-s, --samples <n>', 'Samples taken per host', parsePositiveInt)
  .option('-i, --interval <duration>', 'Pause between samples (e.g. 1m, 30s)', parseDurationOption)
  .option('--timeout <duration>', 'Deadline for each host', parseDurationOption)
  .option('--json', 'Output as JSON')
  .description('Sample CPU on every host and mail one alert for the overloaded ones')
  .action(async (options: PollCommandOptions, command: Command) => {
    const globals = globalOptions(command);
    setupLogging(globals);

    const controller = new AbortController();
    const onSigint = (): void => controller.abort(new Error('Interrupted'));
    process.once('SIGINT', onSigint);

    const spinner = options.json ? null : ora('Loading configuration...').start();

    try {
      const { config } = await loadConfig({
        path: globals.config,
        overrides: {
          threshold: options.threshold,
          hosts: options.hosts,
          sampleCount: options.samples,
          sampleInterval: options.interval,
          hostTimeout: options.timeout,
        },
      });

      if (config.hosts.length === 0) {
        spinner?.fail('No hosts to poll. Pass --hosts or set "hosts" in fleetwatch.config.json');
        process.exitCode = 1;
        return;
      }

      const total = config.hosts.length;
      let done = 0;
      const onHostComplete = (result: HostResult): void => {
        done++;
        if (!spinner) return;
        spinner.stop();
        console.log(formatHostProgress(result, config.threshold));
        if (done < total) spinner.start(`Polling ${total - done} of ${total} host(s)...`);
      };

      spinner?.start(`Polling ${total} host(s), ${config.sampleCount} sample(s) each...`);
      const results = await pollFleet({
        ...pollOptionsFromConfig(config),
        signal: controller.signal,
        onHostComplete,
      });

      // Every host reads as failed after Ctrl-C; mailing them would be a false alarm.
      if (controller.signal.aborted) {
        const message = 'Polling interrupted. No alert sent.';
        if (spinner) {
          spinner.warn(message);
        } else {
          console.error(chalk.yellow(message));
        }
        process.exitCode = 130;
        return;
      }

      if (!options.json) {
        console.log(renderResultTable(results, config.threshold));
      }

      const outcome = await dispatchAlerts(results, config.smtp);

      if (options.json) {
        console.log(
          JSON.stringify(
            {
              threshold: config.threshold,
              results,
              alerts: outcome.alerts.map((result) => result.host),
              mailed: outcome.sent,
            },
            null,
            2,
          ),
        );
        return;
      }

      if (outcome.sent) {
        console.log(chalk.yellow(`Alert mail sent for ${outcome.alerts.length} host(s).`));
      } else {
        console.log(chalk.green(`All hosts are within the ${config.threshold}% threshold. No alert sent.`));
      }
    } catch (err) {
      spinner?.stop();
      reportError(err);
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  });
