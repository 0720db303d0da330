import Table from 'cli-table3';
import chalk from 'chalk';
import type { HostResult } from '@fleetwatch/shared';
import { alertIcon, formatCpuDisplay } from '../utils/format.js';

export function renderResultTable(results: readonly HostResult[], threshold: number): string {
  const table = new Table({
    head: [
      chalk.bold('host'),
      chalk.bold(''),
      chalk.bold('average'),
      chalk.bold('instant'),
      chalk.bold('samples'),
      chalk.bold('details'),
    ],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const result of results) {
    table.push([
      result.host,
      alertIcon(result),
      formatCpuDisplay(result.average, threshold),
      formatCpuDisplay(result.instant, threshold),
      String(result.samples.length),
      result.details ? (result.error !== undefined ? chalk.red(result.details) : result.details) : chalk.gray('-'),
    ]);
  }

  return table.toString();
}
