import chalk from 'chalk';
import type { DiskStatus, HostResult } from '@fleetwatch/shared';
import { formatPercent } from '@fleetwatch/shared';
import { formatDiskStatus } from '@fleetwatch/core';

export { formatPercent };

/** Readings above three quarters of the threshold are shown as a warning. */
const WARN_RATIO = 0.75;

export function formatCpuDisplay(value: number | null, threshold: number): string {
  if (value === null) return chalk.gray('-');
  const str = formatPercent(value);
  if (value > threshold) return chalk.red(str);
  if (value > threshold * WARN_RATIO) return chalk.yellow(str);
  return chalk.green(str);
}

export function alertIcon(result: HostResult): string {
  if (result.error !== undefined) return chalk.red('✗');
  return result.alert ? chalk.red('●') : chalk.green('●');
}

/**
 * One line per host, printed as each host finishes.
 */
export function formatHostProgress(result: HostResult, threshold: number): string {
  if (result.error !== undefined) {
    return `  ${alertIcon(result)} ${result.host}: ${chalk.red(`Error encountered: ${result.error}`)}`;
  }
  return (
    `  ${alertIcon(result)} ${result.host}: ` +
    `average ${formatCpuDisplay(result.average, threshold)}, ` +
    `instant ${formatCpuDisplay(result.instant, threshold)}`
  );
}

export function formatDiskLine(status: DiskStatus): string {
  const line = formatDiskStatus(status);
  return status.belowThreshold ? chalk.yellow(line) : chalk.green(line);
}
