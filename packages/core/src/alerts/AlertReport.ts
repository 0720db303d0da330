import type { HostResult } from '@fleetwatch/shared';

/**
 * The alert batch: results flagged for notification, in result order.
 */
export function collectAlerts(results: readonly HostResult[]): HostResult[] {
  return results.filter((result) => result.alert);
}

export function formatAlertLine(result: HostResult): string {
  return `${result.host}: ${result.details}`;
}

/**
 * Mail body with one line per alerting host.
 */
export function formatAlertBody(alerts: readonly HostResult[]): string {
  return alerts.map(formatAlertLine).join('\n');
}
