import {
  DEFAULT_HOST_TIMEOUT_SLACK,
  HostTimeoutError,
  MAX_TIMER_DELAY,
  formatDuration,
  getLogger,
  parseDuration,
} from '@fleetwatch/shared';
import type { HostResult, ValidatedFleetwatchConfig } from '@fleetwatch/shared';

import { monitorHost } from './HostMonitor.js';
import type { MonitorOptions } from './HostMonitor.js';

export interface PollOptions extends Omit<MonitorOptions, 'signal'> {
  hosts: string[];
  /** Deadline per host in ms. Defaults to the sampling window plus one minute. */
  hostTimeout?: number;
  /** Aborts every host still being polled. */
  signal?: AbortSignal;
  onHostComplete?: (result: HostResult) => void;
}

export function pollOptionsFromConfig(config: ValidatedFleetwatchConfig): PollOptions {
  return {
    hosts: config.hosts,
    threshold: config.threshold,
    sampleCount: config.sampleCount,
    sampleInterval: parseDuration(config.sampleInterval),
    hostTimeout: config.hostTimeout !== undefined ? parseDuration(config.hostTimeout) : undefined,
    agentPort: config.agentPort,
    connectTimeout: parseDuration(config.connectTimeout),
    queryTimeout: parseDuration(config.queryTimeout),
    credential: config.auth,
  };
}

/**
 * Deadline per host in ms, clamped to what a timer can hold. Longer values
 * would overflow and fire at once.
 */
export function hostDeadline(options: Pick<PollOptions, 'hostTimeout' | 'sampleCount' | 'sampleInterval'>): number {
  const deadline = options.hostTimeout ?? options.sampleCount * options.sampleInterval + DEFAULT_HOST_TIMEOUT_SLACK;
  return Math.min(deadline, MAX_TIMER_DELAY);
}

/**
 * Poll every host concurrently and wait for all of them. Returns exactly one
 * result per host, in the order the hosts were given.
 */
export async function pollFleet(options: PollOptions): Promise<HostResult[]> {
  const { hosts, hostTimeout, signal, onHostComplete, ...monitorOptions } = options;
  const credential = options.credential ? Object.freeze({ ...options.credential }) : undefined;
  const deadline = hostDeadline(options);

  getLogger().info(
    { hosts: hosts.length, sampleCount: options.sampleCount, deadline },
    'Polling fleet',
  );

  return Promise.all(
    hosts.map(async (host) => {
      const controller = new AbortController();
      const timer = setTimeout(() => {
        controller.abort(new HostTimeoutError(host, formatDuration(deadline)));
      }, deadline);
      const onAbort = (): void => controller.abort(signal?.reason);

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      try {
        const result = await monitorHost(host, {
          ...monitorOptions,
          credential,
          signal: controller.signal,
        });
        onHostComplete?.(result);
        return result;
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      }
    }),
  );
}
