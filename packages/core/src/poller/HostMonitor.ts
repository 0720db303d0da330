import { setTimeout as sleep } from 'node:timers/promises';
import {
  RemoteCommandError,
  TOTAL_INSTANCE,
  cpuCountersResultSchema,
  cpuLoadResultSchema,
  errorMessage,
  formatPercent,
  getLogger,
  roundTo2,
} from '@fleetwatch/shared';
import type { Credential, HostResult, MetricSample } from '@fleetwatch/shared';
import type { z } from 'zod';

import { WebSocketChannel, withChannel } from '../remote/RemoteChannel.js';
import type { ChannelOpener, RemoteChannel } from '../remote/RemoteChannel.js';

export interface MonitorOptions {
  threshold: number;
  sampleCount: number;
  /** Pause between samples, in ms. */
  sampleInterval: number;
  agentPort: number;
  connectTimeout: number;
  queryTimeout: number;
  credential?: Readonly<Credential>;
  signal?: AbortSignal;
  openChannel?: ChannelOpener;
}

/**
 * Arithmetic mean of the samples, rounded to 2 decimals.
 */
export function averageSamples(samples: readonly number[]): number {
  if (samples.length === 0) {
    throw new RangeError('Cannot average an empty sample sequence');
  }
  return roundTo2(samples.reduce((a, b) => a + b, 0) / samples.length);
}

/**
 * Strict comparison: a reading equal to the threshold does not alert.
 */
export function isOverThreshold(average: number, instant: number, threshold: number): boolean {
  return average > threshold || instant > threshold;
}

export function formatAlertDetails(average: number, instant: number): string {
  return `Average CPU: ${formatPercent(average)} | Instant CPU: ${formatPercent(instant)}`;
}

export function failureResult(host: string, message: string, samples: number[] = []): HostResult {
  return {
    host,
    average: null,
    instant: null,
    alert: true,
    details: `Error: ${message}`,
    samples,
    error: message,
  };
}

/**
 * Poll one host: sample CPU `sampleCount` times over a single channel, then
 * take one instantaneous load reading. Never rejects; any failure becomes an
 * alerting result carrying the error message.
 */
export async function monitorHost(host: string, options: MonitorOptions): Promise<HostResult> {
  const logger = getLogger();
  const open = options.openChannel ?? WebSocketChannel.open;
  const { signal } = options;
  const samples: MetricSample[] = [];

  try {
    const instant = await withChannel(
      () =>
        open(host, options.credential, {
          port: options.agentPort,
          connectTimeout: options.connectTimeout,
          queryTimeout: options.queryTimeout,
          signal,
        }),
      async (channel) => {
        for (let index = 0; index < options.sampleCount; index++) {
          const value = await readTotal(channel, signal);
          samples.push({ host, index, value });
          logger.debug({ host, sample: index + 1, of: options.sampleCount, value }, 'CPU sample');

          if (index < options.sampleCount - 1 && options.sampleInterval > 0) {
            await sleep(options.sampleInterval, undefined, { signal });
          }
        }

        const load = await queryValidated(channel, 'cpu.load', cpuLoadResultSchema, signal);
        return load.load;
      },
    );

    const values = samples.map((s) => s.value);
    const average = averageSamples(values);
    const alert = isOverThreshold(average, instant, options.threshold);

    logger.info({ host, average, instant, alert }, 'Host polled');

    return {
      host,
      average,
      instant,
      alert,
      details: alert ? formatAlertDetails(average, instant) : '',
      samples: values,
    };
  } catch (err) {
    // A pending sleep rejects with a generic AbortError; report why it was aborted.
    const cause: unknown = signal?.aborted ? signal.reason : err;
    const message = errorMessage(cause);
    logger.error({ host, err: cause }, `Error encountered: ${message}`);
    return failureResult(
      host,
      message,
      samples.map((s) => s.value),
    );
  }
}

async function readTotal(channel: RemoteChannel, signal: AbortSignal | undefined): Promise<number> {
  const counters = await queryValidated(channel, 'cpu.counters', cpuCountersResultSchema, signal);
  const total = counters.samples.find((s) => s.instance === TOTAL_INSTANCE);
  if (!total) {
    throw new RemoteCommandError(channel.host, 'cpu.counters', `no ${TOTAL_INSTANCE} instance in result`);
  }
  return total.value;
}

async function queryValidated<T extends z.ZodTypeAny>(
  channel: RemoteChannel,
  command: 'cpu.counters' | 'cpu.load',
  schema: T,
  signal: AbortSignal | undefined,
): Promise<z.infer<T>> {
  const parsed = schema.safeParse(await channel.query(command, undefined, signal));
  if (!parsed.success) {
    throw new RemoteCommandError(channel.host, command, 'malformed result');
  }
  return parsed.data;
}
