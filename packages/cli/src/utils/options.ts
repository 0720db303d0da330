import { InvalidArgumentError } from 'commander';
import { MAX_TIMER_DELAY, errorMessage, parseDuration } from '@fleetwatch/shared';

export function parsePercent(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0 || n > 100) {
    throw new InvalidArgumentError('Expected a percentage between 0 and 100.');
  }
  return n;
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError('Expected a whole number of at least 1.');
  }
  return Number(value);
}

export function parsePort(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1 || Number(value) > 65535) {
    throw new InvalidArgumentError('Expected a port between 1 and 65535.');
  }
  return Number(value);
}

/**
 * Duration flag, e.g. `30s` or `1m`. Returned in milliseconds.
 */
export function parseDurationOption(value: string): number {
  let ms: number;
  try {
    ms = parseDuration(value);
  } catch (err) {
    throw new InvalidArgumentError(errorMessage(err));
  }
  if (ms > MAX_TIMER_DELAY) {
    throw new InvalidArgumentError(`Duration must be at most ${MAX_TIMER_DELAY}ms.`);
  }
  return ms;
}

/**
 * Comma-separated host list: `web-01,web-02:9700`.
 */
export function parseHostList(value: string): string[] {
  const hosts = value
    .split(',')
    .map((host) => host.trim())
    .filter((host) => host.length > 0);
  if (hosts.length === 0) {
    throw new InvalidArgumentError('Expected at least one host.');
  }
  return hosts;
}
