import os from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import si from 'systeminformation';
import { FLEETWATCH_VERSION, TOTAL_INSTANCE, roundTo2 } from '@fleetwatch/shared';
import type { CpuCountersResult, CpuLoadResult, PingResult } from '@fleetwatch/shared';

/**
 * Processor time per core, plus the `_Total` aggregate, since the previous call.
 */
export async function cpuCounters(): Promise<CpuCountersResult> {
  const load = await si.currentLoad();

  const samples = load.cpus.map((cpu, index) => ({
    instance: String(index),
    value: roundTo2(cpu.load),
  }));
  samples.push({ instance: TOTAL_INSTANCE, value: roundTo2(load.currentLoad) });

  return { samples };
}

/** Length of the measurement behind an instantaneous load reading. */
export const INSTANT_LOAD_WINDOW = 500;

/**
 * Load over a short window of its own. currentLoad() measures since its
 * previous call and answers from cache within 200ms of it, so a single call
 * right after cpu.counters would repeat the last sample.
 */
export async function cpuLoad(): Promise<CpuLoadResult> {
  await si.currentLoad();
  await sleep(INSTANT_LOAD_WINDOW);
  const load = await si.currentLoad();
  return { load: Math.round(load.currentLoad) };
}

export async function ping(): Promise<PingResult> {
  return {
    hostname: os.hostname(),
    uptime: Math.round(os.uptime()),
    version: FLEETWATCH_VERSION,
  };
}
