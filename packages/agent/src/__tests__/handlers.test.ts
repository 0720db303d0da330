import { describe, it, expect, vi, beforeEach } from 'vitest';

const { currentLoad } = vi.hoisted(() => ({ currentLoad: vi.fn() }));

vi.mock('systeminformation', () => ({
  default: { currentLoad },
}));

vi.mock('node:os', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:os')>();
  return {
    ...actual,
    default: { ...actual, hostname: () => 'web-01', uptime: () => 3600.7 },
  };
});

import { INSTANT_LOAD_WINDOW, cpuCounters, cpuLoad, ping } from '../handlers.js';

describe('cpuCounters', () => {
  beforeEach(() => {
    currentLoad.mockReset();
  });

  it('should report each core and the _Total aggregate', async () => {
    currentLoad.mockResolvedValue({
      currentLoad: 37.5,
      cpus: [{ load: 25 }, { load: 50 }],
    });

    await expect(cpuCounters()).resolves.toEqual({
      samples: [
        { instance: '0', value: 25 },
        { instance: '1', value: 50 },
        { instance: '_Total', value: 37.5 },
      ],
    });
  });

  it('should round readings to two decimals', async () => {
    currentLoad.mockResolvedValue({
      currentLoad: 12.3456,
      cpus: [{ load: 12.3456 }],
    });

    const { samples } = await cpuCounters();
    expect(samples).toEqual([
      { instance: '0', value: 12.35 },
      { instance: '_Total', value: 12.35 },
    ]);
  });

  it('should propagate a failed query', async () => {
    currentLoad.mockRejectedValue(new Error('permission denied'));
    await expect(cpuCounters()).rejects.toThrow('permission denied');
  });
});

describe('cpuLoad', () => {
  beforeEach(() => {
    currentLoad.mockReset();
  });

  it('should report an integer percentage', async () => {
    currentLoad.mockResolvedValue({ currentLoad: 61.6, cpus: [] });
    await expect(cpuLoad()).resolves.toEqual({ load: 62 });
  });

  it('should measure over its own window instead of repeating the last sample', async () => {
    currentLoad
      .mockResolvedValueOnce({ currentLoad: 20.25, cpus: [] })
      .mockResolvedValueOnce({ currentLoad: 74.4, cpus: [] });
    const started = Date.now();

    const result = await cpuLoad();

    expect(result).toEqual({ load: 74 });
    expect(currentLoad).toHaveBeenCalledTimes(2);
    expect(Date.now() - started).toBeGreaterThanOrEqual(INSTANT_LOAD_WINDOW - 5);
  });
});

describe('ping', () => {
  it('should describe the host', async () => {
    await expect(ping()).resolves.toEqual({
      hostname: 'web-01',
      uptime: 3601,
      version: '0.1.0',
    });
  });
});
