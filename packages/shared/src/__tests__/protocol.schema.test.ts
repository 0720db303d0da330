import { describe, it, expect } from 'vitest';
import {
  commandRequestSchema,
  commandResultSchema,
  cpuCountersResultSchema,
  cpuLoadResultSchema,
  pingResultSchema,
} from '../schemas/protocol.schema.js';

describe('commandRequestSchema', () => {
  it('should accept a command frame', () => {
    const result = commandRequestSchema.safeParse({
      type: 'command',
      id: 'req-1',
      command: 'cpu.counters',
    });
    expect(result.success).toBe(true);
  });

  it('should accept params as a record', () => {
    const result = commandRequestSchema.safeParse({
      type: 'command',
      id: 'req-1',
      command: 'ping',
      params: { verbose: true },
    });
    expect(result.success).toBe(true);
  });

  it('should reject a frame with another type', () => {
    const result = commandRequestSchema.safeParse({
      type: 'command-result',
      id: 'req-1',
      command: 'ping',
    });
    expect(result.success).toBe(false);
  });

  it('should reject a missing id', () => {
    expect(commandRequestSchema.safeParse({ type: 'command', command: 'ping' }).success).toBe(false);
  });
});

describe('commandResultSchema', () => {
  it('should accept a successful result', () => {
    const result = commandResultSchema.safeParse({
      type: 'command-result',
      id: 'req-1',
      success: true,
      result: { load: 12 },
    });
    expect(result.success).toBe(true);
  });

  it('should accept a failed result with an error', () => {
    const result = commandResultSchema.safeParse({
      type: 'command-result',
      id: 'req-1',
      success: false,
      error: 'Unknown command: reboot',
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.error).toBe('Unknown command: reboot');
    }
  });

  it('should require the success flag', () => {
    expect(commandResultSchema.safeParse({ type: 'command-result', id: 'req-1' }).success).toBe(
      false,
    );
  });
});

describe('result payloads', () => {
  it('should validate counter samples', () => {
    const result = cpuCountersResultSchema.safeParse({
      samples: [
        { instance: '0', value: 12.5 },
        { instance: '_Total', value: 12.5 },
      ],
    });
    expect(result.success).toBe(true);
  });

  it('should reject counter samples without a value', () => {
    expect(cpuCountersResultSchema.safeParse({ samples: [{ instance: '0' }] }).success).toBe(false);
  });

  it('should require an integer load', () => {
    expect(cpuLoadResultSchema.safeParse({ load: 42 }).success).toBe(true);
    expect(cpuLoadResultSchema.safeParse({ load: 42.5 }).success).toBe(false);
  });

  it('should validate ping results', () => {
    expect(
      pingResultSchema.safeParse({ hostname: 'web-01', uptime: 120, version: '0.1.0' }).success,
    ).toBe(true);
  });
});
