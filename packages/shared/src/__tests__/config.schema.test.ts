import { describe, it, expect } from 'vitest';
import {
  durationSchema,
  smtpConfigSchema,
  diskConfigSchema,
  agentServerConfigSchema,
  fleetwatchConfigSchema,
} from '../schemas/config.schema.js';

describe('durationSchema', () => {
  it('should accept ms strings and numbers', () => {
    expect(durationSchema.safeParse('30s').success).toBe(true);
    expect(durationSchema.safeParse('5m').success).toBe(true);
    expect(durationSchema.safeParse(1500).success).toBe(true);
  });

  it('should reject unparseable strings', () => {
    const result = durationSchema.safeParse('soon');
    expect(result.success).toBe(false);
  });

  it('should reject negative numbers', () => {
    expect(durationSchema.safeParse(-1).success).toBe(false);
  });

  it('should reject durations a timer cannot hold', () => {
    expect(durationSchema.safeParse('24d').success).toBe(true);
    expect(durationSchema.safeParse(2_147_483_647).success).toBe(true);
    expect(durationSchema.safeParse(2_147_483_648).success).toBe(false);

    const result = durationSchema.safeParse('30d');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Duration must be at most 2147483647ms');
    }
  });
});

describe('smtpConfigSchema', () => {
  it('should fill in defaults', () => {
    const result = smtpConfigSchema.safeParse({
      server: 'smtp.example.test',
      from: 'monitor@example.test',
      to: 'ops@example.test',
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.port).toBe(25);
      expect(result.data.subject).toBe('CPU usage alert');
      expect(result.data.secure).toBe(false);
      expect(result.data.retries).toBe(2);
      expect(result.data.retryDelay).toBe('5s');
    }
  });

  it('should require server, from and to', () => {
    const result = smtpConfigSchema.safeParse({ server: 'smtp.example.test' });
    expect(result.success).toBe(false);
  });

  it('should reject out-of-range ports', () => {
    const result = smtpConfigSchema.safeParse({
      server: 'smtp.example.test',
      port: 70000,
      from: 'a@example.test',
      to: 'b@example.test',
    });
    expect(result.success).toBe(false);
  });
});

describe('diskConfigSchema', () => {
  it('should default the threshold to 10', () => {
    const result = diskConfigSchema.parse({});
    expect(result.threshold).toBe(10);
    expect(result.mount).toBeUndefined();
  });

  it('should reject thresholds above 100', () => {
    expect(diskConfigSchema.safeParse({ threshold: 101 }).success).toBe(false);
  });
});

describe('agentServerConfigSchema', () => {
  it('should listen on all interfaces by default', () => {
    expect(agentServerConfigSchema.parse({})).toEqual({
      host: '0.0.0.0',
      port: 9616,
      tokens: [],
    });
  });
});

describe('fleetwatchConfigSchema', () => {
  it('should produce a full config from an empty object', () => {
    const config = fleetwatchConfigSchema.parse({});
    expect(config.threshold).toBe(80);
    expect(config.hosts).toEqual([]);
    expect(config.sampleCount).toBe(60);
    expect(config.sampleInterval).toBe('1m');
    expect(config.hostTimeout).toBeUndefined();
    expect(config.agentPort).toBe(9616);
    expect(config.connectTimeout).toBe('10s');
    expect(config.queryTimeout).toBe('30s');
    expect(config.smtp).toBeUndefined();
    expect(config.disk.threshold).toBe(10);
    expect(config.agent.port).toBe(9616);
  });

  it('should accept the recognized options', () => {
    const result = fleetwatchConfigSchema.safeParse({
      threshold: 75,
      hosts: ['web-01', 'web-02:9700'],
      sampleCount: 12,
      sampleInterval: '5m',
      auth: { token: 'test-secret' },
      smtp: {
        server: 'smtp.example.test',
        port: 587,
        from: 'monitor@example.test',
        to: 'ops@example.test',
        subject: 'High CPU',
      },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.hosts).toEqual(['web-01', 'web-02:9700']);
      expect(result.data.smtp?.port).toBe(587);
      expect(result.data.smtp?.subject).toBe('High CPU');
    }
  });

  it('should reject a sample count of zero', () => {
    expect(fleetwatchConfigSchema.safeParse({ sampleCount: 0 }).success).toBe(false);
  });

  it('should reject empty host names', () => {
    expect(fleetwatchConfigSchema.safeParse({ hosts: ['web-01', ''] }).success).toBe(false);
  });

  it('should reject an empty token', () => {
    expect(fleetwatchConfigSchema.safeParse({ auth: { token: '' } }).success).toBe(false);
  });

  it('should reject a sampling window longer than a timer can hold', () => {
    const result = fleetwatchConfigSchema.safeParse({ sampleCount: 60, sampleInterval: '10h' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.path)).toEqual([['hostTimeout']]);
    }
  });

  it('should accept a long sampling window under an explicit hostTimeout', () => {
    const result = fleetwatchConfigSchema.safeParse({
      sampleCount: 60,
      sampleInterval: '10h',
      hostTimeout: '20d',
    });
    expect(result.success).toBe(true);
  });

  it('should report the path of an invalid field', () => {
    const result = fleetwatchConfigSchema.safeParse({ threshold: 150 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['threshold']);
    }
  });
});
