import { z } from 'zod';

export const counterSampleSchema = z.object({
  instance: z.string(),
  value: z.number(),
});

export const commandRequestSchema = z.object({
  type: z.literal('command'),
  id: z.string().min(1),
  command: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

export const commandResultSchema = z.object({
  type: z.literal('command-result'),
  id: z.string().min(1),
  success: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
});

export const cpuCountersResultSchema = z.object({
  samples: z.array(counterSampleSchema),
});

export const cpuLoadResultSchema = z.object({
  load: z.number().int().min(0),
});

export const pingResultSchema = z.object({
  hostname: z.string(),
  uptime: z.number(),
  version: z.string(),
});
