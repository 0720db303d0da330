import { z } from 'zod';
import msLib from 'ms';
import {
  DEFAULT_AGENT_HOST,
  DEFAULT_AGENT_PORT,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_DISK_THRESHOLD,
  DEFAULT_QUERY_TIMEOUT,
  DEFAULT_SAMPLE_COUNT,
  DEFAULT_SAMPLE_INTERVAL,
  DEFAULT_SMTP_PORT,
  DEFAULT_SMTP_RETRIES,
  DEFAULT_SMTP_RETRY_DELAY,
  DEFAULT_SMTP_SUBJECT,
  DEFAULT_HOST_TIMEOUT_SLACK,
  MAX_TIMER_DELAY,
} from '../constants.js';

const TOO_LONG = `Duration must be at most ${MAX_TIMER_DELAY}ms`;

export const durationSchema = z.union([
  z.number().int().min(0).max(MAX_TIMER_DELAY, { message: TOO_LONG }),
  z
    .string()
    .min(1)
    .refine((value) => msLib(value) !== undefined, { message: 'Invalid duration' })
    .refine((value) => (msLib(value) ?? 0) <= MAX_TIMER_DELAY, { message: TOO_LONG }),
]);

function toMs(value: string | number): number | undefined {
  return typeof value === 'number' ? value : msLib(value);
}

const percentSchema = z.number().min(0).max(100);
const portSchema = z.number().int().positive().max(65535);

export const credentialSchema = z.object({
  token: z.string().min(1),
});

export const smtpConfigSchema = z.object({
  server: z.string().min(1),
  port: portSchema.default(DEFAULT_SMTP_PORT),
  from: z.string().min(1),
  to: z.string().min(1),
  subject: z.string().default(DEFAULT_SMTP_SUBJECT),
  secure: z.boolean().default(false),
  auth: z
    .object({
      user: z.string().min(1),
      pass: z.string(),
    })
    .optional(),
  retries: z.number().int().min(0).default(DEFAULT_SMTP_RETRIES),
  retryDelay: durationSchema.default(DEFAULT_SMTP_RETRY_DELAY),
});

export const diskConfigSchema = z.object({
  threshold: percentSchema.default(DEFAULT_DISK_THRESHOLD),
  mount: z.string().min(1).optional(),
});

export const agentServerConfigSchema = z.object({
  host: z.string().min(1).default(DEFAULT_AGENT_HOST),
  port: portSchema.default(DEFAULT_AGENT_PORT),
  tokens: z.array(z.string().min(1)).default([]),
});

export const fleetwatchConfigSchema = z.object({
  threshold: percentSchema.default(DEFAULT_CPU_THRESHOLD),
  hosts: z.array(z.string().min(1)).default([]),
  sampleCount: z.number().int().min(1).default(DEFAULT_SAMPLE_COUNT),
  sampleInterval: durationSchema.default(DEFAULT_SAMPLE_INTERVAL),
  hostTimeout: durationSchema.optional(),
  agentPort: portSchema.default(DEFAULT_AGENT_PORT),
  connectTimeout: durationSchema.default(DEFAULT_CONNECT_TIMEOUT),
  queryTimeout: durationSchema.default(DEFAULT_QUERY_TIMEOUT),
  auth: credentialSchema.optional(),
  smtp: smtpConfigSchema.optional(),
  disk: diskConfigSchema.default({}),
  agent: agentServerConfigSchema.default({}),
}).superRefine((config, ctx) => {
  // The default host deadline is derived from the sampling window.
  if (config.hostTimeout !== undefined) return;
  const interval = toMs(config.sampleInterval);
  if (interval === undefined) return;
  if (config.sampleCount * interval + DEFAULT_HOST_TIMEOUT_SLACK > MAX_TIMER_DELAY) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['hostTimeout'],
      message: `Sampling window exceeds ${MAX_TIMER_DELAY}ms; set a shorter hostTimeout`,
    });
  }
});

export type ValidatedSmtpConfig = z.infer<typeof smtpConfigSchema>;
export type ValidatedFleetwatchConfig = z.infer<typeof fleetwatchConfigSchema>;
