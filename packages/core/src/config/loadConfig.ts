import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  ConfigNotFoundError,
  ConfigValidationError,
  FLEETWATCH_CONFIG_FILES,
  errorMessage,
  fleetwatchConfigSchema,
} from '@fleetwatch/shared';
import type { FleetwatchConfig, ValidatedFleetwatchConfig } from '@fleetwatch/shared';

export interface LoadedConfig {
  config: ValidatedFleetwatchConfig;
  /** Absolute path of the file read, or null when running on defaults. */
  source: string | null;
}

export interface LoadConfigOptions {
  /** Explicit config path; when omitted the working directory is searched. */
  path?: string;
  cwd?: string;
  /** Top-level values that take precedence over the file, e.g. CLI flags. */
  overrides?: FleetwatchConfig;
  env?: NodeJS.ProcessEnv;
}

const MASK = '********';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function findConfigFile(cwd: string = process.cwd()): string | null {
  for (const file of FLEETWATCH_CONFIG_FILES) {
    const candidate = resolve(cwd, file);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

export async function readConfigFile(path: string): Promise<unknown> {
  if (extname(path) === '.json') {
    const text = await readFile(path, 'utf-8');
    try {
      return JSON.parse(text) as unknown;
    } catch (err) {
      throw new ConfigValidationError([`${path}: ${errorMessage(err)}`]);
    }
  }

  const mod: unknown = await import(pathToFileURL(path).href);
  return isRecord(mod) && 'default' in mod ? mod.default : mod;
}

/**
 * Validate a raw configuration object, filling in defaults. The agent token
 * falls back to FLEETWATCH_TOKEN when the file has none.
 */
export function validateConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): ValidatedFleetwatchConfig {
  const result = fleetwatchConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const config = result.data;
  if (!config.auth && env.FLEETWATCH_TOKEN) {
    config.auth = { token: env.FLEETWATCH_TOKEN };
  }
  return config;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();

  let source: string | null;
  if (options.path) {
    source = resolve(cwd, options.path);
    if (!existsSync(source)) {
      throw new ConfigNotFoundError(source);
    }
  } else {
    source = findConfigFile(cwd);
  }

  const raw = source ? await readConfigFile(source) : {};
  const merged = isRecord(raw) && options.overrides ? { ...raw, ...stripUndefined(options.overrides) } : raw;

  return { config: validateConfig(merged, options.env), source };
}

/**
 * Copy of the config with tokens and passwords replaced, for display.
 */
export function maskSecrets(config: ValidatedFleetwatchConfig): ValidatedFleetwatchConfig {
  return {
    ...config,
    auth: config.auth ? { token: MASK } : undefined,
    smtp: config.smtp
      ? {
          ...config.smtp,
          auth: config.smtp.auth ? { user: config.smtp.auth.user, pass: MASK } : undefined,
        }
      : undefined,
    agent: { ...config.agent, tokens: config.agent.tokens.map(() => MASK) },
  };
}

function stripUndefined(values: FleetwatchConfig): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}
