import type { Command } from 'commander';
import chalk from 'chalk';
import { createLogger, errorMessage, isLogLevel, setDefaultLogger } from '@fleetwatch/shared';
import type { LogLevel } from '@fleetwatch/shared';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

export function globalOptions(command: Command): GlobalOptions {
  const { config, verbose } = command.optsWithGlobals<GlobalOptions>();
  return { config, verbose };
}

/**
 * Resolve the log level: --verbose, then FLEETWATCH_LOG_LEVEL, then the
 * command's own default.
 */
export function resolveLogLevel(
  options: GlobalOptions,
  fallback: LogLevel,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  if (options.verbose) return 'debug';
  const envLevel = env.FLEETWATCH_LOG_LEVEL;
  return envLevel && isLogLevel(envLevel) ? envLevel : fallback;
}

/**
 * Install the process-wide logger. Logs go to stderr so stdout carries only
 * status lines and JSON.
 */
export function setupLogging(options: GlobalOptions, fallback: LogLevel = 'warn'): void {
  setDefaultLogger(
    createLogger({ level: resolveLogLevel(options, fallback), pretty: true, destination: 2 }),
  );
}

export function reportError(err: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(err)}`));
  process.exitCode = 1;
}
