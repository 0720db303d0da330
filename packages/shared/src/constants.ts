import { platform } from 'node:os';

export const FLEETWATCH_VERSION = '0.1.0';

export const FLEETWATCH_CONFIG_FILES = [
  'fleetwatch.config.json',
  'fleetwatch.config.js',
  'fleetwatch.config.mjs',
];

export const DEFAULT_CPU_THRESHOLD = 80;
export const DEFAULT_DISK_THRESHOLD = 10;
export const DEFAULT_SAMPLE_COUNT = 60;
export const DEFAULT_SAMPLE_INTERVAL = '1m';
export const DEFAULT_AGENT_PORT = 9616;
export const DEFAULT_AGENT_HOST = '0.0.0.0';
export const DEFAULT_CONNECT_TIMEOUT = '10s';
export const DEFAULT_QUERY_TIMEOUT = '30s';
/** Added to sampleCount × sampleInterval when no hostTimeout is configured. */
export const DEFAULT_HOST_TIMEOUT_SLACK = 60_000;
/** Largest delay a Node.js timer accepts, about 24.8 days. */
export const MAX_TIMER_DELAY = 2_147_483_647;

export const DEFAULT_SMTP_PORT = 25;
export const DEFAULT_SMTP_SUBJECT = 'CPU usage alert';
export const DEFAULT_SMTP_RETRIES = 2;
export const DEFAULT_SMTP_RETRY_DELAY = '5s';

export const TOTAL_INSTANCE = '_Total';
export const AUTH_FAILED_CLOSE_CODE = 4401;

export const DEFAULT_DISK_MOUNT = platform() === 'win32' ? 'C:' : '/';
