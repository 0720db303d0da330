// Types
export type {
  Duration,
  FleetwatchConfig,
  Credential,
  SmtpConfig,
  DiskConfig,
  AgentServerConfig,
  MetricSample,
  CounterSample,
  HostResult,
  DiskStatus,
  AgentCommand,
  CommandRequest,
  CommandResult,
  CpuCountersResult,
  CpuLoadResult,
  PingResult,
} from './types/index.js';

// Constants
export {
  FLEETWATCH_VERSION,
  FLEETWATCH_CONFIG_FILES,
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_DISK_THRESHOLD,
  DEFAULT_SAMPLE_COUNT,
  DEFAULT_SAMPLE_INTERVAL,
  DEFAULT_AGENT_PORT,
  DEFAULT_AGENT_HOST,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_QUERY_TIMEOUT,
  DEFAULT_HOST_TIMEOUT_SLACK,
  MAX_TIMER_DELAY,
  DEFAULT_SMTP_PORT,
  DEFAULT_SMTP_SUBJECT,
  DEFAULT_SMTP_RETRIES,
  DEFAULT_SMTP_RETRY_DELAY,
  TOTAL_INSTANCE,
  AUTH_FAILED_CLOSE_CODE,
  DEFAULT_DISK_MOUNT,
} from './constants.js';

// Schemas
export {
  durationSchema,
  credentialSchema,
  smtpConfigSchema,
  diskConfigSchema,
  agentServerConfigSchema,
  fleetwatchConfigSchema,
} from './schemas/config.schema.js';

export type { ValidatedSmtpConfig, ValidatedFleetwatchConfig } from './schemas/config.schema.js';

export {
  counterSampleSchema,
  commandRequestSchema,
  commandResultSchema,
  cpuCountersResultSchema,
  cpuLoadResultSchema,
  pingResultSchema,
} from './schemas/protocol.schema.js';

// Utilities
export {
  parseDuration,
  formatDuration,
  formatBytes,
  formatPercent,
  roundTo2,
} from './utils/parser.js';

export { createLogger, getLogger, setDefaultLogger, isLogLevel } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  FleetwatchError,
  ConfigValidationError,
  ConfigNotFoundError,
  DiskQueryError,
  ChannelConnectionError,
  ChannelClosedError,
  QueryTimeoutError,
  RemoteCommandError,
  HostTimeoutError,
  AlertDeliveryError,
  MailNotConfiguredError,
  errorMessage,
} from './utils/errors.js';

export { decodeFrame, parseFrame } from './utils/frames.js';
