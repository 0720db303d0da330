export type {
  Duration,
  FleetwatchConfig,
  Credential,
  SmtpConfig,
  DiskConfig,
  AgentServerConfig,
} from './config.js';

export type { MetricSample, CounterSample, HostResult, DiskStatus } from './metrics.js';

export type {
  AgentCommand,
  CommandRequest,
  CommandResult,
  CpuCountersResult,
  CpuLoadResult,
  PingResult,
} from './protocol.js';
