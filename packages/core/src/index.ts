// Configuration
export {
  loadConfig,
  validateConfig,
  findConfigFile,
  readConfigFile,
  maskSecrets,
} from './config/loadConfig.js';
export type { LoadedConfig, LoadConfigOptions } from './config/loadConfig.js';

// Disk
export { checkDisk, formatDiskStatus } from './disk/DiskChecker.js';
export type { DiskCheckOptions } from './disk/DiskChecker.js';

// Remote execution
export { WebSocketChannel, withChannel, parseHostTarget } from './remote/RemoteChannel.js';
export type {
  RemoteChannel,
  ChannelOpener,
  OpenChannelOptions,
  HostTarget,
} from './remote/RemoteChannel.js';

// Polling
export {
  monitorHost,
  averageSamples,
  isOverThreshold,
  formatAlertDetails,
  failureResult,
} from './poller/HostMonitor.js';
export type { MonitorOptions } from './poller/HostMonitor.js';
export { pollFleet, pollOptionsFromConfig, hostDeadline } from './poller/FleetPoller.js';
export type { PollOptions } from './poller/FleetPoller.js';

// Alerts
export { collectAlerts, formatAlertLine, formatAlertBody } from './alerts/AlertReport.js';
export { dispatchAlerts, createMailTransport } from './alerts/AlertDispatcher.js';
export type { AlertMail, MailTransport, DispatchResult } from './alerts/AlertDispatcher.js';
