export class FleetwatchError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'FleetwatchError';
    this.code = code;
  }
}

export class ConfigValidationError extends FleetwatchError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class ConfigNotFoundError extends FleetwatchError {
  constructor(path: string) {
    super(`Config file not found: ${path}`, 'CONFIG_NOT_FOUND');
    this.name = 'ConfigNotFoundError';
  }
}

export class DiskQueryError extends FleetwatchError {
  constructor(message: string) {
    super(message, 'DISK_QUERY_ERROR');
    this.name = 'DiskQueryError';
  }
}

export class ChannelConnectionError extends FleetwatchError {
  public readonly host: string;

  constructor(host: string, message: string) {
    super(`Failed to connect to ${host}: ${message}`, 'CHANNEL_CONNECTION_ERROR');
    this.name = 'ChannelConnectionError';
    this.host = host;
  }
}

export class ChannelClosedError extends FleetwatchError {
  constructor(host: string) {
    super(`Channel to ${host} is closed`, 'CHANNEL_CLOSED');
    this.name = 'ChannelClosedError';
  }
}

export class QueryTimeoutError extends FleetwatchError {
  constructor(host: string, command: string, timeout: number) {
    super(`Query timed out after ${timeout}ms: ${command} -> ${host}`, 'QUERY_TIMEOUT');
    this.name = 'QueryTimeoutError';
  }
}

export class RemoteCommandError extends FleetwatchError {
  constructor(host: string, command: string, message: string) {
    super(`${command} failed on ${host}: ${message}`, 'REMOTE_COMMAND_ERROR');
    this.name = 'RemoteCommandError';
  }
}

export class HostTimeoutError extends FleetwatchError {
  constructor(host: string, timeout: string) {
    super(`Host ${host} timed out after ${timeout}`, 'HOST_TIMEOUT');
    this.name = 'HostTimeoutError';
  }
}

export class AlertDeliveryError extends FleetwatchError {
  public readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(`Alert mail could not be delivered after ${attempts} attempt(s): ${message}`, 'ALERT_DELIVERY_ERROR');
    this.name = 'AlertDeliveryError';
    this.attempts = attempts;
  }
}

export class MailNotConfiguredError extends FleetwatchError {
  constructor() {
    super('Hosts are alerting but no smtp section is configured', 'MAIL_NOT_CONFIGURED');
    this.name = 'MailNotConfiguredError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
