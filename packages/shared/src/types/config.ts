export type Duration = string | number;

/**
 * Shape of a fleetwatch.config file. Every field is optional; the schema
 * fills in defaults.
 */
export interface FleetwatchConfig {
  threshold?: number;
  hosts?: string[];
  sampleCount?: number;
  sampleInterval?: Duration;
  hostTimeout?: Duration;
  agentPort?: number;
  connectTimeout?: Duration;
  queryTimeout?: Duration;
  auth?: Credential;
  smtp?: SmtpConfig;
  disk?: DiskConfig;
  agent?: AgentServerConfig;
}

export interface Credential {
  token: string;
}

export interface SmtpConfig {
  server: string;
  port?: number;
  from: string;
  to: string;
  subject?: string;
  secure?: boolean;
  auth?: {
    user: string;
    pass: string;
  };
  retries?: number;
  retryDelay?: Duration;
}

export interface DiskConfig {
  threshold?: number;
  mount?: string;
}

export interface AgentServerConfig {
  host?: string;
  port?: number;
  tokens?: string[];
}
