import type { CounterSample } from './metrics.js';

export type AgentCommand = 'cpu.counters' | 'cpu.load' | 'ping';

export interface CommandRequest {
  type: 'command';
  id: string;
  command: string;
  params?: Record<string, unknown>;
}

export interface CommandResult {
  type: 'command-result';
  id: string;
  success: boolean;
  result?: unknown;
  error?: string;
}

export interface CpuCountersResult {
  samples: CounterSample[];
}

export interface CpuLoadResult {
  load: number;
}

export interface PingResult {
  hostname: string;
  uptime: number;
  version: string;
}
