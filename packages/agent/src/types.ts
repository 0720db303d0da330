export interface MetricsAgentOptions {
  host: string;
  port: number;
  /** Accepted bearer tokens. When empty every client is accepted. */
  tokens: string[];
}

export type CommandHandler = (params: Record<string, unknown>) => Promise<unknown>;
