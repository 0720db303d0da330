export { MetricsAgent } from './MetricsAgent.js';
export { generateToken, parseBearerToken, verifyToken } from './auth.js';
export { cpuCounters, cpuLoad, ping } from './handlers.js';

export type { MetricsAgentOptions, CommandHandler } from './types.js';
