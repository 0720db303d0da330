import { EventEmitter } from 'node:events';
import type { IncomingMessage } from 'node:http';
import { WebSocketServer, WebSocket } from 'ws';
import {
  AUTH_FAILED_CLOSE_CODE,
  commandRequestSchema,
  decodeFrame,
  errorMessage,
  getLogger,
  parseFrame,
} from '@fleetwatch/shared';
import type { AgentCommand, CommandResult } from '@fleetwatch/shared';

import type { CommandHandler, MetricsAgentOptions } from './types.js';
import { parseBearerToken, verifyToken } from './auth.js';
import { cpuCounters, cpuLoad, ping } from './handlers.js';

/**
 * Agent that runs on each monitored host. Serves metric queries to pollers
 * over WebSocket, one JSON command frame in, one command-result frame out.
 */
export class MetricsAgent extends EventEmitter {
  private options: MetricsAgentOptions;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private commandHandlers: Map<string, CommandHandler> = new Map();

  constructor(options: MetricsAgentOptions) {
    super();
    this.options = options;

    const builtins: Record<AgentCommand, CommandHandler> = {
      'cpu.counters': cpuCounters,
      'cpu.load': cpuLoad,
      ping,
    };
    for (const [command, handler] of Object.entries(builtins)) {
      this.registerCommandHandler(command, handler);
    }
  }

  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      try {
        this.wss = new WebSocketServer({ host: this.options.host, port: this.options.port });
      } catch (err) {
        reject(err);
        return;
      }

      let listening = false;

      this.wss.on('listening', () => {
        listening = true;
        getLogger().info(
          { host: this.options.host, port: this.options.port, auth: this.options.tokens.length > 0 },
          'Metrics agent listening',
        );
        this.emit('started');
        resolve();
      });

      this.wss.on('error', (err: Error) => {
        if (!listening) {
          // e.g. EADDRINUSE: the caller sees it through start()
          this.wss = null;
          reject(err);
          return;
        }
        getLogger().error({ err }, 'Metrics agent server error');
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
      });

      this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
        this.handleConnection(ws, req);
      });
    });
  }

  async stop(): Promise<void> {
    for (const ws of this.clients) {
      ws.close(1001, 'Agent shutting down');
    }
    this.clients.clear();

    return new Promise<void>((resolve) => {
      if (!this.wss) {
        resolve();
        return;
      }
      this.wss.close(() => {
        this.wss = null;
        getLogger().info('Metrics agent stopped');
        this.emit('stopped');
        resolve();
      });
    });
  }

  registerCommandHandler(command: string, handler: CommandHandler): void {
    this.commandHandlers.set(command, handler);
  }

  getClientCount(): number {
    return this.clients.size;
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const remote = req.socket?.remoteAddress;

    if (this.options.tokens.length > 0) {
      const token = parseBearerToken(req.headers.authorization);
      if (!token || !verifyToken(token, this.options.tokens)) {
        getLogger().warn({ remote }, 'Rejected poller with invalid token');
        ws.close(AUTH_FAILED_CLOSE_CODE, 'Unauthorized');
        return;
      }
    }

    this.clients.add(ws);
    getLogger().debug({ remote }, 'Poller connected');
    this.emit('connection', remote);

    ws.on('message', (data: Buffer | ArrayBuffer | Buffer[]) => {
      void this.handleMessage(ws, decodeFrame(data));
    });

    ws.on('close', () => {
      this.clients.delete(ws);
      getLogger().debug({ remote }, 'Poller disconnected');
    });

    ws.on('error', (err: Error) => {
      getLogger().warn({ err, remote }, 'Poller connection error');
    });
  }

  private async handleMessage(ws: WebSocket, text: string): Promise<void> {
    const parsed = commandRequestSchema.safeParse(parseFrame(text));
    if (!parsed.success) {
      getLogger().warn('Ignoring malformed command frame');
      return;
    }

    const { id, command, params = {} } = parsed.data;
    const response: CommandResult = { type: 'command-result', id, success: false };

    const handler = this.commandHandlers.get(command);
    if (!handler) {
      response.error = `Unknown command: ${command}`;
    } else {
      try {
        response.result = await handler(params);
        response.success = true;
      } catch (err) {
        response.error = errorMessage(err);
        getLogger().error({ err, command }, 'Command failed');
      }
    }

    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(response));
    }
  }
}
