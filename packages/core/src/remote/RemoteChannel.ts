import { randomUUID } from 'node:crypto';
import { WebSocket } from 'ws';
import {
  AUTH_FAILED_CLOSE_CODE,
  ChannelClosedError,
  ChannelConnectionError,
  QueryTimeoutError,
  RemoteCommandError,
  commandResultSchema,
  decodeFrame,
  getLogger,
  parseFrame,
} from '@fleetwatch/shared';
import type { AgentCommand, CommandRequest, Credential } from '@fleetwatch/shared';

/**
 * An open remote-execution session to one host, reused for every query.
 */
export interface RemoteChannel {
  readonly host: string;
  query(command: AgentCommand, params?: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
  close(): void;
}

export interface OpenChannelOptions {
  /** Agent port used when the host target carries none. */
  port: number;
  connectTimeout: number;
  queryTimeout: number;
  signal?: AbortSignal;
}

export type ChannelOpener = (
  host: string,
  credential: Readonly<Credential> | undefined,
  options: OpenChannelOptions,
) => Promise<RemoteChannel>;

export interface HostTarget {
  hostname: string;
  port: number;
}

/**
 * Split `name`, `name:port` or `[v6addr]:port` into hostname and port.
 */
export function parseHostTarget(target: string, defaultPort: number): HostTarget {
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(target);
  if (bracketed) {
    return { hostname: bracketed[1], port: bracketed[2] ? Number(bracketed[2]) : defaultPort };
  }

  const parts = target.split(':');
  if (parts.length === 2 && /^\d+$/.test(parts[1])) {
    return { hostname: parts[0], port: Number(parts[1]) };
  }
  return { hostname: target, port: defaultPort };
}

/**
 * Open a channel and hand it to `use`; the channel is closed whichever way
 * `use` settles.
 */
export async function withChannel<T>(
  open: () => Promise<RemoteChannel>,
  use: (channel: RemoteChannel) => Promise<T>,
): Promise<T> {
  const channel = await open();
  try {
    return await use(channel);
  } finally {
    channel.close();
  }
}

interface PendingQuery {
  command: string;
  resolve: (value: unknown) => void;
  reject: (reason: unknown) => void;
  timer: NodeJS.Timeout;
  cleanup: () => void;
}

/**
 * Channel to a fleetwatch agent over WebSocket. Queries are correlated to
 * results by request id, so several may be in flight at once.
 */
export class WebSocketChannel implements RemoteChannel {
  readonly host: string;
  private ws: WebSocket;
  private queryTimeout: number;
  private pending: Map<string, PendingQuery> = new Map();
  private closeError: Error | null = null;

  private constructor(host: string, ws: WebSocket, queryTimeout: number) {
    this.host = host;
    this.ws = ws;
    this.queryTimeout = queryTimeout;

    ws.on('message', (data: Buffer | ArrayBuffer | Buffer[]) => {
      this.handleMessage(decodeFrame(data));
    });

    ws.on('close', (code: number) => {
      this.closeError =
        code === AUTH_FAILED_CLOSE_CODE
          ? new ChannelConnectionError(host, 'authentication rejected by agent')
          : new ChannelClosedError(host);
      this.rejectAll(this.closeError);
    });

    ws.on('error', (err: Error) => {
      getLogger().warn({ host, err }, 'Channel error');
    });
  }

  static open: ChannelOpener = (host, credential, options) => {
    const { hostname, port } = parseHostTarget(host, options.port);
    const url = `ws://${hostname.includes(':') ? `[${hostname}]` : hostname}:${port}`;
    const { signal } = options;

    return new Promise<RemoteChannel>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      getLogger().debug({ host, url }, 'Opening channel');
      const ws = new WebSocket(url, {
        headers: credential ? { authorization: `Bearer ${credential.token}` } : undefined,
        handshakeTimeout: options.connectTimeout,
      });

      let settled = false;
      const finish = (): boolean => {
        if (settled) return false;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        return true;
      };
      const fail = (reason: unknown): void => {
        if (!finish()) return;
        ws.terminate();
        reject(reason);
      };

      const timer = setTimeout(() => {
        fail(new ChannelConnectionError(host, `connection timed out after ${options.connectTimeout}ms`));
      }, options.connectTimeout);

      const onAbort = (): void => fail(signal?.reason);
      signal?.addEventListener('abort', onAbort, { once: true });

      ws.once('open', () => {
        if (finish()) {
          resolve(new WebSocketChannel(host, ws, options.queryTimeout));
        }
      });
      ws.once('error', (err: Error) => fail(new ChannelConnectionError(host, err.message)));
      ws.once('close', (code: number) => {
        fail(
          new ChannelConnectionError(
            host,
            code === AUTH_FAILED_CLOSE_CODE ? 'authentication rejected by agent' : `closed with code ${code}`,
          ),
        );
      });
    });
  };

  query(command: AgentCommand, params?: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    if (this.closeError) {
      return Promise.reject(this.closeError);
    }
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ChannelClosedError(this.host));
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const request: CommandRequest = { type: 'command', id: randomUUID(), command, params };

    return new Promise<unknown>((resolve, reject) => {
      const onAbort = (): void => {
        this.settle(request.id)?.reject(signal?.reason);
      };

      const timer = setTimeout(() => {
        this.settle(request.id)?.reject(new QueryTimeoutError(this.host, command, this.queryTimeout));
      }, this.queryTimeout);

      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(request.id, {
        command,
        resolve,
        reject,
        timer,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      });

      this.ws.send(JSON.stringify(request), (err) => {
        if (err) {
          this.settle(request.id)?.reject(err);
        }
      });
    });
  }

  close(): void {
    this.rejectAll(new ChannelClosedError(this.host));
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(1000, 'Poll complete');
    }
    getLogger().debug({ host: this.host }, 'Channel closed');
  }

  /** Remove a pending query and release its timer and abort listener. */
  private settle(id: string): PendingQuery | undefined {
    const pending = this.pending.get(id);
    if (!pending) return undefined;

    this.pending.delete(id);
    clearTimeout(pending.timer);
    pending.cleanup();
    return pending;
  }

  private rejectAll(err: Error): void {
    for (const id of [...this.pending.keys()]) {
      this.settle(id)?.reject(err);
    }
  }

  private handleMessage(text: string): void {
    const parsed = commandResultSchema.safeParse(parseFrame(text));
    if (!parsed.success) {
      getLogger().warn({ host: this.host }, 'Ignoring malformed frame from agent');
      return;
    }

    const pending = this.settle(parsed.data.id);
    if (!pending) return;

    if (parsed.data.success) {
      pending.resolve(parsed.data.result);
    } else {
      pending.reject(
        new RemoteCommandError(this.host, pending.command, parsed.data.error ?? 'unknown error'),
      );
    }
  }
}
