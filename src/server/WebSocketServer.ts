import { WebSocket, WebSocketServer as WSServer, type RawData } from 'ws';
import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'stream';
import { randomUUID } from 'crypto';
import type { TerminalHandler } from './TerminalHandler.js';
import type { Logger } from '../utils/logger.js';

export interface TerminalSocketServerOptions {
  pathPrefix: string;
  heartbeatInterval: number;
}

/**
 * Extracts the client id from `<prefix>/<clientId>`, ignoring any query string.
 * Returns null for any other path.
 */
export function parseTerminalPath(url: string | undefined, pathPrefix: string): string | null {
  if (!url) return null;

  const { pathname } = new URL(url, 'http://localhost');
  const prefix = pathPrefix.endsWith('/') ? pathPrefix : `${pathPrefix}/`;
  if (!pathname.startsWith(prefix)) return null;

  const rest = pathname.slice(prefix.length);
  if (rest === '' || rest.includes('/')) return null;

  try {
    return decodeURIComponent(rest);
  } catch {
    return null;
  }
}

export function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class TerminalSocketServer {
  private wss: WSServer | null = null;
  private pingInterval: NodeJS.Timeout | null = null;
  private alive = new WeakMap<WebSocket, boolean>();

  constructor(
    private readonly handler: TerminalHandler,
    private readonly logger: Logger,
    private readonly options: TerminalSocketServerOptions
  ) {}

  initialize(server: Server): void {
    const wss = new WSServer({ noServer: true });
    this.wss = wss;

    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      const clientId = parseTerminalPath(req.url, this.options.pathPrefix);
      if (clientId === null) {
        socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
        socket.destroy();
        return;
      }

      wss.handleUpgrade(req, socket, head, (ws) => {
        this.handleConnection(ws, clientId);
      });
    });

    // Heartbeat to detect dead connections
    this.pingInterval = setInterval(() => {
      wss.clients.forEach((ws) => {
        if (!this.alive.get(ws)) {
          ws.terminate();
          return;
        }
        this.alive.set(ws, false);
        ws.ping();
      });
    }, this.options.heartbeatInterval);

    wss.on('close', () => {
      if (this.pingInterval) {
        clearInterval(this.pingInterval);
        this.pingInterval = null;
      }
    });
  }

  private handleConnection(ws: WebSocket, clientId: string): void {
    const sessionId = randomUUID();
    this.alive.set(ws, true);

    this.logger.info({ sessionId, clientId }, 'Terminal socket connected');

    ws.on('pong', () => {
      this.alive.set(ws, true);
    });

    ws.on('message', (data: RawData) => {
      this.handler.handleMessage(sessionId, rawDataToBuffer(data)).catch((err: unknown) => {
        this.logger.error({ sessionId, err }, 'Failed to handle terminal input');
      });
    });

    ws.on('close', (code: number) => {
      this.handler.handleClose(sessionId, code);
    });

    ws.on('error', (err: Error) => {
      this.handler.handleError(ws, sessionId, err);
    });

    this.handler.handleOpen(ws, sessionId, clientId).catch((err: unknown) => {
      this.logger.error({ sessionId, clientId, err }, 'Failed to open terminal');
      ws.close();
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.pingInterval) {
        clearInterval(this.pingInterval);
        this.pingInterval = null;
      }
      if (!this.wss) {
        resolve();
        return;
      }
      for (const ws of this.wss.clients) {
        ws.terminate();
      }
      this.wss.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
