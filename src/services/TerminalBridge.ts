import { StringDecoder } from 'string_decoder';
import {
  err,
  ok,
  type BridgeState,
  type IoFailure,
  type Result,
  type TargetDescriptor,
  type TerminalBridgeInfo,
} from '../types/Terminal.js';
import { CloseCode, SOCKET_OPEN, type ClientSocket } from '../types/Protocol.js';
import type { RemoteConnection, ShellSession } from './SSHShellClient.js';
import type { RegisteredBridge } from './BridgeRegistry.js';
import type { Logger } from '../utils/logger.js';

export interface TerminalBridgeOptions {
  clientSessionId: string;
  clientId: string;
  target: TargetDescriptor;
  socket: ClientSocket;
  connection: RemoteConnection;
  shell: ShellSession;
  logger: Logger;
  /** Largest text message forwarded to the client, in bytes */
  readChunkSize: number;
  /** Called once, from whichever path tears the bridge down first */
  onClosed?: (bridge: TerminalBridge) => void;
}

function toBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
}

/**
 * One client socket bridged to one remote pty shell. Output is pumped to the
 * socket by a reader started with `start()`; input goes through `sendInput`.
 * Teardown runs once, whether the shell ends or the socket closes first.
 */
export class TerminalBridge implements RegisteredBridge {
  readonly clientSessionId: string;
  readonly clientId: string;
  readonly target: TargetDescriptor;
  readonly openedAt = new Date();

  private _state: BridgeState = 'connected';
  private readonly socket: ClientSocket;
  private readonly connection: RemoteConnection;
  private readonly shell: ShellSession;
  private readonly logger: Logger;
  private readonly readChunkSize: number;
  private readonly onClosed?: (bridge: TerminalBridge) => void;
  private reader: Promise<void> | null = null;
  private resolveClosed: () => void = () => {};

  /** Settles once teardown has finished */
  readonly closed: Promise<void>;

  constructor(options: TerminalBridgeOptions) {
    this.clientSessionId = options.clientSessionId;
    this.clientId = options.clientId;
    this.target = options.target;
    this.socket = options.socket;
    this.connection = options.connection;
    this.shell = options.shell;
    this.logger = options.logger;
    this.readChunkSize = options.readChunkSize;
    this.onClosed = options.onClosed;
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get state(): BridgeState {
    return this._state;
  }

  /** Starts the output reader. Call once, after the bridge is registered. */
  start(): Promise<void> {
    if (!this.reader) {
      this.reader = this.pumpOutput();
    }
    return this.reader;
  }

  async sendInput(data: Buffer): Promise<Result<void, IoFailure>> {
    if (this._state !== 'connected') {
      return err({ kind: 'IoFailure', message: `terminal is ${this._state}` });
    }

    try {
      await this.shell.write(data);
      return ok(undefined);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn({ err: error }, 'Failed writing to remote shell');
      this.close('failed writing to remote shell');
      return err({ kind: 'IoFailure', message });
    }
  }

  /**
   * Tears the bridge down. Returns true only for the call that did the work;
   * later calls are no-ops.
   */
  close(reason: string): boolean {
    if (this._state === 'closing' || this._state === 'closed') {
      return false;
    }
    this._state = 'closing';

    try {
      this.shell.close();
    } catch (error) {
      this.logger.warn({ err: error }, 'Error closing shell channel');
    }

    try {
      this.connection.disconnect();
    } catch (error) {
      this.logger.warn({ err: error }, 'Error disconnecting SSH connection');
    }

    if (this.socket.readyState === SOCKET_OPEN) {
      this.socket.close(CloseCode.Normal, reason);
    }

    this._state = 'closed';
    this.logger.info({ reason }, 'Terminal closed');
    this.onClosed?.(this);
    this.resolveClosed();
    return true;
  }

  info(): TerminalBridgeInfo {
    return {
      sessionId: this.clientSessionId,
      clientId: this.clientId,
      host: this.target.host,
      port: this.target.port,
      username: this.target.username,
      state: this._state,
      openedAt: this.openedAt,
    };
  }

  private async pumpOutput(): Promise<void> {
    const decoder = new StringDecoder('utf8');

    try {
      for await (const chunk of this.shell.output) {
        if (this._state !== 'connected') break;

        const bytes = toBuffer(chunk);
        for (let offset = 0; offset < bytes.length; offset += this.readChunkSize) {
          this.forward(decoder.write(bytes.subarray(offset, offset + this.readChunkSize)));
        }
      }
      this.forward(decoder.end());
      this.close('remote shell exited');
    } catch (error) {
      if (this._state === 'connected') {
        this.logger.warn({ err: error }, 'Failed reading remote shell output');
      }
      this.close('remote shell stream failed');
    }
  }

  private forward(text: string): void {
    if (text.length === 0 || this._state !== 'connected') return;
    if (this.socket.readyState !== SOCKET_OPEN) return;
    this.socket.send(text);
  }
}
