import { Client, type ClientChannel, type ConnectConfig } from 'ssh2';
import type { Logger } from '../utils/logger.js';

export interface ConnectOptions {
  host: string;
  port: number;
  username: string;
  credential: string;
  /** Covers TCP connect, handshake and authentication */
  connectTimeout: number;
}

/** Interactive pty shell; owned by exactly one bridge */
export interface ShellSession {
  readonly output: AsyncIterable<Buffer | string>;
  /** Resolves once the bytes have been handed to the transport */
  write(data: Buffer): Promise<void>;
  close(): void;
}

export interface RemoteConnection {
  openInteractiveShell(ptyType: string, openTimeout: number): Promise<ShellSession>;
  disconnect(): void;
}

/** Capability the bridge depends on; the SSH protocol itself lives behind it */
export interface RemoteShellClient {
  connect(options: ConnectOptions): Promise<RemoteConnection>;
}

export class ChannelOpenTimeoutError extends Error {
  readonly level = 'client-timeout';

  constructor(timeout: number) {
    super(`Timed out after ${timeout}ms while opening shell channel`);
    this.name = 'ChannelOpenTimeoutError';
  }
}

class SSHShellSession implements ShellSession {
  constructor(private readonly channel: ClientChannel) {}

  get output(): AsyncIterable<Buffer | string> {
    return this.channel;
  }

  write(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.channel.write(data, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(): void {
    this.channel.end();
    this.channel.destroy();
  }
}

class SSHRemoteConnection implements RemoteConnection {
  private closed = false;

  constructor(
    private readonly client: Client,
    private readonly logger: Logger
  ) {}

  openInteractiveShell(ptyType: string, openTimeout: number): Promise<ShellSession> {
    return new Promise((resolve, reject) => {
      let settled = false;

      const timeoutHandle = setTimeout(() => {
        settled = true;
        reject(new ChannelOpenTimeoutError(openTimeout));
      }, openTimeout);

      this.client.shell({ term: ptyType }, (err, stream) => {
        if (settled) {
          // Arrived after the timeout fired; nobody owns it
          if (!err) stream.destroy();
          return;
        }
        settled = true;
        clearTimeout(timeoutHandle);

        if (err) {
          reject(err);
          return;
        }
        resolve(new SSHShellSession(stream));
      });
    });
  }

  disconnect(): void {
    if (this.closed) return;
    this.closed = true;
    this.client.end();
    this.logger.debug('SSH connection ended');
  }
}

export interface SSHShellClientOptions {
  keepaliveInterval: number;
}

/**
 * RemoteShellClient over ssh2. Password authentication; host keys are accepted
 * without verification.
 */
export class SSHShellClient implements RemoteShellClient {
  constructor(
    private readonly logger: Logger,
    private readonly options: SSHShellClientOptions
  ) {}

  connect(options: ConnectOptions): Promise<RemoteConnection> {
    const client = new Client();
    const target = `${options.username}@${options.host}:${options.port}`;
    const log = this.logger.child({ target });

    return new Promise((resolve, reject) => {
      let ready = false;

      client.on('ready', () => {
        ready = true;
        log.info('SSH connected');
        resolve(new SSHRemoteConnection(client, log));
      });

      client.on('error', (err) => {
        if (!ready) {
          reject(err);
          return;
        }
        log.warn({ err }, 'SSH connection error');
      });

      client.on('close', () => {
        if (!ready) {
          reject(new Error(`Connection to ${target} closed before it was ready`));
          return;
        }
        log.debug('SSH connection closed');
      });

      const connectConfig: ConnectConfig = {
        host: options.host,
        port: options.port,
        username: options.username,
        password: options.credential,
        readyTimeout: options.connectTimeout,
        keepaliveInterval: this.options.keepaliveInterval,
      };

      log.info({ timeout: options.connectTimeout }, 'Opening SSH connection');
      try {
        client.connect(connectConfig);
      } catch (err) {
        reject(err);
      }
    });
  }
}
