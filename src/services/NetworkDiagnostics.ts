import { execFile as execFileCallback } from 'child_process';
import { promises as dns } from 'dns';
import { createConnection } from 'net';
import { hostname, networkInterfaces, platform } from 'os';
import { promisify } from 'util';
import type { TargetDescriptor } from '../types/Terminal.js';
import type { Logger } from '../utils/logger.js';

const execFile = promisify(execFileCallback);

export type StepResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export interface LocalHostIdentity {
  hostname: string;
  address?: string;
}

export interface NameResolution {
  address: string;
  canonicalName?: string;
}

export interface DiagnosticReport {
  target: string;
  localHost: StepResult<LocalHostIdentity>;
  reachable: StepResult<boolean>;
  resolution: StepResult<NameResolution>;
  portOpen: StepResult<boolean>;
}

/** Network primitives the probe relies on; swapped out in tests */
export interface ProbeNetwork {
  localIdentity(): LocalHostIdentity;
  ping(host: string, timeout: number): Promise<boolean>;
  resolve(host: string): Promise<NameResolution>;
  tcpConnect(host: string, port: number, timeout: number): Promise<void>;
}

export interface DiagnosticProbe {
  run(target: TargetDescriptor): Promise<DiagnosticReport>;
}

export interface NetworkDiagnosticsOptions {
  pingTimeout: number;
  tcpTimeout: number;
}

function firstExternalIPv4(): string | undefined {
  for (const addresses of Object.values(networkInterfaces())) {
    for (const addr of addresses ?? []) {
      if (addr.family === 'IPv4' && !addr.internal) return addr.address;
    }
  }
  return undefined;
}

function pingArgs(host: string, timeout: number): string[] {
  switch (platform()) {
    case 'win32':
      return ['-n', '1', '-w', String(timeout), host];
    case 'darwin':
      return ['-c', '1', '-W', String(timeout), host];
    default:
      return ['-c', '1', '-W', String(Math.max(1, Math.ceil(timeout / 1000))), host];
  }
}

export const systemNetwork: ProbeNetwork = {
  localIdentity() {
    return { hostname: hostname(), address: firstExternalIPv4() };
  },

  async ping(host, timeout) {
    // Would be parsed as an option
    if (host.startsWith('-')) {
      throw new Error(`refusing to ping '${host}'`);
    }
    try {
      await execFile('ping', pingArgs(host, timeout), { timeout: timeout + 1000 });
      return true;
    } catch (err) {
      // ping exits 1 when there was no reply; anything else means it could not run
      const code: unknown = typeof err === 'object' && err !== null ? Reflect.get(err, 'code') : undefined;
      if (code === 1) return false;
      throw err;
    }
  },

  async resolve(host) {
    const { address } = await dns.lookup(host);
    let canonicalName: string | undefined;
    try {
      [canonicalName] = await dns.reverse(address);
    } catch {
      canonicalName = undefined;
    }
    return { address, canonicalName };
  },

  tcpConnect(host, port, timeout) {
    return new Promise((resolve, reject) => {
      const socket = createConnection({ host, port });
      socket.setTimeout(timeout);
      socket.once('connect', () => {
        socket.end();
        resolve();
      });
      socket.once('timeout', () => {
        socket.destroy();
        reject(new Error(`connect timed out after ${timeout}ms`));
      });
      socket.once('error', (err) => {
        socket.destroy();
        reject(err);
      });
    });
  },
};

/** Rejects if `promise` has not settled within `timeout` ms */
function withTimeout<T>(promise: Promise<T>, timeout: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeout}ms`)), timeout);
  });
  return Promise.race([promise, expired]).finally(() => clearTimeout(timer));
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Best-effort reachability checks run after a failed connection, for operators
 * reading the logs. Never rejects; each step fails on its own.
 */
export class NetworkDiagnostics implements DiagnosticProbe {
  constructor(
    private readonly logger: Logger,
    private readonly options: NetworkDiagnosticsOptions,
    private readonly network: ProbeNetwork = systemNetwork
  ) {}

  async run(target: TargetDescriptor): Promise<DiagnosticReport> {
    const log = this.logger.child({ host: target.host, port: target.port });
    log.info('Running network diagnostics');

    const localHost = this.localHost(log);

    const [reachable, resolution, portOpen] = await Promise.all([
      this.step(log, 'ping', async () => {
        const result = await this.network.ping(target.host, this.options.pingTimeout);
        log.info({ reachable: result }, 'Ping finished');
        return result;
      }),
      this.step(log, 'resolve', async () => {
        const result = await withTimeout(
          this.network.resolve(target.host),
          this.options.pingTimeout,
          'name resolution'
        );
        log.info(result, 'Resolved target host');
        return result;
      }),
      this.step(log, 'tcp-connect', async () => {
        await this.network.tcpConnect(target.host, target.port, this.options.tcpTimeout);
        log.info('TCP connect succeeded, port is open');
        return true;
      }),
    ]);

    return {
      target: `${target.host}:${target.port}`,
      localHost,
      reachable,
      resolution,
      portOpen: portOpen.ok ? portOpen : { ok: true, value: false },
    };
  }

  private localHost(log: Logger): StepResult<LocalHostIdentity> {
    try {
      const identity = this.network.localIdentity();
      log.info(identity, 'Local host identity');
      return { ok: true, value: identity };
    } catch (err) {
      log.warn({ err }, 'Could not determine local host identity');
      return { ok: false, error: describe(err) };
    }
  }

  private async step<T>(log: Logger, name: string, fn: () => Promise<T>): Promise<StepResult<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (err) {
      log.warn({ step: name, error: describe(err) }, 'Diagnostic step failed');
      return { ok: false, error: describe(err) };
    }
  }
}
