import assert from 'node:assert/strict';
import { createServer, type AddressInfo, type Server } from 'node:net';
import { describe, it } from 'node:test';
import { NetworkDiagnostics, systemNetwork, type ProbeNetwork } from '../src/services/NetworkDiagnostics.js';
import { TARGET, silentLogger } from './helpers/fakes.js';

const OPTIONS = { pingTimeout: 3000, tcpTimeout: 5000 };

function healthyNetwork(calls: string[]): ProbeNetwork {
  return {
    localIdentity: () => ({ hostname: 'bridge-host', address: '10.0.0.2' }),
    ping: async (host, timeout) => {
      calls.push(`ping ${host} ${timeout}`);
      return true;
    },
    resolve: async (host) => {
      calls.push(`resolve ${host}`);
      return { address: '10.0.0.5', canonicalName: 'web-01.internal' };
    },
    tcpConnect: async (host, port, timeout) => {
      calls.push(`tcp ${host}:${port} ${timeout}`);
    },
  };
}

describe('NetworkDiagnostics', () => {
  it('reports every check when the network cooperates', async () => {
    const calls: string[] = [];
    const probe = new NetworkDiagnostics(silentLogger, OPTIONS, healthyNetwork(calls));

    const report = await probe.run(TARGET);

    assert.deepEqual(report, {
      target: 'web-01.internal:22',
      localHost: { ok: true, value: { hostname: 'bridge-host', address: '10.0.0.2' } },
      reachable: { ok: true, value: true },
      resolution: { ok: true, value: { address: '10.0.0.5', canonicalName: 'web-01.internal' } },
      portOpen: { ok: true, value: true },
    });
    assert.deepEqual([...calls].sort(), [
      'ping web-01.internal 3000',
      'resolve web-01.internal',
      'tcp web-01.internal:22 5000',
    ]);
  });

  it('keeps going when every step fails and never rejects', async () => {
    const network: ProbeNetwork = {
      localIdentity: () => {
        throw new Error('no interfaces');
      },
      ping: async () => {
        throw new Error('ping: command not found');
      },
      resolve: async () => {
        throw new Error('getaddrinfo ENOTFOUND web-01.internal');
      },
      tcpConnect: async () => {
        throw new Error('connect ECONNREFUSED 10.0.0.5:22');
      },
    };
    const probe = new NetworkDiagnostics(silentLogger, OPTIONS, network);

    const report = await probe.run(TARGET);

    assert.deepEqual(report, {
      target: 'web-01.internal:22',
      localHost: { ok: false, error: 'no interfaces' },
      reachable: { ok: false, error: 'ping: command not found' },
      resolution: { ok: false, error: 'getaddrinfo ENOTFOUND web-01.internal' },
      portOpen: { ok: true, value: false },
    });
  });

  it('reports an unreachable host as a result, not a failure', async () => {
    const calls: string[] = [];
    const network = { ...healthyNetwork(calls), ping: async () => false };
    const probe = new NetworkDiagnostics(silentLogger, OPTIONS, network);

    const report = await probe.run(TARGET);

    assert.deepEqual(report.reachable, { ok: true, value: false });
    assert.deepEqual(report.portOpen, { ok: true, value: true });
  });
});

describe('NetworkDiagnostics timeouts', () => {
  it('gives up on a resolver that never answers', async () => {
    const network = { ...healthyNetwork([]), resolve: () => new Promise<never>(() => {}) };
    const probe = new NetworkDiagnostics(silentLogger, { pingTimeout: 20, tcpTimeout: 5000 }, network);

    const report = await probe.run(TARGET);

    assert.deepEqual(report.resolution, { ok: false, error: 'name resolution timed out after 20ms' });
    assert.deepEqual(report.reachable, { ok: true, value: true });
  });
});

function listen(server: Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : 0);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

describe('systemNetwork', () => {
  it('connects to a listening port and is refused once it closes', async () => {
    const server = createServer((socket) => socket.destroy());
    const port = await listen(server);

    await systemNetwork.tcpConnect('127.0.0.1', port, 1000);

    await closeServer(server);
    await assert.rejects(systemNetwork.tcpConnect('127.0.0.1', port, 1000), { code: 'ECONNREFUSED' });
  });

  it('resolves localhost to a loopback address', async () => {
    const { address } = await systemNetwork.resolve('localhost');

    assert.ok(['127.0.0.1', '::1'].includes(address), `unexpected address ${address}`);
  });

  it('will not pass a host that looks like an option to ping', async () => {
    await assert.rejects(systemNetwork.ping('-f', 100), { message: "refusing to ping '-f'" });
  });
});
