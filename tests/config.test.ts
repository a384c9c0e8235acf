import assert from 'node:assert/strict';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it } from 'node:test';
import { DEFAULT_CONFIG, loadConfig, loadEnvConfig, mergeConfig } from '../src/config/index.js';

function writeConfig(content: unknown): string {
  const dir = mkdtempSync(join(tmpdir(), 'bridge-config-'));
  const path = join(dir, 'config.json');
  writeFileSync(path, JSON.stringify(content));
  return path;
}

describe('loadConfig', () => {
  it('uses the defaults when nothing is configured', () => {
    const config = loadConfig({ env: {}, paths: ['/nonexistent/config.json'] });

    assert.deepEqual(config, DEFAULT_CONFIG);
    assert.equal(config.ssh.connectTimeout, 10000);
    assert.equal(config.ssh.channelOpenTimeout, 1000);
    assert.equal(config.ssh.ptyType, 'xterm');
  });

  it('layers the environment over the file over the defaults', () => {
    const path = writeConfig({
      server: { port: 8080 },
      ssh: { connectTimeout: 5000, ptyType: 'xterm-256color' },
    });

    const config = loadConfig({
      env: { SSH_CONNECT_TIMEOUT: '7000', LOG_LEVEL: 'debug' },
      paths: [path],
    });

    assert.equal(config.server.port, 8080);
    assert.equal(config.server.host, '0.0.0.0');
    assert.equal(config.ssh.connectTimeout, 7000);
    assert.equal(config.ssh.ptyType, 'xterm-256color');
    assert.equal(config.ssh.channelOpenTimeout, 1000);
    assert.equal(config.logging.level, 'debug');
  });

  it('rejects an out of range port', () => {
    assert.throws(
      () => loadConfig({ env: { PORT: '70000' }, paths: [] }),
      /Invalid port number/
    );
  });

  it('rejects a path prefix without a leading slash', () => {
    assert.throws(
      () => loadConfig({ env: { WS_PATH_PREFIX: 'terminal' }, paths: [] }),
      /WebSocket path prefix must start with \//
    );
  });

  it('reports a config file that is not JSON', () => {
    const dir = mkdtempSync(join(tmpdir(), 'bridge-config-'));
    const path = join(dir, 'config.json');
    writeFileSync(path, '{ not json');

    assert.throws(() => loadConfig({ env: {}, paths: [path] }), /Failed to load config from/);
  });
});

describe('loadEnvConfig', () => {
  it('reads every supported variable', () => {
    const config = loadEnvConfig({
      PORT: '4000',
      HOST: '127.0.0.1',
      CORS_ORIGINS: 'http://a.test, http://b.test,',
      WS_PATH_PREFIX: '/shell',
      WS_HEARTBEAT_INTERVAL: '15000',
      SSH_CONNECT_TIMEOUT: '8000',
      SSH_CHANNEL_OPEN_TIMEOUT: '2000',
      SSH_PTY_TYPE: 'vt100',
      SSH_KEEPALIVE_INTERVAL: '0',
      DIAGNOSTICS_ENABLED: 'false',
      LOG_LEVEL: 'warn',
      HOSTS_FILE: '/etc/bridge/hosts.json',
    });

    assert.deepEqual(config, {
      server: { port: 4000, host: '127.0.0.1', corsOrigins: ['http://a.test', 'http://b.test'] },
      websocket: { pathPrefix: '/shell', heartbeatInterval: 15000 },
      ssh: { connectTimeout: 8000, channelOpenTimeout: 2000, ptyType: 'vt100', keepaliveInterval: 0 },
      diagnostics: { enabled: false },
      logging: { level: 'warn' },
      hostsFile: '/etc/bridge/hosts.json',
    });
  });

  it('rejects a value that is not a number', () => {
    assert.throws(() => loadEnvConfig({ SSH_CONNECT_TIMEOUT: '10s' }), /SSH_CONNECT_TIMEOUT must be an integer/);
  });
});

describe('mergeConfig', () => {
  it('keeps values an override leaves out', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { diagnostics: { enabled: false } });

    assert.deepEqual(merged.diagnostics, { enabled: false, pingTimeout: 3000, tcpTimeout: 5000 });
    assert.deepEqual(merged.ssh, DEFAULT_CONFIG.ssh);
  });
});
