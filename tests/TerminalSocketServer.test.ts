import assert from 'node:assert/strict';
import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { once } from 'node:events';
import { after, before, describe, it } from 'node:test';
import { WebSocket } from 'ws';
import { BridgeRegistry } from '../src/services/BridgeRegistry.js';
import { ShellConnector } from '../src/services/ShellConnector.js';
import type { TerminalBridge } from '../src/services/TerminalBridge.js';
import { TerminalHandler } from '../src/server/TerminalHandler.js';
import { TerminalSocketServer, rawDataToBuffer } from '../src/server/WebSocketServer.js';
import { FakeShellClient, MapResolver, RecordingProbe, TARGET, silentLogger } from './helpers/fakes.js';

interface CloseEvent {
  code: number;
  reason: string;
}

function closed(ws: WebSocket): Promise<CloseEvent> {
  return new Promise((resolve) => {
    ws.once('close', (code: number, reason: Buffer) => resolve({ code, reason: reason.toString() }));
  });
}

async function waitFor(condition: () => boolean): Promise<void> {
  for (let i = 0; i < 200 && !condition(); i++) {
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  assert.ok(condition(), 'condition was never met');
}

describe('TerminalSocketServer', () => {
  const registry = new BridgeRegistry<TerminalBridge>();
  const shellClient = new FakeShellClient();
  const connector = new ShellConnector({
    resolver: new MapResolver({ 'web-01': TARGET }),
    shellClient,
    registry,
    probe: new RecordingProbe(),
    logger: silentLogger,
    options: {
      connectTimeout: 10000,
      channelOpenTimeout: 1000,
      ptyType: 'xterm',
      readChunkSize: 1024 * 1024,
      diagnosticsEnabled: false,
    },
  });
  const socketServer = new TerminalSocketServer(
    new TerminalHandler(connector, registry, silentLogger),
    silentLogger,
    { pathPrefix: '/terminal', heartbeatInterval: 50 }
  );
  let httpServer: Server;
  let baseUrl = '';

  before(async () => {
    httpServer = createServer();
    socketServer.initialize(httpServer);
    await new Promise<void>((resolve) => httpServer.listen(0, '127.0.0.1', () => resolve()));
    const address: AddressInfo | string | null = httpServer.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    baseUrl = `ws://127.0.0.1:${port}`;
  });

  after(async () => {
    await socketServer.close();
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
    });
  });

  it('answers other paths with 404', async () => {
    const ws = new WebSocket(`${baseUrl}/health`);
    ws.on('error', () => {});

    const status = await new Promise<number | undefined>((resolve) => {
      ws.once('unexpected-response', (request, response) => {
        resolve(response.statusCode);
        request.destroy();
      });
    });

    assert.equal(status, 404);
  });

  it('closes with 1008 and the reason for an unknown client id', async () => {
    const ws = new WebSocket(`${baseUrl}/terminal/db-9`);

    assert.deepEqual(await closed(ws), { code: 1008, reason: 'host not recognized' });
    assert.equal(registry.size, 0);
  });

  it('streams shell output in order and closes normally when the shell exits', async () => {
    const connectionsBefore = shellClient.connections.length;
    const ws = new WebSocket(`${baseUrl}/terminal/web-01`);
    const messages: string[] = [];
    ws.on('message', (data) => messages.push(rawDataToBuffer(data).toString()));
    const wsClosed = closed(ws);

    await waitFor(() => shellClient.connections.length === connectionsBefore + 1 && registry.size === 1);
    const shell = shellClient.connections[connectionsBefore].shell;

    if (ws.readyState !== WebSocket.OPEN) await once(ws, 'open');
    ws.send('ls\n');
    await waitFor(() => shell.written.length === 1);

    const lines = Array.from({ length: 50 }, (_, i) => `line ${i}\r\n`);
    for (const line of lines) shell.emit(line);
    shell.end();

    assert.deepEqual(await wsClosed, { code: 1000, reason: 'remote shell exited' });
    assert.equal(messages.join(''), lines.join(''));
    assert.equal(shell.written[0].toString(), 'ls\n');
    assert.equal(registry.size, 0);
  });

  it('terminates a client that stops answering pings', { timeout: 5000 }, async () => {
    const ws = new WebSocket(`${baseUrl}/terminal/web-01`, { autoPong: false });
    const wsClosed = closed(ws);

    await waitFor(() => registry.size === 1);

    assert.equal((await wsClosed).code, 1006);
    await waitFor(() => registry.size === 0);
  });
});
