import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { AppConfig } from '../config/index.js';
import { terminalRoutes } from '../api/terminals.js';
import { hostRoutes, type HostLister } from '../api/hosts.js';
import { BridgeRegistry } from '../services/BridgeRegistry.js';
import { HostsTargetResolver } from '../services/TargetResolver.js';
import { NetworkDiagnostics } from '../services/NetworkDiagnostics.js';
import { SSHShellClient } from '../services/SSHShellClient.js';
import { ShellConnector } from '../services/ShellConnector.js';
import type { TerminalBridge } from '../services/TerminalBridge.js';
import { TerminalHandler } from './TerminalHandler.js';
import { TerminalSocketServer } from './WebSocketServer.js';
import type { Logger } from '../utils/logger.js';

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  registry: BridgeRegistry;
  hosts: HostLister;
}

export async function createApp({ config, logger, registry, hosts }: AppDeps): Promise<FastifyInstance> {
  const app = Fastify<Server, IncomingMessage, ServerResponse, FastifyBaseLogger>({ loggerInstance: logger });

  await app.register(cors, {
    origin: config.server.corsOrigins,
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    credentials: true,
  });

  // Root endpoint
  app.get('/', async () => ({
    name: 'ssh-terminal-bridge',
    version: '1.0.0',
    endpoints: {
      health: '/health',
      terminals: '/api/terminals',
      hosts: '/api/hosts',
      websocket: `${config.websocket.pathPrefix}/{clientId}`,
    },
  }));

  // Health check endpoint
  app.get('/health', async () => ({ status: 'ok', terminals: registry.size }));

  await terminalRoutes(app, registry);
  await hostRoutes(app, hosts);

  // Global error handler
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    request.log.error({ err: error }, 'Request failed');
    const statusCode = error.statusCode ?? 500;
    reply.status(statusCode).send({
      error: statusCode >= 500 ? 'Internal Server Error' : error.message,
      code: error.code ?? 'INTERNAL_ERROR',
    });
  });

  return app;
}

export interface RunningServer {
  app: FastifyInstance;
  registry: BridgeRegistry<TerminalBridge>;
  close(): Promise<void>;
}

export async function startServer(config: AppConfig, logger: Logger): Promise<RunningServer> {
  const registry = new BridgeRegistry<TerminalBridge>();
  const resolver = new HostsTargetResolver(logger.child({ component: 'hosts' }), config.hostsFile);

  const connector = new ShellConnector({
    resolver,
    registry,
    shellClient: new SSHShellClient(logger.child({ component: 'ssh' }), {
      keepaliveInterval: config.ssh.keepaliveInterval,
    }),
    probe: new NetworkDiagnostics(logger.child({ component: 'diagnostics' }), {
      pingTimeout: config.diagnostics.pingTimeout,
      tcpTimeout: config.diagnostics.tcpTimeout,
    }),
    logger: logger.child({ component: 'terminal' }),
    options: {
      connectTimeout: config.ssh.connectTimeout,
      channelOpenTimeout: config.ssh.channelOpenTimeout,
      ptyType: config.ssh.ptyType,
      readChunkSize: config.ssh.readChunkSize,
      diagnosticsEnabled: config.diagnostics.enabled,
    },
  });

  const app = await createApp({ config, logger, registry, hosts: resolver });
  await app.ready();

  const httpServer = createServer((req, res) => {
    app.routing(req, res);
  });

  const socketLogger = logger.child({ component: 'websocket' });
  const socketServer = new TerminalSocketServer(
    new TerminalHandler(connector, registry, socketLogger),
    socketLogger,
    config.websocket
  );
  socketServer.initialize(httpServer);

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.server.port, config.server.host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  logger.info(
    { host: config.server.host, port: config.server.port, websocket: `${config.websocket.pathPrefix}/{clientId}` },
    'Server listening'
  );

  return {
    app,
    registry,
    async close() {
      registry.closeAll('server shutting down');
      await socketServer.close();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
      await app.close();
    },
  };
}
