import { err, ok, type ConnectError, type Result, type TargetDescriptor } from '../types/Terminal.js';
import { SOCKET_OPEN, type ClientSocket } from '../types/Protocol.js';
import { classifyConnectError } from '../utils/ConnectErrorClassifier.js';
import { TerminalBridge } from './TerminalBridge.js';
import type { BridgeRegistry } from './BridgeRegistry.js';
import type { DiagnosticProbe } from './NetworkDiagnostics.js';
import type { RemoteConnection, RemoteShellClient, ShellSession } from './SSHShellClient.js';
import type { TargetResolver } from './TargetResolver.js';
import type { Logger } from '../utils/logger.js';

export interface ShellConnectorOptions {
  connectTimeout: number;
  channelOpenTimeout: number;
  ptyType: string;
  readChunkSize: number;
  diagnosticsEnabled: boolean;
}

export interface ShellConnectorDeps {
  resolver: TargetResolver;
  shellClient: RemoteShellClient;
  registry: BridgeRegistry<TerminalBridge>;
  probe: DiagnosticProbe;
  logger: Logger;
  options: ShellConnectorOptions;
}

/**
 * Establishes terminals: resolves the target, opens the remote shell and
 * registers a running bridge for the client session.
 */
export class ShellConnector {
  private readonly deps: ShellConnectorDeps;

  constructor(deps: ShellConnectorDeps) {
    this.deps = deps;
  }

  async open(socket: ClientSocket, sessionId: string, clientId: string): Promise<Result<TerminalBridge, ConnectError>> {
    const { resolver, registry, options } = this.deps;
    const log = this.deps.logger.child({ sessionId, clientId });

    const target = resolver.lookup(clientId);
    if (!target) {
      log.warn('No SSH target configured for client');
      return err({ kind: 'TargetNotFound' });
    }

    log.info({ host: target.host, port: target.port, username: target.username }, 'Opening terminal');

    let connection: RemoteConnection | undefined;
    let shell: ShellSession;
    try {
      connection = await this.deps.shellClient.connect({
        host: target.host,
        port: target.port,
        username: target.username,
        credential: target.credential,
        connectTimeout: options.connectTimeout,
      });
      shell = await connection.openInteractiveShell(options.ptyType, options.channelOpenTimeout);
    } catch (error) {
      connection?.disconnect();
      const classified = classifyConnectError(error);
      log.error({ err: error, kind: classified.kind }, 'Failed to open terminal');
      this.scheduleDiagnostics(target, log);
      return err(classified);
    }

    if (socket.readyState !== SOCKET_OPEN) {
      shell.close();
      connection.disconnect();
      log.info('Client went away before the terminal was ready');
      return err({ kind: 'Other', message: 'client disconnected before terminal was ready' });
    }

    if (registry.lookup(sessionId)) {
      shell.close();
      connection.disconnect();
      log.error('Session already has an active terminal');
      return err({ kind: 'Other', message: 'terminal already open for this session' });
    }

    const bridge = new TerminalBridge({
      clientSessionId: sessionId,
      clientId,
      target,
      socket,
      connection,
      shell,
      logger: log,
      readChunkSize: options.readChunkSize,
      onClosed: (b) => {
        registry.remove(b.clientSessionId, b);
      },
    });

    registry.insert(sessionId, bridge);

    void bridge.start();
    log.info({ activeTerminals: registry.size }, 'Terminal connected');
    return ok(bridge);
  }

  private scheduleDiagnostics(target: TargetDescriptor, log: Logger): void {
    if (!this.deps.options.diagnosticsEnabled) return;

    this.deps.probe.run(target).catch((error: unknown) => {
      log.error({ err: error }, 'Network diagnostics failed');
    });
  }
}
