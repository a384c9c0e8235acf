import { CloseCode, SOCKET_OPEN, type ClientSocket } from '../types/Protocol.js';
import { closeReasonFor } from '../utils/ConnectErrorClassifier.js';
import type { BridgeRegistry } from '../services/BridgeRegistry.js';
import type { ShellConnector } from '../services/ShellConnector.js';
import type { TerminalBridge } from '../services/TerminalBridge.js';
import type { Logger } from '../utils/logger.js';

/**
 * Reacts to the lifecycle events of terminal sockets: one remote shell per
 * socket, keyed by the session id the socket server assigns.
 */
export class TerminalHandler {
  constructor(
    private readonly connector: ShellConnector,
    private readonly registry: BridgeRegistry<TerminalBridge>,
    private readonly logger: Logger
  ) {}

  async handleOpen(socket: ClientSocket, sessionId: string, clientId: string): Promise<void> {
    const result = await this.connector.open(socket, sessionId, clientId);
    if (result.ok) return;

    const reason = closeReasonFor(result.error);
    if (socket.readyState === SOCKET_OPEN) {
      socket.close(CloseCode.PolicyViolation, reason);
    }
    this.logger.info({ sessionId, clientId, kind: result.error.kind, reason }, 'Terminal connection refused');
  }

  async handleMessage(sessionId: string, data: Buffer): Promise<void> {
    const bridge = this.registry.lookup(sessionId);
    if (!bridge) {
      this.logger.debug({ sessionId, bytes: data.length }, 'Dropping input for session without a terminal');
      return;
    }

    const result = await bridge.sendInput(data);
    if (!result.ok) {
      this.logger.debug({ sessionId, error: result.error.message }, 'Input not delivered');
    }
  }

  handleClose(sessionId: string, code: number): void {
    const bridge = this.registry.lookup(sessionId);
    if (bridge?.close('client disconnected')) {
      this.logger.info({ sessionId, code }, 'Client disconnected');
    }
  }

  handleError(socket: ClientSocket, sessionId: string, error: Error): void {
    this.logger.error({ sessionId, err: error }, 'Terminal socket error');
    this.registry.lookup(sessionId)?.close('client socket error');
    socket.close();
  }
}
