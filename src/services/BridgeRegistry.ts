import type { TerminalBridgeInfo } from '../types/Terminal.js';

/** What the registry needs from a bridge */
export interface RegisteredBridge {
  readonly clientSessionId: string;
  info(): TerminalBridgeInfo;
  close(reason: string): boolean;
}

/**
 * Process-wide map from client session id to its bridge. At most one bridge per
 * session; removal is idempotent.
 */
export class BridgeRegistry<B extends RegisteredBridge = RegisteredBridge> {
  private bridges: Map<string, B> = new Map();

  /** Returns false, leaving the existing entry alone, when the session already has a bridge. */
  insert(sessionId: string, bridge: B): boolean {
    if (this.bridges.has(sessionId)) return false;
    this.bridges.set(sessionId, bridge);
    return true;
  }

  lookup(sessionId: string): B | undefined {
    return this.bridges.get(sessionId);
  }

  /**
   * Removes the entry for `sessionId`. With `expected`, only removes when that
   * bridge is the one registered. Returns whether an entry was removed.
   */
  remove(sessionId: string, expected?: B): boolean {
    const current = this.bridges.get(sessionId);
    if (!current) return false;
    if (expected && current !== expected) return false;
    return this.bridges.delete(sessionId);
  }

  get size(): number {
    return this.bridges.size;
  }

  list(): TerminalBridgeInfo[] {
    return Array.from(this.bridges.values()).map(b => b.info());
  }

  closeAll(reason: string): void {
    for (const bridge of Array.from(this.bridges.values())) {
      bridge.close(reason);
    }
  }
}
