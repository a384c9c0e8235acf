/** WebSocket close codes used on the terminal endpoint (RFC 6455 §7.4.1) */
export const CloseCode = {
  Normal: 1000,
  PolicyViolation: 1008,
} as const;

export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode];

/** Close reasons must fit in a control frame: 125 bytes minus the 2-byte code. */
export const MAX_CLOSE_REASON_BYTES = 123;

/**
 * Minimal surface the bridge needs from a client socket.
 * `ws` WebSocket instances satisfy it structurally.
 */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

/** Same value as `WebSocket.OPEN` in `ws` */
export const SOCKET_OPEN = 1;
