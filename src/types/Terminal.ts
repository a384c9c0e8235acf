/** Terminal bridge state */
export type BridgeState =
  | 'connecting'
  | 'connected'
  | 'closing'
  | 'closed';

/** Where a terminal connects to. Supplied by a TargetResolver, never persisted here. */
export interface TargetDescriptor {
  readonly id: string;
  readonly name: string;
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly credential: string;
}

/** Classified reason a terminal could not be established */
export type ConnectError =
  | { kind: 'TargetNotFound' }
  | { kind: 'AuthenticationFailed' }
  | { kind: 'ConnectionRefused' }
  | { kind: 'ConnectTimeout' }
  | { kind: 'UnknownHost' }
  | { kind: 'Other'; message: string };

/** Stream failure after the terminal is up */
export interface IoFailure {
  kind: 'IoFailure';
  message: string;
}

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Public view of an active bridge; carries no credentials */
export interface TerminalBridgeInfo {
  sessionId: string;
  clientId: string;
  host: string;
  port: number;
  username: string;
  state: BridgeState;
  openedAt: Date;
}
