import type { ConnectError } from '../types/Terminal.js';
import { MAX_CLOSE_REASON_BYTES } from '../types/Protocol.js';

/** ssh2 tags its errors with the stage that failed */
const LEVEL_KINDS = new Map<string, ConnectError['kind']>([
  ['client-authentication', 'AuthenticationFailed'],
  ['client-timeout', 'ConnectTimeout'],
]);

/** Node socket and resolver error codes */
const CODE_KINDS = new Map<string, ConnectError['kind']>([
  ['ECONNREFUSED', 'ConnectionRefused'],
  ['ETIMEDOUT', 'ConnectTimeout'],
  ['ENOTFOUND', 'UnknownHost'],
  ['EAI_AGAIN', 'UnknownHost'],
  ['EAI_NONAME', 'UnknownHost'],
]);

/** Fallback when only a message is available; matched case-insensitively */
const MESSAGE_PATTERNS: Array<{ kind: ConnectError['kind']; patterns: string[] }> = [
  { kind: 'AuthenticationFailed', patterns: ['auth fail', 'authentication methods failed', 'permission denied'] },
  { kind: 'ConnectionRefused', patterns: ['connection refused'] },
  { kind: 'ConnectTimeout', patterns: ['timed out', 'timeout'] },
  { kind: 'UnknownHost', patterns: ['unknown host', 'no such host is known', 'getaddrinfo'] },
];

const CLOSE_REASONS: Record<Exclude<ConnectError['kind'], 'Other'>, string> = {
  TargetNotFound: 'host not recognized',
  AuthenticationFailed: 'invalid username or password',
  ConnectionRefused: 'connection refused — remote shell service unreachable or port closed',
  ConnectTimeout: 'connection timed out — check network or firewall',
  UnknownHost: 'host address could not be resolved',
};

function stringProperty(value: unknown, key: 'code' | 'level'): string | undefined {
  if (typeof value === 'object' && value !== null && key in value) {
    const prop: unknown = Reflect.get(value, key);
    return typeof prop === 'string' ? prop : undefined;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function fromKind(kind: ConnectError['kind'], message: string): ConnectError {
  return kind === 'Other' ? { kind, message } : { kind };
}

/**
 * Maps a failure from connect, authenticate or shell open onto the terminal's
 * error taxonomy.
 */
export function classifyConnectError(error: unknown): ConnectError {
  const message = messageOf(error);

  const level = stringProperty(error, 'level');
  const levelKind = level === undefined ? undefined : LEVEL_KINDS.get(level);
  if (levelKind) {
    return fromKind(levelKind, message);
  }

  const code = stringProperty(error, 'code');
  const codeKind = code === undefined ? undefined : CODE_KINDS.get(code);
  if (codeKind) {
    return fromKind(codeKind, message);
  }

  const lower = message.toLowerCase();
  for (const { kind, patterns } of MESSAGE_PATTERNS) {
    if (patterns.some(p => lower.includes(p))) {
      return fromKind(kind, message);
    }
  }

  return { kind: 'Other', message };
}

/**
 * Cuts a string to at most `maxBytes` of UTF-8 without splitting a character.
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  if (Buffer.byteLength(text, 'utf8') <= maxBytes) return text;

  let bytes = 0;
  let end = 0;
  for (const char of text) {
    const size = Buffer.byteLength(char, 'utf8');
    if (bytes + size > maxBytes) break;
    bytes += size;
    end += char.length;
  }
  return text.slice(0, end);
}

/** Human-readable reason sent with the WebSocket close frame */
export function closeReasonFor(error: ConnectError): string {
  const reason = error.kind === 'Other'
    ? (error.message.trim() || 'unknown error')
    : CLOSE_REASONS[error.kind];
  return truncateUtf8(reason, MAX_CLOSE_REASON_BYTES);
}
