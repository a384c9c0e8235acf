import { pino, type Logger } from 'pino';

export type { Logger };

export function createLogger(level: string): Logger {
  return pino({
    name: 'ssh-terminal-bridge',
    level,
    redact: ['credential', 'password', '*.credential', '*.password'],
  });
}

