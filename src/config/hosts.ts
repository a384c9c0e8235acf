import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import type { Logger } from '../utils/logger.js';

export interface SSHHostConfig {
  id: string;
  name?: string;
  hostname: string;
  port?: number;
  username: string;
  password?: string;
  passwordEnvVar?: string;
}

export interface HostsConfig {
  hosts: SSHHostConfig[];
}

export const DEFAULT_SSH_PORT = 22;

export const HOSTS_CONFIG_PATHS = [
  join(process.cwd(), 'config', 'hosts.json'),
  join(homedir(), '.config', 'ssh-terminal-bridge', 'hosts.json'),
];

/**
 * Returns the problems with a host entry, empty when it is usable.
 */
export function validateHostConfig(config: SSHHostConfig): string[] {
  const errors: string[] = [];

  if (typeof config.id !== 'string' || config.id.trim() === '') {
    errors.push('Host ID is required');
  }

  if (typeof config.hostname !== 'string' || config.hostname.trim() === '') {
    errors.push('Hostname is required');
  }

  if (typeof config.username !== 'string' || config.username.trim() === '') {
    errors.push('Username is required');
  }

  if (config.port !== undefined && (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535)) {
    errors.push('Port must be between 1 and 65535');
  }

  return errors;
}

/**
 * Reads the first hosts file that exists. Invalid entries are dropped with a warning
 * so one bad entry does not take the others down.
 */
export function loadHostsConfig(paths: string[], logger: Logger): HostsConfig {
  for (const configPath of paths) {
    if (!existsSync(configPath)) continue;

    try {
      const content = readFileSync(configPath, 'utf-8');
      const parsed: { hosts?: unknown } = JSON.parse(content);
      const entries: SSHHostConfig[] = Array.isArray(parsed.hosts) ? parsed.hosts : [];

      const hosts = entries.filter((host, index) => {
        const errors = typeof host === 'object' && host !== null
          ? validateHostConfig(host)
          : ['Host entry must be an object'];
        if (errors.length > 0) {
          logger.warn({ configPath, index, errors }, 'Skipping invalid host entry');
          return false;
        }
        return true;
      });

      logger.debug({ configPath, count: hosts.length }, 'Loaded SSH hosts');
      return { hosts };
    } catch (err) {
      logger.error({ err, configPath }, 'Failed to load hosts config');
      return { hosts: [] };
    }
  }

  return { hosts: [] };
}

/** Priority: env var > direct password */
export function resolvePassword(config: SSHHostConfig, env: NodeJS.ProcessEnv = process.env): string {
  if (config.passwordEnvVar) {
    const envValue = env[config.passwordEnvVar];
    if (envValue) return envValue;
  }
  return config.password ?? '';
}
