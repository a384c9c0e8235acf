import type { TargetDescriptor } from '../types/Terminal.js';
import {
  DEFAULT_SSH_PORT,
  HOSTS_CONFIG_PATHS,
  loadHostsConfig,
  resolvePassword,
  type SSHHostConfig,
} from '../config/hosts.js';
import type { Logger } from '../utils/logger.js';

/** Looks up where a terminal for a given client id should connect */
export interface TargetResolver {
  lookup(clientId: string): TargetDescriptor | undefined;
}

export function toTargetDescriptor(host: SSHHostConfig, env: NodeJS.ProcessEnv = process.env): TargetDescriptor {
  return {
    id: host.id,
    name: host.name ?? host.id,
    host: host.hostname,
    port: host.port ?? DEFAULT_SSH_PORT,
    username: host.username,
    credential: resolvePassword(host, env),
  };
}

/**
 * Resolves targets from a hosts.json file. The file is re-read on every lookup,
 * so edits apply to the next connection without a restart.
 */
export class HostsTargetResolver implements TargetResolver {
  private readonly paths: string[];

  constructor(
    private readonly logger: Logger,
    hostsFile?: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.paths = hostsFile ? [hostsFile] : HOSTS_CONFIG_PATHS;
  }

  lookup(clientId: string): TargetDescriptor | undefined {
    const host = loadHostsConfig(this.paths, this.logger).hosts.find(h => h.id === clientId);
    return host ? toTargetDescriptor(host, this.env) : undefined;
  }

  list(): TargetDescriptor[] {
    return loadHostsConfig(this.paths, this.logger).hosts.map(h => toTargetDescriptor(h, this.env));
  }
}
