import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
}

export interface WebSocketConfig {
  pathPrefix: string;
  heartbeatInterval: number;
}

export interface SSHConfig {
  connectTimeout: number;
  channelOpenTimeout: number;
  ptyType: string;
  keepaliveInterval: number;
  readChunkSize: number;
}

export interface DiagnosticsConfig {
  enabled: boolean;
  pingTimeout: number;
  tcpTimeout: number;
}

export interface LoggingConfig {
  level: string;
}

export interface AppConfig {
  server: ServerConfig;
  websocket: WebSocketConfig;
  ssh: SSHConfig;
  diagnostics: DiagnosticsConfig;
  logging: LoggingConfig;
  /** Explicit hosts file; falls back to the default search paths when unset */
  hostsFile?: string;
}

/** Each section may be given in part */
export type PartialAppConfig = {
  [K in keyof AppConfig]?: AppConfig[K] extends object ? Partial<AppConfig[K]> : AppConfig[K];
};

export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3000,
    host: '0.0.0.0',
    corsOrigins: ['http://localhost:5173', 'http://127.0.0.1:5173'],
  },
  websocket: {
    pathPrefix: '/terminal',
    heartbeatInterval: 30000,
  },
  ssh: {
    connectTimeout: 10000,
    channelOpenTimeout: 1000,
    ptyType: 'xterm',
    keepaliveInterval: 15000,
    readChunkSize: 1024 * 1024,
  },
  diagnostics: {
    enabled: true,
    pingTimeout: 3000,
    tcpTimeout: 5000,
  },
  logging: {
    level: 'info',
  },
};

export const CONFIG_PATHS = [
  join(process.cwd(), 'config', 'config.json'),
  join(homedir(), '.config', 'ssh-terminal-bridge', 'config.json'),
];

export function loadConfigFile(paths: string[] = CONFIG_PATHS): PartialAppConfig {
  for (const configPath of paths) {
    if (existsSync(configPath)) {
      try {
        const content = readFileSync(configPath, 'utf-8');
        return JSON.parse(content);
      } catch (err) {
        throw new Error(
          `Failed to load config from ${configPath}: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
  }
  return {};
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialAppConfig {
  const server: Partial<ServerConfig> = {};
  const websocket: Partial<WebSocketConfig> = {};
  const ssh: Partial<SSHConfig> = {};
  const diagnostics: Partial<DiagnosticsConfig> = {};
  const logging: Partial<LoggingConfig> = {};

  // Server config
  if (env.PORT) server.port = parseInteger('PORT', env.PORT);
  if (env.HOST) server.host = env.HOST;
  if (env.CORS_ORIGINS) {
    server.corsOrigins = env.CORS_ORIGINS.split(',').map(o => o.trim()).filter(o => o !== '');
  }

  // WebSocket config
  if (env.WS_PATH_PREFIX) websocket.pathPrefix = env.WS_PATH_PREFIX;
  if (env.WS_HEARTBEAT_INTERVAL) {
    websocket.heartbeatInterval = parseInteger('WS_HEARTBEAT_INTERVAL', env.WS_HEARTBEAT_INTERVAL);
  }

  // SSH config
  if (env.SSH_CONNECT_TIMEOUT) {
    ssh.connectTimeout = parseInteger('SSH_CONNECT_TIMEOUT', env.SSH_CONNECT_TIMEOUT);
  }
  if (env.SSH_CHANNEL_OPEN_TIMEOUT) {
    ssh.channelOpenTimeout = parseInteger('SSH_CHANNEL_OPEN_TIMEOUT', env.SSH_CHANNEL_OPEN_TIMEOUT);
  }
  if (env.SSH_PTY_TYPE) ssh.ptyType = env.SSH_PTY_TYPE;
  if (env.SSH_KEEPALIVE_INTERVAL) {
    ssh.keepaliveInterval = parseInteger('SSH_KEEPALIVE_INTERVAL', env.SSH_KEEPALIVE_INTERVAL);
  }

  // Diagnostics config
  if (env.DIAGNOSTICS_ENABLED) diagnostics.enabled = env.DIAGNOSTICS_ENABLED === 'true';

  if (env.LOG_LEVEL) logging.level = env.LOG_LEVEL;

  const config: PartialAppConfig = { server, websocket, ssh, diagnostics, logging };
  if (env.HOSTS_FILE) config.hostsFile = env.HOSTS_FILE;
  return config;
}

export function mergeConfig(base: AppConfig, ...overrides: PartialAppConfig[]): AppConfig {
  let result = base;
  for (const o of overrides) {
    const hostsFile = o.hostsFile ?? result.hostsFile;
    result = {
      server: { ...result.server, ...o.server },
      websocket: { ...result.websocket, ...o.websocket },
      ssh: { ...result.ssh, ...o.ssh },
      diagnostics: { ...result.diagnostics, ...o.diagnostics },
      logging: { ...result.logging, ...o.logging },
      ...(hostsFile !== undefined ? { hostsFile } : {}),
    };
  }
  return result;
}

export function validateConfig(config: AppConfig): void {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }
  if (!config.websocket.pathPrefix.startsWith('/')) {
    errors.push('WebSocket path prefix must start with /');
  }
  if (config.websocket.heartbeatInterval < 1000) {
    errors.push('Heartbeat interval must be at least 1000ms');
  }
  if (config.ssh.connectTimeout <= 0) {
    errors.push('SSH connect timeout must be positive');
  }
  if (config.ssh.channelOpenTimeout <= 0) {
    errors.push('SSH channel open timeout must be positive');
  }
  if (config.ssh.keepaliveInterval < 0) {
    errors.push('SSH keepalive interval cannot be negative');
  }
  if (config.ssh.readChunkSize <= 0) {
    errors.push('Read chunk size must be positive');
  }
  if (config.diagnostics.pingTimeout <= 0 || config.diagnostics.tcpTimeout <= 0) {
    errors.push('Diagnostic timeouts must be positive');
  }

  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join(', ')}`);
  }
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  paths?: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const fileConfig = loadConfigFile(options.paths);
  const envConfig = loadEnvConfig(options.env);

  // Priority: env > file > defaults
  const config = mergeConfig(DEFAULT_CONFIG, fileConfig, envConfig);

  validateConfig(config);
  return config;
}
