/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { ClientConfigSchema } from '../types/schemas/config.js';
import type { Endpoint } from '../bridge/endpoint.js';
import { resolveDefaultEndpoint } from '../bridge/endpoint.js';
import type { LogLevel } from '../types/index.js';

export type ConfigEnvironment = 'production' | 'development' | 'test';

/**
 * Configuration Schema (matches client.yaml structure)
 */
export type Config = {
  buffer_pool: {
    max_batch_commands: number;
  };
  transport: {
    timeout_ms: number;
    socket_path: string;
    tcp_host: string;
    tcp_port: number;
    prefer_tcp: boolean;
  };
  logging: {
    level: LogLevel;
  };
};

/**
 * Built-in values, used for any key the YAML file leaves out.
 */
export const DEFAULT_CONFIG: Config = {
  buffer_pool: {
    max_batch_commands: 50000,
  },
  transport: {
    timeout_ms: 0,
    socket_path: '/tmp/pcsx2.sock',
    tcp_host: '127.0.0.1',
    tcp_port: 28011,
    prefer_tcp: false,
  },
  logging: {
    level: 'info',
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects; arrays and scalars in `source` replace.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

function resolveEnvironment(environment?: ConfigEnvironment): ConfigEnvironment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Load configuration from YAML file
 *
 * The result is not validated; see validateConfig().
 */
export function loadConfig(configPath?: string, environment?: ConfigEnvironment): Record<string, unknown> {
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'client.yaml');

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/client.yaml exists in the package root.`
      );
    }
    throw new Error(`Failed to load configuration: ${String(error)}`);
  }

  const parsed: unknown = yaml.load(fileContents);
  const fileConfig: Record<string, unknown> = isPlainObject(parsed) ? parsed : {};
  const { environments, ...baseConfig } = fileConfig;

  let merged = deepMerge({ ...DEFAULT_CONFIG }, baseConfig);

  if (isPlainObject(environments)) {
    const envConfig = environments[resolveEnvironment(environment)];
    if (isPlainObject(envConfig)) {
      merged = deepMerge(merged, envConfig);
    }
  }

  return merged;
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): Config {
  const parseResult = ClientConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: ConfigEnvironment): Config {
  globalConfig = validateConfig(loadConfig(configPath, environment));
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Default endpoint for this platform, honoring the transport section.
 */
export function getDefaultEndpoint(
  config: Config = getConfig(),
  platform: NodeJS.Platform = process.platform
): Endpoint {
  return resolveDefaultEndpoint(platform, {
    socketPath: config.transport.socket_path,
    tcpHost: config.transport.tcp_host,
    tcpPort: config.transport.tcp_port,
    preferTcp: config.transport.prefer_tcp,
  });
}
