/**
 * Configuration Management
 *
 * Loads and manages framework configuration from defaults, an optional
 * JSON file and the environment.
 */

import { readFile } from 'node:fs/promises';
import { getLogger, isLogLevel, type LogLevel } from '../telemetry/logger.ts';

export interface ConfigOptions {
  env?: string;
  debug?: boolean;
  logLevel?: LogLevel;
  views?: {
    path?: string;
    extension?: string;
    cache?: boolean;
  };
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  env: 'development',
  debug: false,
  logLevel: 'info',
  views: {
    path: './views',
    extension: '.html',
    cache: true,
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class Config {
  private config: Record<string, unknown>;

  constructor(options: ConfigOptions | Record<string, unknown> = {}) {
    this.config = this.mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dotted path
   */
  get(key: string): unknown {
    return this.getNestedValue(this.config, key);
  }

  getString(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  /**
   * Set a configuration value by dotted path
   */
  set(key: string, value: unknown): void {
    this.setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return this.getNestedValue(this.config, key) !== undefined;
  }

  all(): Record<string, unknown> {
    return structuredClone(this.config);
  }

  private mergeConfig(
    base: Record<string, unknown>,
    override: Record<string, unknown>
  ): Record<string, unknown> {
    const result = structuredClone(base);

    for (const [key, value] of Object.entries(override)) {
      if (value === undefined) continue;
      const current = base[key];
      result[key] = isRecord(value) ? this.mergeConfig(isRecord(current) ? current : {}, value) : value;
    }

    return result;
  }

  private getNestedValue(obj: Record<string, unknown>, path: string): unknown {
    let current: unknown = obj;
    for (const part of path.split('.')) {
      if (!isRecord(current)) return undefined;
      current = current[part];
    }
    return current;
  }

  private setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
    const parts = path.split('.');
    const last = parts.pop();
    if (last === undefined) return;

    let current = obj;
    for (const part of parts) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }

    current[last] = value;
  }
}

/**
 * Load configuration from a JSON file (the `turbo` key of the file, or
 * the whole file) and environment variables, environment winning.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let fileConfig: Record<string, unknown> = {};

  if (configPath) {
    try {
      const parsed: unknown = JSON.parse(await readFile(configPath, 'utf8'));
      if (isRecord(parsed)) {
        fileConfig = isRecord(parsed.turbo) ? parsed.turbo : parsed;
      }
    } catch (error) {
      getLogger().warn('Could not read config file, using defaults', {
        configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const config = new Config(fileConfig);

  if (env.NODE_ENV) config.set('env', env.NODE_ENV);
  if (env.DEBUG !== undefined) config.set('debug', env.DEBUG === 'true');
  if (isLogLevel(env.LOG_LEVEL)) config.set('logLevel', env.LOG_LEVEL);
  if (env.VIEWS_PATH) config.set('views.path', env.VIEWS_PATH);

  return config;
}
