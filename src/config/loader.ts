import fs from 'fs';
import path from 'path';
import os from 'os';
import type { DepsnapConfig, ConfigSource } from './types.js';
import { DepsnapConfigSchema, LogLevelSchema, formatIssues } from './schema.js';
import { SNAPSHOT_CONSTANTS } from './constants.js';
import { log } from '../utils/logger.js';

const GLOBAL_CONFIG_DIR = path.join(os.homedir(), '.depsnap');
const GLOBAL_CONFIG_FILE = path.join(GLOBAL_CONFIG_DIR, 'config.json');
const PROJECT_CONFIG_FILE = '.depsnap/config.json';

/**
 * Read and validate one config file; an unreadable or invalid file is
 * reported and ignored.
 */
export function readConfigFile(configPath: string): DepsnapConfig | null {
  try {
    if (!fs.existsSync(configPath)) {
      return null;
    }
    const content = fs.readFileSync(configPath, 'utf8');
    const parsed = DepsnapConfigSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      log.warn('Ignoring invalid config', { path: configPath, issues: formatIssues(parsed.error) });
      return null;
    }
    return parsed.data;
  } catch (error) {
    log.warn('Failed to read config', { path: configPath, error: String(error) });
    return null;
  }
}

/**
 * Read global configuration from ~/.depsnap/config.json
 */
export function readGlobalConfig(): DepsnapConfig | null {
  return readConfigFile(GLOBAL_CONFIG_FILE);
}

/**
 * Read project-local configuration from .depsnap/config.json
 */
export function readProjectConfig(basePath = '.'): DepsnapConfig | null {
  return readConfigFile(getProjectConfigPath(basePath));
}

/**
 * Read configuration from environment variables
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): DepsnapConfig {
  const config: DepsnapConfig = {};

  if (env.DEPSNAP_THROTTLE_MS) {
    const throttleMs = parseInt(env.DEPSNAP_THROTTLE_MS, 10);
    if (!isNaN(throttleMs) && throttleMs >= SNAPSHOT_CONSTANTS.MIN_THROTTLE_MS) {
      config.throttleMs = throttleMs;
    } else {
      log.warn('Ignoring DEPSNAP_THROTTLE_MS', { value: env.DEPSNAP_THROTTLE_MS });
    }
  }

  if (env.DEPSNAP_DISABLED_FILTERS) {
    config.disabledFilters = env.DEPSNAP_DISABLED_FILTERS
      .split(',')
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0);
  }

  if (env.DEPSNAP_LOG_LEVEL) {
    const level = LogLevelSchema.safeParse(env.DEPSNAP_LOG_LEVEL.toLowerCase());
    if (level.success) {
      config.logLevel = level.data;
    }
  }

  return config;
}

/**
 * Merge configuration objects; later configs override earlier ones
 */
export function mergeConfigs(...configs: (DepsnapConfig | null)[]): DepsnapConfig {
  const result: DepsnapConfig = {};

  for (const config of configs) {
    if (!config) continue;

    if (config.throttleMs !== undefined) {
      result.throttleMs = config.throttleMs;
    }

    if (config.disabledFilters) {
      result.disabledFilters = [...config.disabledFilters];
    }

    if (config.logLevel) {
      result.logLevel = config.logLevel;
    }
  }

  return result;
}

/**
 * Load merged configuration from all sources
 * Priority: env > project > global
 */
export function loadConfig(basePath = '.'): DepsnapConfig {
  return mergeConfigs(readGlobalConfig(), readProjectConfig(basePath), readEnvConfig());
}

/**
 * Get configuration sources for debugging
 */
export function getConfigSources(basePath = '.'): ConfigSource {
  return {
    global: readGlobalConfig(),
    project: readProjectConfig(basePath),
    env: readEnvConfig(),
  };
}

export function getGlobalConfigPath(): string {
  return GLOBAL_CONFIG_FILE;
}

export function getProjectConfigPath(basePath = '.'): string {
  return path.join(path.resolve(basePath), PROJECT_CONFIG_FILE);
}
