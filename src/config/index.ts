import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { ConfigSchema, type Config } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';

export type { Config, AuthorityConfig, NotificationsConfig } from './schema.js';

const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'config.json');

type RawSection = Record<string, unknown>;

/** Environment variable -> [config section, key] it overrides */
const ENV_OVERRIDES: Record<string, [section: string, key: string, numeric?: boolean]> = {
  HOST: ['server', 'host'],
  PORT: ['server', 'port', true],
  PUBLIC_URL: ['server', 'publicUrl'],
  LOG_LEVEL: ['logging', 'level'],
  AUTHORITY_ADMIN: ['authority', 'admin'],
  AUTHORITY_MINTER: ['authority', 'minter'],
  AUTHORITY_BASE_URI: ['authority', 'baseUri'],
};

function isSection(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlay environment variables on the parsed file. Values are applied before
 * schema validation, so they are checked like file values.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (!isSection(raw)) {
    return raw;
  }
  const config: RawSection = { ...raw };

  for (const [name, [sectionName, key, numeric]] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    const current = config[sectionName];
    const section: RawSection = isSection(current) ? { ...current } : {};
    section[key] = numeric ? Number(value) : value;
    config[sectionName] = section;
  }

  // Redis credentials stay out of config files
  if (env.REDIS_PASSWORD) {
    const notifications: RawSection = isSection(config.notifications) ? { ...config.notifications } : {};
    const redis: RawSection = isSection(notifications.redis) ? { ...notifications.redis } : {};
    redis.password = env.REDIS_PASSWORD;
    notifications.redis = redis;
    config.notifications = notifications;
  }

  return config;
}

export function loadConfig(configPath: string = process.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH): Config {
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  let rawConfig: unknown;
  try {
    const fileContent = readFileSync(configPath, 'utf-8');
    rawConfig = JSON.parse(fileContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }

  const result = ConfigSchema.safeParse(applyEnvOverrides(rawConfig));

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}
