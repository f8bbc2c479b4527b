import type Database from 'better-sqlite3';
import { getDb } from '../db/index.js';
import { CONFIG_KEYS, type Config, type ConfigKey } from '../models/config.js';

// Map config keys to environment variable names
const ENV_KEY_MAP: Partial<Record<ConfigKey, string>> = {
  [CONFIG_KEYS.LLM_API_KEY]: 'LLM_API_KEY',
  [CONFIG_KEYS.LLM_BASE_URL]: 'LLM_BASE_URL',
  [CONFIG_KEYS.LLM_MODEL]: 'LLM_MODEL',
  [CONFIG_KEYS.RAINDROP_TOKEN]: 'RAINDROP_TOKEN',
  [CONFIG_KEYS.PROXY_URL]: 'PROXY_URL',
};

// Default values for config keys
const DEFAULT_VALUES: Partial<Record<ConfigKey, string>> = {
  [CONFIG_KEYS.LLM_BASE_URL]: 'https://api.openai.com/v1',
  [CONFIG_KEYS.LLM_MODEL]: 'gpt-4o-mini',
  [CONFIG_KEYS.RAINDROP_COLLECTION]: 'News Links',
  [CONFIG_KEYS.RETENTION_DAYS]: '7',
  [CONFIG_KEYS.REFRESH_INTERVAL_MINUTES]: '30',
  [CONFIG_KEYS.DEFAULT_TAGS]: 'rss',
  [CONFIG_KEYS.COOKIE_SOURCE]: 'firefox',
};

export function isConfigKey(key: string): key is ConfigKey {
  return (Object.values(CONFIG_KEYS) as string[]).includes(key);
}

export function envKeyFor(key: ConfigKey): string | undefined {
  return ENV_KEY_MAP[key];
}

export function getConfig(key: ConfigKey, database: Database.Database = getDb()): string | null {
  // Priority: env > db > default
  const envKey = ENV_KEY_MAP[key];
  const envValue = envKey ? process.env[envKey] : undefined;
  if (envValue) {
    return envValue;
  }

  const row = database.prepare('SELECT key, value FROM config WHERE key = ?').get(key) as Config | undefined;
  if (row?.value) {
    return row.value;
  }

  return DEFAULT_VALUES[key] ?? null;
}

export function getNumberConfig(key: ConfigKey, fallback: number, database?: Database.Database): number {
  const value = Number(getConfig(key, database));
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export function getListConfig(key: ConfigKey, database?: Database.Database): string[] {
  return (getConfig(key, database) ?? '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

export function setConfig(key: ConfigKey, value: string, database: Database.Database = getDb()): void {
  database.prepare(
    'INSERT INTO config (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
  ).run(key, value);
}

export function deleteConfig(key: ConfigKey, database: Database.Database = getDb()): boolean {
  const result = database.prepare('DELETE FROM config WHERE key = ?').run(key);
  return result.changes > 0;
}

export function getAllConfig(database: Database.Database = getDb()): Config[] {
  return database.prepare('SELECT key, value FROM config ORDER BY key').all() as Config[];
}
