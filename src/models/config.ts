export interface Config {
  key: string;
  value: string;
}

export const CONFIG_KEYS = {
  LLM_API_KEY: 'llm_api_key',
  LLM_BASE_URL: 'llm_base_url',
  LLM_MODEL: 'llm_model',
  RAINDROP_TOKEN: 'raindrop_token',
  RAINDROP_COLLECTION: 'raindrop_collection',
  PROXY_URL: 'proxy_url',
  RETENTION_DAYS: 'retention_days',
  REFRESH_INTERVAL_MINUTES: 'refresh_interval_minutes',
  DEFAULT_TAGS: 'default_tags',
  COOKIE_SOURCE: 'cookie_source',
} as const;

export type ConfigKey = (typeof CONFIG_KEYS)[keyof typeof CONFIG_KEYS];

export const SECRET_KEYS: readonly ConfigKey[] = [CONFIG_KEYS.LLM_API_KEY, CONFIG_KEYS.RAINDROP_TOKEN];
