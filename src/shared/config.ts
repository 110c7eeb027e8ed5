import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getAppDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  search_api: z
    .object({
      enabled: z.boolean().default(true),
      base_url: z.string().default('https://openapi.naver.com/v1/search/news.json'),
      client_id: z.string().default(''),
      client_secret: z.string().default(''),
      request_delay_ms: z.number().int().nonnegative().default(1000),
      page_size: z.number().int().min(1).max(100).default(100),
      max_start: z.number().int().min(1).default(1000),
      timeout_ms: z.number().int().positive().default(30000),
      latest_query: z.string().min(1).default('뉴스'),
      user_agent: z.string().default('newsgather/1.0'),
    })
    .default({}),

  crawl: z
    .object({
      enabled: z.boolean().default(true),
      base_url: z.string().default('https://news.google.com'),
      language: z.string().default('ko'),
      country: z.string().default('KR'),
      edition: z.string().default('KR:ko'),
      timeout_ms: z.number().int().positive().default(30000),
      min_title_length: z.number().int().nonnegative().default(10),
      user_agent: z
        .string()
        .default(
          'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
        ),
    })
    .default({}),

  collect: z
    .object({
      default_max_count: z.number().int().positive().default(50),
      query_delay_ms: z.number().int().nonnegative().default(1000),
      concurrent_adapters: z.boolean().default(false),
      default_category: z.string().default('general'),
      trending_keywords: z
        .array(z.string().min(1))
        .default(['정치', '경제', '사회', '문화', '국제', '스포츠', 'IT', '과학', '건강', '교육', '환경', '부동산']),
    })
    .default({}),

  recency: z
    .object({
      window_minutes: z.number().positive().default(2),
      max_records: z.number().int().positive().default(500),
      retry_attempts: z.number().int().min(1).default(3),
      retry_delay_ms: z.number().int().nonnegative().default(1000),
    })
    .default({}),

  schedule: z
    .object({
      collect_cron: z.string().default('*/5 * * * *'),
      queries: z.array(z.string().min(1)).default([]),
      initial_max_count: z.number().int().positive().default(200),
      incremental_max_count: z.number().int().positive().default(50),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.newsgather/newsgather.db'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

export function getDefaultConfigPath(): string {
  return path.join(getAppDir(), 'config.yaml');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  const value = isRecord(existing) ? existing : {};
  raw[key] = value;
  return value;
}

/**
 * Apply NEWSGATHER_* environment overrides on top of the file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const clientId = env['NEWSGATHER_API_CLIENT_ID'];
  const clientSecret = env['NEWSGATHER_API_CLIENT_SECRET'];
  const dbPath = env['NEWSGATHER_DB_PATH'];

  if (clientId || clientSecret) {
    const api = section(rawConfig, 'search_api');
    if (clientId) api['client_id'] = clientId;
    if (clientSecret) api['client_secret'] = clientSecret;
  }
  if (dbPath) {
    section(rawConfig, 'db')['path'] = dbPath;
  }
  return rawConfig;
}

export function parseConfig(rawConfig: unknown): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

/**
 * Load configuration once at process start. The returned value is handed to
 * createCollector(); nothing caches it at module level.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  const explorer = cosmiconfig('newsgather', {
    searchPlaces: [
      'newsgather.config.yaml',
      'newsgather.config.yml',
      '.newsgatherrc.yaml',
      '.newsgatherrc.yml',
    ],
  });

  const explicitPath = configPath ?? process.env['NEWSGATHER_CONFIG'];
  const defaultConfigPath = getDefaultConfigPath();

  let rawConfig: Record<string, unknown> = {};

  if (explicitPath) {
    const resolved = resolvePath(explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = isRecord(result?.config) ? result.config : {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = isRecord(result?.config) ? result.config : {};
  } else {
    logger.debug('No config file found, using defaults');
  }

  return parseConfig(applyEnvOverrides(rawConfig));
}

/**
 * Credentials are required only for the search API source.
 */
export function assertCredentials(config: Config): void {
  if (!config.search_api.enabled) return;

  const missing: string[] = [];
  if (!config.search_api.client_id) missing.push('search_api.client_id');
  if (!config.search_api.client_secret) missing.push('search_api.client_secret');

  if (missing.length > 0) {
    throw new ConfigError(`Missing search API credentials: ${missing.join(', ')}`, { missing });
  }
}
