/**
 * Configuration
 * Builds the application config from an environment map. Nothing below the
 * entry point reads process.env; services receive their section at construction.
 */

import type { ServerConfig } from '../types/server.types.js';

export interface NsConfig {
  gatewayUrl: string;
  apiKey: string;
  timeoutMs: number;
  /** Minimum similarity ratio for the local fuzzy station match */
  fuzzyCutoff: number;
  /** Product category codes ranked first in trip results */
  preferredCategories: string[];
  /** 0 disables caching of the full station directory */
  stationCacheTtlMs: number;
}

export interface AirLabsConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

export interface GitHubVaultConfig {
  apiUrl: string;
  token: string;
  /** owner/name */
  repo: string;
  dailyNotesDir: string;
  timeoutMs: number;
}

export interface WeatherConfig {
  baseUrl: string;
  timeoutMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  ns?: NsConfig;
  airlabs?: AirLabsConfig;
  github?: GitHubVaultConfig;
  weather: WeatherConfig;
  /** Problems found while parsing; values fell back to defaults */
  warnings: string[];
}

export const CONFIG_DEFAULTS = {
  PORT: 8000,
  HOST: '0.0.0.0',
  HTTP_TIMEOUT_MS: 10000,
  MIN_TIMEOUT_MS: 1000,
  MAX_TIMEOUT_MS: 15000,
  NS_GATEWAY_URL: 'https://gateway.apiportal.ns.nl',
  NS_FUZZY_CUTOFF: 0.6,
  NS_PREFERRED_CATEGORIES: ['ICD', 'ICE', 'EST', 'THA'],
  NS_STATION_CACHE_TTL_MS: 0,
  AIRLABS_BASE_URL: 'https://airlabs.co/api/v9',
  GITHUB_API_URL: 'https://api.github.com',
  OPEN_METEO_URL: 'https://api.open-meteo.com',
} as const;

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  isValid: (value: number) => boolean,
  warnings: string[]
): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || !isValid(value)) {
    warnings.push(`${key}="${raw}" is not valid, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readList(env: Env, key: string, fallback: readonly string[]): string[] {
  const raw = readString(env, key);
  if (raw === undefined) return [...fallback];

  const items = raw.split(',').map(item => item.trim().toUpperCase()).filter(Boolean);
  return items.length > 0 ? items : [...fallback];
}

function readEnvironment(env: Env): ServerConfig['environment'] {
  const value = readString(env, 'NODE_ENV');
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

/**
 * Load configuration from an environment map (defaults to process.env)
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const warnings: string[] = [];

  const timeoutMs = readNumber(
    env,
    'HTTP_TIMEOUT_MS',
    CONFIG_DEFAULTS.HTTP_TIMEOUT_MS,
    value => value >= CONFIG_DEFAULTS.MIN_TIMEOUT_MS && value <= CONFIG_DEFAULTS.MAX_TIMEOUT_MS,
    warnings
  );

  const server: ServerConfig = {
    port: readNumber(env, 'PORT', CONFIG_DEFAULTS.PORT, value => Number.isInteger(value) && value > 0 && value < 65536, warnings),
    host: readString(env, 'HOST') ?? CONFIG_DEFAULTS.HOST,
    environment: readEnvironment(env),
    allowedOrigins: (readString(env, 'ALLOWED_ORIGINS') ?? '')
      .split(',')
      .map(origin => origin.trim())
      .filter(Boolean),
  };

  const nsApiKey = readString(env, 'NS_API_KEY');
  const ns: NsConfig | undefined = nsApiKey ? {
    gatewayUrl: readString(env, 'NS_GATEWAY_URL') ?? CONFIG_DEFAULTS.NS_GATEWAY_URL,
    apiKey: nsApiKey,
    timeoutMs,
    fuzzyCutoff: readNumber(env, 'NS_FUZZY_CUTOFF', CONFIG_DEFAULTS.NS_FUZZY_CUTOFF, value => value > 0 && value <= 1, warnings),
    preferredCategories: readList(env, 'NS_PREFERRED_CATEGORIES', CONFIG_DEFAULTS.NS_PREFERRED_CATEGORIES),
    stationCacheTtlMs: readNumber(env, 'NS_STATION_CACHE_TTL_MS', CONFIG_DEFAULTS.NS_STATION_CACHE_TTL_MS, value => value >= 0, warnings),
  } : undefined;

  const airlabsApiKey = readString(env, 'AIRLABS_API_KEY');
  const airlabs: AirLabsConfig | undefined = airlabsApiKey ? {
    baseUrl: readString(env, 'AIRLABS_BASE_URL') ?? CONFIG_DEFAULTS.AIRLABS_BASE_URL,
    apiKey: airlabsApiKey,
    timeoutMs,
  } : undefined;

  const githubToken = readString(env, 'GITHUB_PERSONAL_TOKEN');
  const vaultRepo = readString(env, 'OBSIDIAN_GITHUB_REPO');
  if (vaultRepo && !/^[\w.-]+\/[\w.-]+$/.test(vaultRepo)) {
    warnings.push(`OBSIDIAN_GITHUB_REPO="${vaultRepo}" is not in owner/name form, Obsidian tools disabled`);
  }
  const github: GitHubVaultConfig | undefined = githubToken && vaultRepo && /^[\w.-]+\/[\w.-]+$/.test(vaultRepo) ? {
    apiUrl: readString(env, 'GITHUB_API_URL') ?? CONFIG_DEFAULTS.GITHUB_API_URL,
    token: githubToken,
    repo: vaultRepo,
    dailyNotesDir: (readString(env, 'OBSIDIAN_DAILY_NOTES_DIR') ?? '').replace(/^\/+|\/+$/g, ''),
    timeoutMs,
  } : undefined;

  return {
    server,
    ns,
    airlabs,
    github,
    weather: {
      baseUrl: readString(env, 'OPEN_METEO_URL') ?? CONFIG_DEFAULTS.OPEN_METEO_URL,
      timeoutMs,
    },
    warnings,
  };
}
