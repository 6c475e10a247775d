import { Logger, consoleLogger } from './logger';

export type Locale = 'en' | 'ja';

export interface ClientConfig {
  /** Origin of the circles backend, without trailing slash. */
  apiBaseUrl: string;
  /** Per-request timeout enforced by the HTTP client. */
  timeoutMs: number;
  /** Language of user-visible messages. */
  locale: Locale;
  /** Serve the offline sample taxonomy when the backend is unreachable. */
  taxonomyFallback: boolean;
  /** TTL of cached subcategory/tag lists, in seconds. */
  taxonomyCacheTtlSeconds: number;
  logger: Logger;
}

export const DEFAULT_CONFIG: ClientConfig = {
  apiBaseUrl: 'http://127.0.0.1:8000',
  timeoutMs: 15_000,
  locale: 'en',
  taxonomyFallback: true,
  taxonomyCacheTtlSeconds: 300,
  logger: consoleLogger,
};

type Env = Record<string, string | undefined>;

/**
 * Build the client configuration from environment variables.
 * Unset or malformed values keep their defaults.
 */
export function loadClientConfig(env: Env = process.env, overrides: Partial<ClientConfig> = {}): ClientConfig {
  const fromEnv: ClientConfig = {
    ...DEFAULT_CONFIG,
    apiBaseUrl: trimSlash(env.CIRCLES_API_BASE_URL?.trim() || DEFAULT_CONFIG.apiBaseUrl),
    timeoutMs: positiveInt(env.CIRCLES_HTTP_TIMEOUT_MS, DEFAULT_CONFIG.timeoutMs),
    locale: parseLocale(env.CIRCLES_LOCALE),
    taxonomyFallback: parseBool(env.CIRCLES_TAXONOMY_FALLBACK, DEFAULT_CONFIG.taxonomyFallback),
    taxonomyCacheTtlSeconds: positiveInt(env.CIRCLES_TAXONOMY_CACHE_TTL, DEFAULT_CONFIG.taxonomyCacheTtlSeconds),
  };
  return { ...fromEnv, ...overrides };
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const num = Number(raw);
  return Number.isInteger(num) && num > 0 ? num : fallback;
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return fallback;
}

function parseLocale(raw: string | undefined): Locale {
  return raw?.trim().toLowerCase() === 'ja' ? 'ja' : 'en';
}
