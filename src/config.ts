/**
 * querylens Configuration
 * Centralized config for the query service connection and polling cadence
 */

export interface ServiceConfig {
  apiUrl: string;
  pollIntervalMs: number;
  requestTimeoutMs: number;
  queryTimeoutMs: number;
  exportDir: string;
  debug: boolean;
}

export const DEFAULT_API_URL = 'http://127.0.0.1:8000';

type Env = Record<string, string | undefined>;

function readInteger(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isInteger(value) ? value : NaN;
}

/**
 * Get the current configuration from the environment
 */
export function getConfig(env: Env = process.env): ServiceConfig {
  return {
    apiUrl: (env.QUERYLENS_API_URL?.trim() || DEFAULT_API_URL).replace(/\/+$/, ''),
    pollIntervalMs: readInteger(env, 'QUERYLENS_POLL_INTERVAL_MS', 1000),
    requestTimeoutMs: readInteger(env, 'QUERYLENS_REQUEST_TIMEOUT_MS', 10000),
    queryTimeoutMs: readInteger(env, 'QUERYLENS_QUERY_TIMEOUT_MS', 120000),
    exportDir: env.QUERYLENS_EXPORT_DIR?.trim() || process.cwd(),
    debug: env.QUERYLENS_DEBUG?.toLowerCase() === 'true',
  };
}

function isLocalHost(hostname: string): boolean {
  return hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '::1' || hostname === '[::1]';
}

/**
 * Validate configuration
 */
export function validateConfig(config: ServiceConfig = getConfig()): { valid: boolean; warnings: string[]; errors: string[] } {
  const warnings: string[] = [];
  const errors: string[] = [];

  let url: URL | null = null;
  try {
    url = new URL(config.apiUrl);
  } catch {
    errors.push(`QUERYLENS_API_URL is not a valid URL: ${config.apiUrl}`);
  }

  if (url) {
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      errors.push(`QUERYLENS_API_URL must use http or https, got ${url.protocol}`);
    } else if (url.protocol === 'http:' && !isLocalHost(url.hostname)) {
      warnings.push(`query service at ${url.host} is reached over plain http`);
    }
  }

  const intervals: Array<[string, number]> = [
    ['QUERYLENS_POLL_INTERVAL_MS', config.pollIntervalMs],
    ['QUERYLENS_REQUEST_TIMEOUT_MS', config.requestTimeoutMs],
    ['QUERYLENS_QUERY_TIMEOUT_MS', config.queryTimeoutMs],
  ];
  for (const [key, value] of intervals) {
    if (!Number.isInteger(value) || value <= 0) {
      errors.push(`${key} must be a positive integer`);
    }
  }

  if (config.pollIntervalMs > 0 && config.pollIntervalMs < 250) {
    warnings.push('poll interval below 250ms puts extra load on the query service');
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
  };
}
