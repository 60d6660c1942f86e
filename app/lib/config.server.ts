/**
 * Server configuration from environment variables.
 *
 * SENTRY_DSN                 Sentry is disabled when unset
 * SENTRY_TRACES_SAMPLE_RATE  default 0.2
 * RATE_LIMIT_MAX             requests per window per client IP, default 60
 * RATE_LIMIT_WINDOW_MS       default 60000
 */
export interface ServerConfig {
  sentryDsn: string | null;
  sentryTracesSampleRate: number;
  rateLimitMax: number;
  rateLimitWindowMs: number;
  environment: string;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    console.warn(`Ignoring invalid numeric setting "${value}", using ${fallback}`);
    return fallback;
  }
  return parsed;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  return {
    sentryDsn: env.SENTRY_DSN || null,
    sentryTracesSampleRate: Math.min(parseNumber(env.SENTRY_TRACES_SAMPLE_RATE, 0.2), 1),
    rateLimitMax: Math.floor(parseNumber(env.RATE_LIMIT_MAX, 60)),
    rateLimitWindowMs: parseNumber(env.RATE_LIMIT_WINDOW_MS, 60_000),
    environment: env.NODE_ENV || 'development',
  };
}

export const config = loadConfig();
