// In-memory rate limiter for the API routes.
// Tracks request counts per client IP within a fixed window.
// Single-instance only: counts are not shared between processes.

import { config } from './config.server';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

const store = new Map<string, RateLimitEntry>();

// Periodically clean up expired entries to bound memory usage.
// unref() allows the process to exit cleanly without waiting for the timer.
const cleanup = setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of store) {
    if (now > entry.resetAt) {
      store.delete(key);
    }
  }
}, 60_000);
cleanup.unref();

/**
 * Client IP from proxy headers. First X-Forwarded-For hop, then X-Real-IP.
 */
export function getClientIp(request: Request): string {
  return (
    request.headers.get('X-Forwarded-For')?.split(',')[0]?.trim() ||
    request.headers.get('X-Real-IP')?.trim() ||
    'unknown'
  );
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  retryAfterSeconds: number;
}

export function rateLimit(
  request: Request,
  {
    maxRequests = config.rateLimitMax,
    windowMs = config.rateLimitWindowMs,
  }: { maxRequests?: number; windowMs?: number } = {},
): RateLimitResult {
  const ip = getClientIp(request);
  const now = Date.now();
  const entry = store.get(ip);

  if (!entry || now > entry.resetAt) {
    store.set(ip, { count: 1, resetAt: now + windowMs });
    return { allowed: maxRequests > 0, remaining: Math.max(maxRequests - 1, 0), retryAfterSeconds: 0 };
  }

  entry.count++;
  if (entry.count > maxRequests) {
    return { allowed: false, remaining: 0, retryAfterSeconds: Math.ceil((entry.resetAt - now) / 1000) };
  }

  return { allowed: true, remaining: maxRequests - entry.count, retryAfterSeconds: 0 };
}

/** Forget all counts. */
export function resetRateLimits(): void {
  store.clear();
}
