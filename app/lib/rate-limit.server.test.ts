import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { rateLimit, resetRateLimits, getClientIp } from './rate-limit.server';

function makeRequest(ip: string): Request {
  return new Request('http://localhost/api/assessment', {
    headers: { 'X-Forwarded-For': ip },
  });
}

describe('getClientIp', () => {
  it('takes the first X-Forwarded-For hop', () => {
    const req = new Request('http://localhost/', {
      headers: { 'X-Forwarded-For': '192.168.1.1, 10.0.0.1' },
    });
    expect(getClientIp(req)).toBe('192.168.1.1');
  });

  it('falls back to X-Real-IP', () => {
    const req = new Request('http://localhost/', { headers: { 'X-Real-IP': ' 10.1.1.1 ' } });
    expect(getClientIp(req)).toBe('10.1.1.1');
  });

  it('returns unknown without proxy headers', () => {
    expect(getClientIp(new Request('http://localhost/'))).toBe('unknown');
  });
});

describe('rateLimit', () => {
  beforeEach(() => {
    resetRateLimits();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('allows requests under the limit', () => {
    const result = rateLimit(makeRequest('10.0.0.1'), { maxRequests: 5 });
    expect(result).toEqual({ allowed: true, remaining: 4, retryAfterSeconds: 0 });
  });

  it('tracks requests per IP', () => {
    for (let i = 0; i < 3; i++) {
      rateLimit(makeRequest('10.0.0.2'), { maxRequests: 5 });
    }
    const result = rateLimit(makeRequest('10.0.0.2'), { maxRequests: 5 });
    expect(result.allowed).toBe(true);
    expect(result.remaining).toBe(1);
  });

  it('blocks requests over the limit with a retry delay', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    for (let i = 0; i < 5; i++) {
      rateLimit(makeRequest('10.0.0.3'), { maxRequests: 5, windowMs: 60_000 });
    }
    vi.setSystemTime(new Date('2026-01-01T00:00:15Z'));
    const result = rateLimit(makeRequest('10.0.0.3'), { maxRequests: 5, windowMs: 60_000 });
    expect(result).toEqual({ allowed: false, remaining: 0, retryAfterSeconds: 45 });
  });

  it('isolates different IPs', () => {
    for (let i = 0; i < 5; i++) {
      rateLimit(makeRequest('10.0.0.4'), { maxRequests: 5 });
    }
    expect(rateLimit(makeRequest('10.0.0.5'), { maxRequests: 5 }).allowed).toBe(true);
  });

  it('resets after the window expires', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    for (let i = 0; i < 6; i++) {
      rateLimit(makeRequest('10.0.0.6'), { maxRequests: 5, windowMs: 1000 });
    }
    vi.setSystemTime(new Date('2026-01-01T00:00:02Z'));
    expect(rateLimit(makeRequest('10.0.0.6'), { maxRequests: 5, windowMs: 1000 }).allowed).toBe(true);
  });

  it('blocks everything when the limit is zero', () => {
    expect(rateLimit(makeRequest('10.0.0.7'), { maxRequests: 0 }).allowed).toBe(false);
  });
});
