/**
 * Shared helpers for the API route handlers.
 */
import { json } from '@remix-run/node';
import { rateLimit } from './rate-limit.server';

/**
 * Parse a JSON request body. Malformed JSON is a client error, not a server error.
 */
export async function readJsonBody(
  request: Request,
): Promise<{ success: true; body: unknown } | { success: false }> {
  const text = await request.text();
  try {
    return { success: true, body: JSON.parse(text) };
  } catch {
    return { success: false };
  }
}

export function methodNotAllowed() {
  return json({ success: false, error: 'Method not allowed' }, { status: 405 });
}

export function invalidJson() {
  return json({ success: false, error: 'Request body must be valid JSON' }, { status: 400 });
}

export function invalidInput(errors: Record<string, string>) {
  return json({ success: false, error: 'Invalid input', errors }, { status: 400 });
}

export function serverError() {
  return json({ success: false, error: 'Server error' }, { status: 500 });
}

/**
 * Apply the per-IP rate limit. Returns a 429 response when exceeded, null otherwise.
 */
export function checkRateLimit(request: Request) {
  const limit = rateLimit(request);
  if (limit.allowed) return null;
  return json(
    { success: false, error: 'Too many requests. Please try again later.' },
    { status: 429, headers: { 'Retry-After': String(limit.retryAfterSeconds) } },
  );
}
