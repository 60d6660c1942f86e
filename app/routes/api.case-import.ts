import { json, type ActionFunctionArgs } from '@remix-run/node';
import * as Sentry from '@sentry/remix';
import { parseCaseRecord } from '@cvd-risk/core';
import {
  checkRateLimit,
  invalidInput,
  methodNotAllowed,
  serverError,
} from '../lib/route-helpers.server';

// Exported records are a few hundred bytes
const MAX_RECORD_BYTES = 10_000;

function tooLarge() {
  return invalidInput({ file: 'Case record is too large' });
}

/**
 * POST /api/case-import
 * Body: the text of a previously exported case record.
 * Returns the validated fields for re-loading; total cholesterol is not part of a record.
 */
export async function action({ request }: ActionFunctionArgs) {
  if (request.method !== 'POST') {
    return methodNotAllowed();
  }

  const limited = checkRateLimit(request);
  if (limited) return limited;

  try {
    const declaredLength = Number(request.headers.get('Content-Length'));
    if (declaredLength > MAX_RECORD_BYTES) {
      return tooLarge();
    }

    const text = await request.text();
    if (Buffer.byteLength(text, 'utf8') > MAX_RECORD_BYTES) {
      return tooLarge();
    }

    const parsed = parseCaseRecord(text);
    if (!parsed.success || !parsed.data) {
      return invalidInput(parsed.errors ?? {});
    }

    return json({ success: true, record: parsed.data });
  } catch (error) {
    console.error('Error importing case record:', error);
    Sentry.captureException(error);
    return serverError();
  }
}
