import { type ActionFunctionArgs } from '@remix-run/node';
import * as Sentry from '@sentry/remix';
import { z } from 'zod';
import {
  caseRecordFilename,
  getValidationErrors,
  patientProfileSchema,
  serializeCaseRecord,
} from '@cvd-risk/core';
import {
  checkRateLimit,
  invalidInput,
  invalidJson,
  methodNotAllowed,
  readJsonBody,
  serverError,
} from '../lib/route-helpers.server';

const exportRequestSchema = z.object({
  patient: patientProfileSchema,
});

/**
 * POST /api/case-export
 * Body: { patient }. Responds with the case record as a JSON file download.
 */
export async function action({ request }: ActionFunctionArgs) {
  if (request.method !== 'POST') {
    return methodNotAllowed();
  }

  const limited = checkRateLimit(request);
  if (limited) return limited;

  try {
    const parsedBody = await readJsonBody(request);
    if (!parsedBody.success) return invalidJson();

    const parsed = exportRequestSchema.safeParse(parsedBody.body);
    if (!parsed.success) {
      return invalidInput(getValidationErrors(parsed.error));
    }

    return new Response(serializeCaseRecord(parsed.data.patient), {
      status: 200,
      headers: {
        'Content-Type': 'application/json; charset=utf-8',
        'Content-Disposition': `attachment; filename="${caseRecordFilename(new Date())}"`,
        'Cache-Control': 'no-store',
      },
    });
  } catch (error) {
    console.error('Error exporting case record:', error);
    Sentry.captureException(error);
    return serverError();
  }
}
