import { json, type ActionFunctionArgs } from '@remix-run/node';
import * as Sentry from '@sentry/remix';
import {
  assessCvdRisk,
  getValidationErrors,
  isInvalidInputError,
  summarizeResult,
  validateAssessmentRequest,
} from '@cvd-risk/core';
import {
  checkRateLimit,
  invalidInput,
  invalidJson,
  methodNotAllowed,
  readJsonBody,
  serverError,
} from '../lib/route-helpers.server';

/**
 * POST /api/assessment
 * Body: { patient, currentTherapies?, dischargeTherapies? }
 * Returns the raw result and its display summary.
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

    const validation = validateAssessmentRequest(parsedBody.body);
    if (!validation.success || !validation.data) {
      return invalidInput(validation.errors ? getValidationErrors(validation.errors) : {});
    }

    const { patient, currentTherapies, dischargeTherapies } = validation.data;
    const result = assessCvdRisk(patient, currentTherapies, dischargeTherapies);

    return json({ success: true, result, summary: summarizeResult(result) });
  } catch (error) {
    if (isInvalidInputError(error)) {
      return invalidInput({ [`patient.${error.field}`]: error.message });
    }
    console.error('Error computing assessment:', error);
    Sentry.captureException(error);
    return serverError();
  }
}
