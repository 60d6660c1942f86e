import { json, type ActionFunctionArgs } from '@remix-run/node';
import * as Sentry from '@sentry/remix';
import {
  assessCvdRisk,
  buildLdlHistory,
  buildReportData,
  getValidationErrors,
  isInvalidInputError,
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
 * POST /api/report
 * Body: an assessment request, optionally with patientName.
 * Returns the data for the downloadable report.
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

    const { patient, patientName, currentTherapies, dischargeTherapies } = validation.data;
    const result = assessCvdRisk(patient, currentTherapies, dischargeTherapies);

    const now = new Date();
    const history = buildLdlHistory(result.baselineLdl, result.treatment?.projectedLdl, now);
    const report = buildReportData(
      { name: patientName, age: patient.age, sex: patient.sex },
      result,
      history,
      now,
    );

    return json({ success: true, report });
  } catch (error) {
    if (isInvalidInputError(error)) {
      return invalidInput({ [`patient.${error.field}`]: error.message });
    }
    console.error('Error building report:', error);
    Sentry.captureException(error);
    return serverError();
  }
}
