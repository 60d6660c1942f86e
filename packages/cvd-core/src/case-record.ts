/**
 * Flat key-value export of a patient case, for download and later re-loading.
 *
 * Only the fields below are exported; total cholesterol is re-entered on load.
 */
import type { PatientProfile } from './types';
import { caseRecordSchema, getValidationErrors, type ValidatedCaseRecord } from './validation';

export const CASE_RECORD_FIELDS = [
  'age', 'sex', 'diabetic', 'smoker', 'ldl', 'hdl', 'sbp', 'egfr', 'crp', 'vascCount',
] as const;

export type CaseRecord = Pick<PatientProfile, typeof CASE_RECORD_FIELDS[number]>;

export function toCaseRecord(profile: PatientProfile): CaseRecord {
  return {
    age: profile.age,
    sex: profile.sex,
    diabetic: profile.diabetic,
    smoker: profile.smoker,
    ldl: profile.ldl,
    hdl: profile.hdl,
    sbp: profile.sbp,
    egfr: profile.egfr,
    crp: profile.crp,
    vascCount: profile.vascCount,
  };
}

export function serializeCaseRecord(profile: PatientProfile): string {
  return JSON.stringify(toCaseRecord(profile), null, 2);
}

/** Download filename, e.g. "cvd-case-2026-10-19.json" */
export function caseRecordFilename(date: Date): string {
  return `cvd-case-${date.toISOString().slice(0, 10)}.json`;
}

/**
 * Parse and validate a previously exported case record.
 */
export function parseCaseRecord(text: string): {
  success: boolean;
  data?: ValidatedCaseRecord;
  errors?: Record<string, string>;
} {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { success: false, errors: { file: `Case record is not valid JSON (${reason})` } };
  }

  const result = caseRecordSchema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: getValidationErrors(result.error) };
}
