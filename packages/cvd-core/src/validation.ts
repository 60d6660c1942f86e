import { z } from 'zod';
import { LDL_THERAPIES, countVascularDisease } from './types';

/**
 * Field schema for a patient profile, without cross-field checks.
 *
 * ALL numeric values are in SI canonical units:
 *   BP: mmHg | lipids: mmol/L | eGFR: mL/min/1.73m² | hs-CRP: mg/L
 */
export const patientProfileFields = z.object({
  age: z
    .number()
    .int('Age must be a whole number')
    .min(30, 'Age must be at least 30')
    .max(100, 'Age must be at most 100'),
  sex: z.enum(['male', 'female'], {
    errorMap: () => ({ message: 'Please select male or female' }),
  }),
  sbp: z
    .number()
    .int('Systolic BP must be a whole number')
    .min(90, 'Systolic BP must be at least 90 mmHg')
    .max(220, 'Systolic BP must be at most 220 mmHg'),
  totalChol: z
    .number()
    .min(2, 'Total cholesterol must be at least 2 mmol/L')
    .max(10, 'Total cholesterol must be at most 10 mmol/L'),
  hdl: z
    .number()
    .min(0.5, 'HDL must be at least 0.5 mmol/L')
    .max(3, 'HDL must be at most 3 mmol/L'),
  ldl: z
    .number()
    .min(0.5, 'LDL must be at least 0.5 mmol/L')
    .max(6, 'LDL must be at most 6 mmol/L'),
  smoker: z.boolean(),
  diabetic: z.boolean(),
  egfr: z
    .number()
    .int('eGFR must be a whole number')
    .min(15, 'eGFR must be at least 15 mL/min/1.73m²')
    .max(120, 'eGFR must be at most 120 mL/min/1.73m²'),
  crp: z
    .number()
    .min(0.1, 'hs-CRP must be at least 0.1 mg/L')
    .max(20, 'hs-CRP must be at most 20 mg/L'),
  vascCount: z
    .number()
    .int()
    .min(0, 'Vascular disease count must be between 0 and 3')
    .max(3, 'Vascular disease count must be between 0 and 3'),
});

/** LDL below HDL is not a plausible lipid panel. */
function ldlNotBelowHdl(data: { ldl: number; hdl: number }): boolean {
  return data.ldl >= data.hdl;
}

const LDL_BELOW_HDL = { message: 'LDL cannot be lower than HDL', path: ['ldl'] };

/** CAD, stroke/TIA and PAD checkboxes. */
export const vascularDiseaseSchema = z.object({
  cad: z.boolean(),
  strokeTia: z.boolean(),
  pad: z.boolean(),
});

/**
 * Schema for validating a patient profile, including the LDL ≥ HDL check.
 *
 * Vascular disease comes either as `vascCount` or as the `vascularDisease`
 * flags, which are counted. The parsed profile always carries `vascCount`.
 */
export const patientProfileSchema = patientProfileFields
  .extend({
    vascCount: patientProfileFields.shape.vascCount.optional(),
    vascularDisease: vascularDiseaseSchema.optional(),
  })
  .superRefine((data, ctx) => {
    if (data.vascularDisease === undefined && data.vascCount === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Vascular disease count or flags are required',
        path: ['vascCount'],
      });
    } else if (
      data.vascularDisease !== undefined &&
      data.vascCount !== undefined &&
      countVascularDisease(data.vascularDisease) !== data.vascCount
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Vascular disease count does not match the selected conditions',
        path: ['vascCount'],
      });
    }
  })
  .transform(({ vascularDisease, vascCount, ...rest }) => ({
    ...rest,
    vascCount: vascularDisease ? countVascularDisease(vascularDisease) : (vascCount ?? 0),
  }))
  .refine(ldlNotBelowHdl, LDL_BELOW_HDL);

export type ValidatedPatientProfile = z.infer<typeof patientProfileSchema>;

/**
 * Schema for a therapy selection (multiselect of known therapy names).
 * Duplicate classes are allowed here; they are reported by validateTherapyClasses.
 */
export const therapySelectionSchema = z
  .array(z.enum(LDL_THERAPIES, {
    errorMap: () => ({ message: 'Unknown therapy' }),
  }))
  .max(LDL_THERAPIES.length * 2, 'Too many therapies selected');

/**
 * Schema for a full assessment request.
 */
export const assessmentRequestSchema = z.object({
  patient: patientProfileSchema,
  patientName: z.string().trim().max(100).optional(),
  currentTherapies: therapySelectionSchema.default([]),
  dischargeTherapies: therapySelectionSchema.default([]),
});

export type ValidatedAssessmentRequest = z.infer<typeof assessmentRequestSchema>;

/**
 * Schema for the exported case record. Same ranges as the profile; no total cholesterol.
 */
export const caseRecordSchema = patientProfileFields
  .omit({ totalChol: true })
  .strict()
  .refine(ldlNotBelowHdl, LDL_BELOW_HDL);

export type ValidatedCaseRecord = z.infer<typeof caseRecordSchema>;

/**
 * Validate an assessment request and return result
 */
export function validateAssessmentRequest(data: unknown): {
  success: boolean;
  data?: ValidatedAssessmentRequest;
  errors?: z.ZodError;
} {
  const result = assessmentRequestSchema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: result.error };
}

/**
 * Get human-readable error messages from validation result
 */
export function getValidationErrors(errors: z.ZodError): Record<string, string> {
  const errorMap: Record<string, string> = {};

  for (const issue of errors.issues) {
    const path = issue.path.join('.');
    if (!errorMap[path]) {
      errorMap[path] = issue.message;
    }
  }

  return errorMap;
}
