// Types
export type {
  PatientProfile,
  VascularDiseaseFlags,
  StatinName,
  AddOnTherapy,
  TherapyName,
  TherapyRegimen,
  RecommendationTier,
  Recommendation,
  TreatmentProjection,
  RiskResult,
} from './types';

export {
  // Therapy table
  STATIN_NAMES,
  STATIN_REDUCTIONS,
  ADD_ON_THERAPIES,
  ADD_ON_REDUCTIONS,
  NO_STATIN,
  LDL_THERAPIES,
  isStatinName,
  isAddOnTherapy,
  regimenFromSelection,
  countVascularDisease,
} from './types';

// Errors
export { InvalidInputError, isInvalidInputError } from './errors';

// Calculations
export {
  RISK_BOUNDS,
  RRR_PER_MMOL,
  MAX_RRR,
  clampRisk,
  estimateBaselineRisk,
  estimateBaselineRiskCached,
  clearRiskCache,
  adjustRisk,
  getRecommendation,
  assessCvdRisk,
  type RiskFactors,
} from './calculations';

// Therapies
export {
  THERAPY_CLASSES,
  findTherapyConflicts,
  validateTherapyClasses,
  getStatinReduction,
  getAddOnReduction,
  projectLdl,
  type TherapyConflict,
  type LdlProjection,
} from './therapies';

export { memoize } from './memoize';

// Validation
export {
  patientProfileFields,
  patientProfileSchema,
  vascularDiseaseSchema,
  therapySelectionSchema,
  assessmentRequestSchema,
  caseRecordSchema,
  validateAssessmentRequest,
  getValidationErrors,
  type ValidatedPatientProfile,
  type ValidatedAssessmentRequest,
  type ValidatedCaseRecord,
} from './validation';

// Display formatting
export {
  formatRisk,
  formatLdl,
  formatReduction,
  summarizeResult,
  type ResultSummary,
} from './format';

// Case record export/import
export {
  CASE_RECORD_FIELDS,
  toCaseRecord,
  serializeCaseRecord,
  caseRecordFilename,
  parseCaseRecord,
  type CaseRecord,
} from './case-record';

// Report data
export {
  REPORT_TITLE,
  buildLdlHistory,
  buildReportData,
  type LdlHistoryPoint,
  type ReportIdentity,
  type ReportData,
} from './report';

// Sentry scrubbing
export { scrubSensitiveData, scrubRecord, scrubUrl, scrubBreadcrumbData } from './sentry-scrub';
