/**
 * Sentry PII/PHI scrubbing utilities.
 *
 * Pure functions (no Sentry dependency) that strip patient risk factors,
 * results, therapy selections and identity from objects before they leave
 * the server via Sentry error reports.
 */

const REDACTED = '[Filtered]';

/**
 * Exact-match sensitive keys (compared lowercase).
 * Covers both camelCase (API) and snake_case (case record / query) variants.
 */
const SENSITIVE_EXACT_KEYS = new Set([
  // Risk factors
  'age',
  'sex',
  'sbp', 'systolic_bp',
  'totalchol', 'total_chol', 'total_cholesterol',
  'hdl', 'hdlc',
  'ldl', 'ldlc',
  'smoker',
  'diabetic',
  'egfr',
  'crp',
  'vasccount', 'vasc_count',
  'cad', 'stroketia', 'stroke_tia', 'pad',
  'vasculardisease', 'vascular_disease',
  // Calculated results
  'baselinerisk', 'baseline_risk',
  'baselineldl', 'baseline_ldl',
  'finalrisk', 'final_risk',
  'projectedldl', 'projected_ldl',
  'totalreduction', 'total_reduction',
  'absoluteriskreduction', 'absolute_risk_reduction',
  'recommendation', 'recommendationtier',
  'ldlhistory', 'ldl_history',
  // Identity
  'name', 'patientname', 'patient_name',
  'patient',
]);

/**
 * If a key contains any of these substrings (lowercase), scrub it.
 * Catches compound fields like "currentTherapies", "statinName", etc.
 */
const SENSITIVE_SUBSTRINGS = [
  'therap', 'statin', 'ezetimibe', 'pcsk9', 'inclisiran', 'addon',
];

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  if (SENSITIVE_EXACT_KEYS.has(lower)) return true;
  return SENSITIVE_SUBSTRINGS.some(sub => lower.includes(sub));
}

/**
 * Recursively scrub sensitive fields from an object.
 * Returns a new object with sensitive values replaced by '[Filtered]'.
 */
export function scrubSensitiveData(
  input: unknown,
  maxDepth = 10,
  currentDepth = 0,
): unknown {
  if (input === null || input === undefined) return input;
  if (currentDepth >= maxDepth) return REDACTED;
  if (typeof input !== 'object') return input;

  if (Array.isArray(input)) {
    return input.map(item => scrubSensitiveData(item, maxDepth, currentDepth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (isSensitiveKey(key)) {
      result[key] = REDACTED;
    } else if (typeof value === 'object' && value !== null) {
      result[key] = scrubSensitiveData(value, maxDepth, currentDepth + 1);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * scrubSensitiveData for a top-level record (Sentry extra, a context, breadcrumb data).
 */
export function scrubRecord(input: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    result[key] = isSensitiveKey(key) ? REDACTED : scrubSensitiveData(value, 10, 1);
  }
  return result;
}

/** Query params that should be redacted from URLs. */
const SENSITIVE_PARAMS = ['name', 'patient', 'token'];

/**
 * Redact sensitive query parameter values from a URL string.
 * Preserves the path and non-sensitive params.
 */
export function scrubUrl(url: string): string {
  try {
    const isRelative = !url.startsWith('http');
    const parsed = new URL(url, 'https://placeholder.invalid');
    let changed = false;
    for (const param of SENSITIVE_PARAMS) {
      if (parsed.searchParams.has(param)) {
        parsed.searchParams.set(param, REDACTED);
        changed = true;
      }
    }
    if (!changed) return url;
    if (isRelative) return parsed.pathname + parsed.search;
    return parsed.toString();
  } catch {
    return url;
  }
}

/**
 * Scrub fetch/xhr/http breadcrumb data.
 * Removes request/response bodies entirely (they contain patient data payloads).
 * Scrubs sensitive query params from the URL.
 */
export function scrubBreadcrumbData(
  data: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined {
  if (!data) return data;

  const scrubbed = { ...data };

  if (typeof scrubbed.url === 'string') {
    scrubbed.url = scrubUrl(scrubbed.url);
  }

  // Remove body fields; every POST payload in this app is a patient case
  delete scrubbed.body;
  delete scrubbed.request_body;
  delete scrubbed.request_body_size;
  delete scrubbed.response_body_size;

  return scrubbed;
}
