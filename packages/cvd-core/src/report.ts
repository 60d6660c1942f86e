/**
 * Report data for the downloadable assessment report.
 *
 * Builds the document-ready payload only; rendering to a document format
 * belongs to whoever consumes it.
 */
import type { PatientProfile, RiskResult } from './types';
import { summarizeResult, type ResultSummary } from './format';

export const REPORT_TITLE = 'CVD Risk Assessment Report';

export interface LdlHistoryPoint {
  date: string;       // YYYY-MM
  ldl: number;        // mmol/L, 1 decimal
  projected: boolean; // true for the post-treatment point
}

/**
 * Synthetic history: [months relative to the assessment, multiple of baseline LDL].
 */
const HISTORY_STEPS: ReadonlyArray<[number, number]> = [
  [-12, 1.1],
  [-6, 1.05],
  [0, 1],
];

const PROJECTION_MONTHS = 3;

function monthString(asOf: Date, offsetMonths: number): string {
  const date = new Date(Date.UTC(asOf.getUTCFullYear(), asOf.getUTCMonth() + offsetMonths, 1));
  return `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, '0')}`;
}

function roundLdl(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Short synthetic LDL-C series for the report chart.
 * Three past/current points derived from the baseline, plus the projected value
 * three months on when a projection exists.
 */
export function buildLdlHistory(
  baselineLdl: number,
  projectedLdl: number | undefined,
  asOf: Date,
): LdlHistoryPoint[] {
  const history: LdlHistoryPoint[] = HISTORY_STEPS.map(([offset, factor]) => ({
    date: monthString(asOf, offset),
    ldl: roundLdl(baselineLdl * factor),
    projected: false,
  }));

  if (projectedLdl !== undefined) {
    history.push({
      date: monthString(asOf, PROJECTION_MONTHS),
      ldl: roundLdl(projectedLdl),
      projected: true,
    });
  }

  return history;
}

export interface ReportIdentity {
  name?: string;
  age: PatientProfile['age'];
  sex: PatientProfile['sex'];
}

export interface ReportData {
  title: string;
  generatedAt: string; // YYYY-MM-DD
  patient: {
    name: string;
    age: number;
    sex: 'Male' | 'Female';
  };
  summary: ResultSummary;
  ldlHistory: LdlHistoryPoint[];
}

export function buildReportData(
  identity: ReportIdentity,
  result: RiskResult,
  ldlHistory: LdlHistoryPoint[],
  generatedAt: Date,
): ReportData {
  return {
    title: REPORT_TITLE,
    generatedAt: generatedAt.toISOString().slice(0, 10),
    patient: {
      name: identity.name?.trim() || 'Unnamed patient',
      age: identity.age,
      sex: identity.sex === 'male' ? 'Male' : 'Female',
    },
    summary: summarizeResult(result),
    ldlHistory,
  };
}
