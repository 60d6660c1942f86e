import type { RiskResult } from './types';

/** Risk percentage to 1 decimal, e.g. "54.6%" */
export function formatRisk(risk: number): string {
  return `${risk.toFixed(1)}%`;
}

/** LDL-C to 1 decimal, e.g. "1.8 mmol/L" */
export function formatLdl(ldl: number): string {
  return `${ldl.toFixed(1)} mmol/L`;
}

/** % LDL reduction; whole numbers without decimals ("50%"), otherwise 1 decimal ("47.5%") */
export function formatReduction(reduction: number): string {
  return Number.isInteger(reduction) ? `${reduction}%` : `${reduction.toFixed(1)}%`;
}

/**
 * Render-ready strings for a risk result.
 * Treatment fields are absent when the discharge selection has conflicts.
 */
export interface ResultSummary {
  baselineRisk: string;
  conflicts: string[];
  projectedLdl?: string;
  totalReduction?: string;
  finalRisk?: string;
  absoluteRiskReduction?: string;
  recommendationTier?: string;
  recommendation?: string;
}

export function summarizeResult(result: RiskResult): ResultSummary {
  const summary: ResultSummary = {
    baselineRisk: formatRisk(result.baselineRisk),
    conflicts: [...result.conflicts],
  };

  const { treatment } = result;
  if (treatment) {
    summary.projectedLdl = formatLdl(treatment.projectedLdl);
    summary.totalReduction = formatReduction(treatment.totalReduction);
    summary.finalRisk = formatRisk(treatment.finalRisk);
    summary.absoluteRiskReduction = formatRisk(treatment.absoluteRiskReduction);
    summary.recommendationTier = treatment.recommendation.label;
    summary.recommendation = treatment.recommendation.advice;
  }

  return summary;
}
