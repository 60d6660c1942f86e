import type {
  PatientProfile,
  Recommendation,
  RiskResult,
  TreatmentProjection,
} from './types';
import { regimenFromSelection } from './types';
import { InvalidInputError } from './errors';
import { memoize } from './memoize';
import { projectLdl, validateTherapyClasses } from './therapies';

/** Risk outputs are floored/capped to avoid degenerate 0% and 100% estimates. */
export const RISK_BOUNDS = { min: 1.0, max: 99.0 } as const;

/** Relative risk reduction per 1 mmol/L LDL-C lowering (%), and its ceiling. */
export const RRR_PER_MMOL = 22;
export const MAX_RRR = 60;

/**
 * The profile fields the risk score uses (LDL enters only via the treatment model).
 */
export type RiskFactors = Omit<PatientProfile, 'ldl'>;

/**
 * Clamp a risk percentage to RISK_BOUNDS.
 */
export function clampRisk(risk: number): number {
  return Math.max(RISK_BOUNDS.min, Math.min(RISK_BOUNDS.max, risk));
}

/**
 * Estimate baseline 10-year cardiovascular event risk (%).
 *
 * Proportional-hazards form: baseline survival 0.900 raised to exp(lp − 5.8),
 * where lp is a weighted sum of the risk factors. Rounded to 1 decimal and
 * clamped to [1.0, 99.0].
 *
 * Throws InvalidInputError when crp ≤ −1 (ln(crp + 1) undefined) or a value is not finite.
 */
export function estimateBaselineRisk(factors: RiskFactors): number {
  const { age, sex, sbp, totalChol, hdl, smoker, diabetic, egfr, crp, vascCount } = factors;

  for (const [field, value] of Object.entries({ age, sbp, totalChol, hdl, egfr, crp, vascCount })) {
    if (!Number.isFinite(value)) {
      throw new InvalidInputError(field, `${field} must be a finite number`);
    }
  }
  if (crp <= -1) {
    throw new InvalidInputError('crp', 'hs-CRP must be greater than -1 mg/L');
  }

  const sexMale = sex === 'male' ? 1 : 0;
  const smoking = smoker ? 1 : 0;
  const diabetes = diabetic ? 1 : 0;

  const lp =
    0.064 * age +
    0.34 * sexMale +
    0.02 * sbp +
    0.25 * totalChol -
    0.25 * hdl +
    0.44 * smoking +
    0.51 * diabetes -
    0.2 * (egfr / 10) +
    0.25 * Math.log(crp + 1) +
    0.4 * vascCount;

  const risk10 = 1 - Math.pow(0.9, Math.exp(lp - 5.8));
  return clampRisk(Math.round(risk10 * 100 * 10) / 10);
}

const cachedRisk = memoize(
  (
    age: number, sex: PatientProfile['sex'], sbp: number, totalChol: number, hdl: number,
    smoker: boolean, diabetic: boolean, egfr: number, crp: number, vascCount: number,
  ) => estimateBaselineRisk({ age, sex, sbp, totalChol, hdl, smoker, diabetic, egfr, crp, vascCount }),
);

/**
 * Memoized estimateBaselineRisk, keyed on the full risk-factor tuple.
 * Returns exactly what the uncached function returns.
 */
export function estimateBaselineRiskCached(factors: RiskFactors): number {
  return cachedRisk(
    factors.age, factors.sex, factors.sbp, factors.totalChol, factors.hdl,
    factors.smoker, factors.diabetic, factors.egfr, factors.crp, factors.vascCount,
  );
}

/** Drop all cached baseline risks. */
export function clearRiskCache(): void {
  cachedRisk.clear();
}

/**
 * Adjust a baseline risk for LDL lowering.
 * Each 1 mmol/L drop buys ~22% relative risk reduction, saturating at 60%.
 *
 * Not clamped. If the projected LDL is above baseline the drop is negative and
 * the result exceeds baselineRisk.
 */
export function adjustRisk(baselineRisk: number, baselineLdl: number, projectedLdl: number): number {
  const ldlDrop = baselineLdl - projectedLdl;
  const relativeRiskReduction = Math.min(RRR_PER_MMOL * ldlDrop, MAX_RRR);
  return baselineRisk * (1 - relativeRiskReduction / 100);
}

const RECOMMENDATIONS: Record<Recommendation['tier'], Recommendation> = {
  very_high: {
    tier: 'very_high',
    label: 'Very High Risk',
    advice: 'high-intensity statin, PCSK9 inhibitor, target SBP <130',
  },
  high: {
    tier: 'high',
    label: 'High Risk',
    advice: 'moderate-intensity statin, target SBP <130',
  },
  moderate: {
    tier: 'moderate',
    label: 'Moderate Risk',
    advice: 'lifestyle adherence, annual reassessment',
  },
};

/**
 * Recommendation tier for a (final) risk percentage.
 * ≥30 very high, 20–29.9 high, <20 moderate.
 */
export function getRecommendation(finalRisk: number): Recommendation {
  if (finalRisk >= 30) return RECOMMENDATIONS.very_high;
  if (finalRisk >= 20) return RECOMMENDATIONS.high;
  return RECOMMENDATIONS.moderate;
}

/**
 * Main calculation function - baseline risk, then the discharge regimen's projection.
 *
 * The discharge selection gates the projection: with any therapy-class conflict
 * the result carries the conflicts and no treatment block.
 */
export function assessCvdRisk(
  profile: PatientProfile,
  currentTherapies: readonly string[],
  dischargeTherapies: readonly string[],
): RiskResult {
  const baselineRisk = estimateBaselineRiskCached(profile);

  const results: RiskResult = {
    baselineRisk,
    baselineLdl: profile.ldl,
    conflicts: validateTherapyClasses(dischargeTherapies),
  };

  if (results.conflicts.length > 0) {
    return results;
  }

  const current = regimenFromSelection(currentTherapies);
  const discharge = regimenFromSelection(dischargeTherapies);
  const { projectedLdl, totalReduction } = projectLdl(profile.ldl, current.statin, discharge.statin, discharge.addOns);

  // adjustRisk leaves its result unbounded; the assessment keeps final risk in the same range as baseline
  const finalRisk = clampRisk(adjustRisk(baselineRisk, profile.ldl, projectedLdl));

  const treatment: TreatmentProjection = {
    statin: discharge.statin,
    addOns: discharge.addOns,
    projectedLdl,
    totalReduction,
    finalRisk,
    absoluteRiskReduction: baselineRisk - finalRisk,
    recommendation: getRecommendation(finalRisk),
  };
  results.treatment = treatment;

  return results;
}
