/**
 * Patient inputs for a single risk evaluation.
 *
 * ALL numeric values are in SI canonical units:
 *   BP: mmHg | lipids: mmol/L | eGFR: mL/min/1.73m² | hs-CRP: mg/L
 *
 * Ephemeral: a profile exists only for the duration of one evaluation.
 */
export interface PatientProfile {
  age: number;          // years, 30–100
  sex: 'male' | 'female';
  sbp: number;          // mmHg, 90–220
  totalChol: number;    // mmol/L, 2.0–10.0
  hdl: number;          // mmol/L, 0.5–3.0
  ldl: number;          // mmol/L, 0.5–6.0
  smoker: boolean;
  diabetic: boolean;
  egfr: number;         // mL/min/1.73m², 15–120
  crp: number;          // mg/L, 0.1–20.0
  vascCount: number;    // 0–3, see countVascularDisease
}

/**
 * Established vascular disease flags from the form.
 */
export interface VascularDiseaseFlags {
  cad: boolean;
  strokeTia: boolean;
  pad: boolean;
}

/** Count of true flags among CAD, stroke/TIA and PAD. */
export function countVascularDisease(flags: VascularDiseaseFlags): number {
  return [flags.cad, flags.strokeTia, flags.pad].filter(Boolean).length;
}

// ===== LDL-lowering therapy table =====

/**
 * Statins for dropdown selection, by agent and dose.
 */
export const STATIN_NAMES = [
  'Atorvastatin 20 mg',
  'Atorvastatin 80 mg',
  'Rosuvastatin 10 mg',
  'Rosuvastatin 20 mg',
] as const;

export type StatinName = typeof STATIN_NAMES[number];

/**
 * Base % LDL-C reduction when started in a statin-naive patient.
 */
export const STATIN_REDUCTIONS: Record<StatinName, number> = {
  'Atorvastatin 20 mg': 40,
  'Atorvastatin 80 mg': 50,
  'Rosuvastatin 10 mg': 45,
  'Rosuvastatin 20 mg': 55,
};

export const ADD_ON_THERAPIES = ['Ezetimibe', 'PCSK9 inhibitor', 'Inclisiran'] as const;

export type AddOnTherapy = typeof ADD_ON_THERAPIES[number];

/**
 * Incremental % LDL-C reduction of each add-on therapy.
 * Add-ons stack additively with the statin and with each other.
 */
export const ADD_ON_REDUCTIONS: Record<AddOnTherapy, number> = {
  'Ezetimibe': 20,
  'PCSK9 inhibitor': 60,
  'Inclisiran': 50,
};

export const NO_STATIN = 'None';

/**
 * Every selectable therapy, in dropdown order (statins first).
 */
export const LDL_THERAPIES = [...STATIN_NAMES, ...ADD_ON_THERAPIES] as const;

export type TherapyName = StatinName | AddOnTherapy;

/**
 * A statin plus its add-ons. One for the current regimen, one for discharge.
 */
export interface TherapyRegimen {
  statin: StatinName | typeof NO_STATIN;
  addOns: AddOnTherapy[];
}

export function isStatinName(name: string): name is StatinName {
  return STATIN_NAMES.some(statin => statin === name);
}

export function isAddOnTherapy(name: string): name is AddOnTherapy {
  return ADD_ON_THERAPIES.some(addOn => addOn === name);
}

/**
 * Split a therapy selection into a regimen.
 * The first statin in the selection wins; add-ons keep selection order without duplicates.
 * Conflicts should be checked with validateTherapyClasses before relying on the result.
 */
export function regimenFromSelection(selection: readonly string[]): TherapyRegimen {
  const statin = selection.find(isStatinName) ?? NO_STATIN;
  const addOns: AddOnTherapy[] = [];
  for (const name of selection) {
    if (isAddOnTherapy(name) && !addOns.includes(name)) addOns.push(name);
  }
  return { statin, addOns };
}

// ===== Recommendation tiers =====

export type RecommendationTier = 'very_high' | 'high' | 'moderate';

export interface Recommendation {
  tier: RecommendationTier;
  label: string;   // e.g. 'Very High Risk'
  advice: string;
}

// ===== Results =====

/**
 * Post-treatment projection. Only present when the discharge selection has no class conflicts.
 */
export interface TreatmentProjection {
  statin: StatinName | typeof NO_STATIN;
  addOns: AddOnTherapy[];
  projectedLdl: number;          // mmol/L
  totalReduction: number;        // % LDL-C reduction, uncapped
  finalRisk: number;             // %, re-clamped to [1, 99]
  absoluteRiskReduction: number; // percentage points (baseline − final)
  recommendation: Recommendation;
}

/**
 * Calculated risk results. Recomputed wholesale on any input change.
 */
export interface RiskResult {
  baselineRisk: number;  // %, clamped to [1, 99]
  baselineLdl: number;   // mmol/L (passthrough from profile)
  conflicts: string[];   // therapy-class conflicts in the discharge selection
  treatment?: TreatmentProjection;
}
