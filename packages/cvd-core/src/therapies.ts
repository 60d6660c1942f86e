import {
  ADD_ON_REDUCTIONS,
  NO_STATIN,
  STATIN_REDUCTIONS,
  isAddOnTherapy,
  isStatinName,
} from './types';

// ===== Therapy class conflicts =====

/**
 * Drug classes checked for duplicates, in message order.
 * A selected therapy belongs to a class when its name contains one of the keywords (case-insensitive).
 */
export const THERAPY_CLASSES: ReadonlyArray<{ drugClass: string; keywords: readonly string[] }> = [
  { drugClass: 'Statin', keywords: ['atorvastatin', 'rosuvastatin'] },
  { drugClass: 'PCSK9', keywords: ['pcsk9', 'evolocumab'] },
  { drugClass: 'Ezetimibe', keywords: ['ezetimibe'] },
  { drugClass: 'Inclisiran', keywords: ['inclisiran'] },
];

export interface TherapyConflict {
  drugClass: string;
  therapies: string[]; // in selection order
  message: string;
}

/**
 * Find drug classes with more than one selected therapy.
 * One conflict per class; classes in THERAPY_CLASSES order.
 */
export function findTherapyConflicts(selected: readonly string[]): TherapyConflict[] {
  const conflicts: TherapyConflict[] = [];

  for (const { drugClass, keywords } of THERAPY_CLASSES) {
    const therapies = selected.filter(name => {
      const lower = name.toLowerCase();
      return keywords.some(keyword => lower.includes(keyword));
    });
    if (therapies.length > 1) {
      conflicts.push({
        drugClass,
        therapies,
        message: `Multiple ${drugClass} therapies selected: ${therapies.join(', ')}`,
      });
    }
  }

  return conflicts;
}

/**
 * Conflict messages for a therapy selection. Empty means no conflicts.
 */
export function validateTherapyClasses(selected: readonly string[]): string[] {
  return findTherapyConflicts(selected).map(conflict => conflict.message);
}

// ===== LDL reduction model =====

/**
 * Base % LDL reduction of a statin. Returns 0 for 'None' or unknown names.
 */
export function getStatinReduction(statin: string): number {
  return isStatinName(statin) ? STATIN_REDUCTIONS[statin] : 0;
}

/**
 * Incremental % LDL reduction of an add-on. Returns 0 for unknown names.
 */
export function getAddOnReduction(addOn: string): number {
  return isAddOnTherapy(addOn) ? ADD_ON_REDUCTIONS[addOn] : 0;
}

export interface LdlProjection {
  projectedLdl: number;   // mmol/L
  totalReduction: number; // %
}

/**
 * Project LDL-C after a regimen change.
 *
 * The statin's reduction is halved when the patient was already on a statin
 * (switching yields less than starting). Add-ons stack additively and the total
 * is not capped, so enough add-ons push the projection to zero or below.
 */
export function projectLdl(
  currentLdl: number,
  priorStatin: string,
  newStatin: string,
  addOns: Iterable<string>,
): LdlProjection {
  let totalReduction = getStatinReduction(newStatin);
  if (priorStatin !== NO_STATIN) {
    totalReduction *= 0.5;
  }

  for (const addOn of new Set(addOns)) {
    totalReduction += getAddOnReduction(addOn);
  }

  return {
    projectedLdl: currentLdl * (1 - totalReduction / 100),
    totalReduction,
  };
}
