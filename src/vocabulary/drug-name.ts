// ═══════════════════════════════════════════════════════════════════════════════
// DRUG NAMES — Active-Ingredient Key for Normalized Drug Matching
// ═══════════════════════════════════════════════════════════════════════════════

const DOSAGE = /\d+\s*(mg|g|ml|mcg|ui)/g;
const PHARMACEUTICAL_FORMS =
  /(comprimido|capsula|solucao|ampola|frasco|suspensao|creme|pomada|dragea|xarope|solução|cápsula|drágea)/g;
const CONNECTORS = new Set(['de', 'da', 'do', 'com', 'em', 'a', 'o', 'e', 'para', 'por']);

export const MIN_DRUG_NAME_LENGTH = 4;

/**
 * "PARACETAMOL 500MG COMPRIMIDO" → "paracetamol"
 * "METFORMINA CLORIDRATO 850MG"  → "metformina"
 *
 * Returns '' when the first remaining word is shorter than four characters.
 */
export function normalizeDrugName(name: string): string {
  const words = name
    .toLowerCase()
    .replace(DOSAGE, '')
    .replace(PHARMACEUTICAL_FORMS, '')
    .split(/\s+/)
    .filter(word => word !== '' && !CONNECTORS.has(word));

  const first = words[0];
  if (first === undefined || first.length < MIN_DRUG_NAME_LENGTH) {
    return '';
  }
  return first;
}
