// ═══════════════════════════════════════════════════════════════════════════════
// CLINICAL PATTERNS — High-Precision Regex Layer (Vitals, Scores, FAST)
// ═══════════════════════════════════════════════════════════════════════════════

import type { EntityType } from '../types/entities.js';
import { boundedPattern } from '../text/index.js';

export interface ClinicalPattern {
  readonly name: string;
  readonly regex: RegExp;
  readonly entityType: EntityType;
  readonly score: number;
}

function pattern(name: string, source: string, entityType: EntityType, score: number): ClinicalPattern {
  return { name, regex: new RegExp(boundedPattern(source), 'giu'), entityType, score };
}

/**
 * Default pattern layer, run over raw sentence text.
 * Matches are shared RegExp objects; scan them with `matchAll`.
 */
export const CLINICAL_PATTERNS: readonly ClinicalPattern[] = [
  // GCS 15, Glasgow: 14
  pattern('glasgow', '(?:GCS|Glasgow|ECG)\\s*(?:=|:)?\\s*(?:[3-9]|1[0-5])', 'TEST', 0.98),
  // PA 120x70, 120/70, 120 x 70
  pattern('blood_pressure', '(?:PA\\s*)?\\d{2,3}\\s*(?:x|/)\\s*\\d{2,3}', 'TEST', 0.97),
  // FC 86, pulso 112 bpm
  pattern(
    'heart_rate',
    '(?:FC|frequ[eê]ncia\\s*card[ií]aca|pulso)\\s*[:=]?\\s*\\d{2,3}\\s*(?:bpm)?',
    'TEST',
    0.97
  ),
  // FR 16 irpm
  pattern(
    'respiratory_rate',
    '(?:FR|frequ[eê]ncia\\s*respirat[óo]ria)\\s*[:=]?\\s*\\d{1,3}\\s*(?:irpm|rpm|ipm)?',
    'TEST',
    0.97
  ),
  // sat 98%, saturação 97%
  pattern('oxygen_saturation', '(?:sat|saturação|saturacao|SpO2)\\s*[:=]?\\s*\\d{2,3}\\s*%?', 'TEST', 0.97),
  pattern('fast', 'FAST', 'PROCEDURE', 0.95),
];

