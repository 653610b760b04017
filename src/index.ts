// ═══════════════════════════════════════════════════════════════════════════════
// CLINICAL NER EVAL — Public API
// ═══════════════════════════════════════════════════════════════════════════════

export * from './types/result.js';
export * from './types/entities.js';
export * from './config/index.js';
export * from './observability/logging/index.js';
export * from './text/index.js';
export * from './lexicon/index.js';
export * from './ner/index.js';
export * from './vocabulary/index.js';
export * from './assertion/index.js';
export * from './postprocess/index.js';
export * from './pipeline/index.js';
export * from './eval/index.js';
