// ═══════════════════════════════════════════════════════════════════════════════
// POSTPROCESS — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  FilterTerms,
  FilterConfig,
  FilterableEntity,
  FilterDropReason,
  FilterStats,
} from './filters.js';

export {
  DEFAULT_FILTER_SETTINGS,
  getDefaultFilterTerms,
  tokenizeSpan,
  trimPunctuation,
  filterEntities,
  filterEntitiesWithStats,
} from './filters.js';
