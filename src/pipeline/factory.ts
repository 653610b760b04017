// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE FACTORY — Build Extractors and Pipelines From Config
// ═══════════════════════════════════════════════════════════════════════════════

import type { AppConfig } from '../config/schema.js';
import type { EntityExtractor } from '../ner/types.js';
import { SpanMatcher } from '../ner/span-matcher.js';
import { buildLexiconIndex } from '../lexicon/index.js';
import { CanonicalVocabulary } from '../vocabulary/index.js';
import type { SentenceSplitter } from '../text/index.js';
import { ClinicalPipeline } from './clinical-pipeline.js';

/**
 * Load reference data and construct the extractor selected by `ner.matcher`.
 * Call once at startup; the result is shared by every document.
 */
export async function createExtractor(config: AppConfig): Promise<EntityExtractor> {
  if (config.ner.matcher === 'canonical') {
    const vocabulary = new CanonicalVocabulary({ directory: config.vocabulary.directory });
    await vocabulary.initialize();
    return vocabulary;
  }

  const index = await buildLexiconIndex(config.lexicon.directory, config.lexicon.files);
  return new SpanMatcher(index, {
    enableFuzzy: config.ner.enableFuzzy,
    minFuzzy: config.ner.minFuzzy,
  });
}

export function createPipeline(
  config: AppConfig,
  extractor: EntityExtractor,
  splitter?: SentenceSplitter
): ClinicalPipeline {
  return new ClinicalPipeline({
    extractor,
    splitter,
    leftWindowChars: config.assertion.leftWindowChars,
    filter: config.filter,
  });
}
