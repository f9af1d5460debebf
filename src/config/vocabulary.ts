/**
 * DealScout — Vocabulary
 *
 * Named term sets used by the classifiers and sources.
 * Loaded from vocabulary.json and validated on import.
 */

import { z } from 'zod';
import vocabularyJson from './vocabulary.json';

const TermList = z.array(z.string().min(1)).min(1);

export const DealTypeKeywordsSchema = z.object({
  mergersAndAcquisitions: TermList,
  capitalRaise: TermList,
  debt: TermList,
});

export const VocabularySchema = z.object({
  cannabisTerms: TermList,
  dealTerms: TermList,
  dealTypeKeywords: DealTypeKeywordsSchema,
  entitySplitPhrases: TermList,
  cannabisHintRoots: TermList,
  bingQueries: TermList,
  gdeltQuery: z.string().min(1),
});

export type DealTypeKeywords = z.infer<typeof DealTypeKeywordsSchema>;
export type Vocabulary = z.infer<typeof VocabularySchema>;

export const DEFAULT_VOCABULARY: Vocabulary = VocabularySchema.parse(vocabularyJson);
