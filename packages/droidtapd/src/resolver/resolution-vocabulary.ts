import { z } from 'zod';
import vocabularyData from './data/vocabulary.json';

const vocabularySchema = z.object({
  knowledgeMap: z.record(z.array(z.string().min(1)).min(1)),
  visionLexicon: z.array(z.string().min(1)),
  stopWords: z.array(z.string().min(1)),
  fallbackVerbs: z.array(z.string().min(1)),
  ordinals: z.record(z.number().int()),
});

export type VocabularyData = z.input<typeof vocabularySchema>;

export interface KnowledgeEntry {
  /** Canonical action name, e.g. "subscribe" */
  readonly key: string;
  /** Accessibility labels apps commonly use for the action */
  readonly labels: readonly string[];
}

/**
 * Static word lists that drive query normalization and the knowledge-map
 * tier. Built once and never mutated.
 */
export interface ResolutionVocabulary {
  readonly knowledgeMap: readonly KnowledgeEntry[];
  readonly visionLexicon: readonly string[];
  readonly stopWords: readonly string[];
  readonly fallbackVerbs: readonly string[];
  readonly ordinals: Readonly<Record<string, number>>;
}

const freezeList = (values: string[]): readonly string[] =>
  Object.freeze(values.map((value) => value.toLowerCase()));

export function buildVocabulary(
  data: VocabularyData = vocabularyData,
): ResolutionVocabulary {
  const parsed = vocabularySchema.parse(data);

  return Object.freeze({
    knowledgeMap: Object.freeze(
      Object.entries(parsed.knowledgeMap).map(([key, labels]) =>
        Object.freeze({ key: key.toLowerCase(), labels: Object.freeze([...labels]) }),
      ),
    ),
    visionLexicon: freezeList(parsed.visionLexicon),
    stopWords: freezeList(parsed.stopWords),
    fallbackVerbs: freezeList(parsed.fallbackVerbs),
    ordinals: Object.freeze({ ...parsed.ordinals }),
  });
}
