import { OrdinalQuery } from '@droidtap/shared';
import { ResolutionVocabulary } from './resolution-vocabulary';

export interface NormalizedQuery {
  /** The query exactly as received */
  raw: string;
  /** Trimmed and lower-cased */
  text: string;
  /** Content words used by the text-matching tiers */
  searchText: string;
  requiresVision: boolean;
  ordinal: OrdinalQuery | null;
}

const ORDINAL_PATTERN = /^(?:the\s+)?(\w+)\s+(.+)$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export function detectOrdinal(
  text: string,
  vocabulary: ResolutionVocabulary,
): OrdinalQuery | null {
  const match = ORDINAL_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const [, word, rest] = match;
  const itemType = rest.trim();
  if (!Object.prototype.hasOwnProperty.call(vocabulary.ordinals, word) || !itemType) {
    return null;
  }
  return { position: vocabulary.ordinals[word], itemType };
}

/**
 * True when the query names something only a vision model can see, such as a
 * colour or an object in an image. Lexicon entries match as whole words or
 * whole phrases, so "scare" does not trigger on "car".
 */
export function needsVision(
  text: string,
  vocabulary: ResolutionVocabulary,
): boolean {
  return vocabulary.visionLexicon.some((entry) => {
    const phrase = words(entry).map(escapeRegExp).join('\\s+');
    return new RegExp(`(?:^|[^a-z0-9])${phrase}(?:$|[^a-z0-9])`).test(text);
  });
}

/**
 * Strips verbs, articles and UI-type words: "tap the subscribe button"
 * becomes "subscribe". Falls back to dropping only verbs, then to the text
 * itself, so the result is never empty for a non-empty query.
 */
export function cleanSearchText(
  text: string,
  vocabulary: ResolutionVocabulary,
): string {
  const tokens = words(text);

  const content = tokens.filter((word) => !vocabulary.stopWords.includes(word));
  if (content.length > 0) {
    return content.join(' ');
  }

  const withoutVerbs = tokens.filter(
    (word) => !vocabulary.fallbackVerbs.includes(word),
  );
  if (withoutVerbs.length > 0) {
    return withoutVerbs.join(' ');
  }

  return text;
}

export function normalizeQuery(
  raw: string,
  vocabulary: ResolutionVocabulary,
): NormalizedQuery {
  const text = raw.trim().toLowerCase();
  return {
    raw,
    text,
    searchText: cleanSearchText(text, vocabulary),
    requiresVision: needsVision(text, vocabulary),
    ordinal: detectOrdinal(text, vocabulary),
  };
}
