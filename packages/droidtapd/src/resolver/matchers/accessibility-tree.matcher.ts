import { Injectable } from '@nestjs/common';
import { ResolvedTarget, UIElement } from '@droidtap/shared';
import { ResolutionContext } from '../resolution-context';
import { TierMatcher } from './tier-matcher.interface';

export const WORD_OVERLAP_FLOOR = 0.5;
export const LONG_TEXT_BONUS = 0.1;
export const LONG_TEXT_LENGTH = 20;
export const CLICKABLE_BONUS = 0.05;

function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

/**
 * Fraction of query words present in the element's text and description,
 * plus bonuses for long content text and clickability. Zero when no query
 * word overlaps.
 */
export function scoreWordOverlap(
  queryWords: ReadonlySet<string>,
  element: UIElement,
): number {
  if (queryWords.size === 0) {
    return 0;
  }

  const combined = `${element.text} ${element.contentDescription}`;
  const elementWords = tokenize(combined);
  let overlap = 0;
  for (const word of queryWords) {
    if (elementWords.has(word)) {
      overlap += 1;
    }
  }
  if (overlap === 0) {
    return 0;
  }

  let score = overlap / queryWords.size;
  if (combined.trim().length > LONG_TEXT_LENGTH) {
    score += LONG_TEXT_BONUS;
  }
  if (element.clickable) {
    score += CLICKABLE_BONUS;
  }
  return score;
}

const labelOf = (element: UIElement) =>
  element.text || element.contentDescription;

/**
 * Tier 1: substring match on text, then on content description, then the
 * best word-overlap score above the floor.
 */
@Injectable()
export class AccessibilityTreeMatcher implements TierMatcher {
  readonly tier = 'accessibility-tree' as const;

  isEnabled(): boolean {
    return true;
  }

  async attempt(context: ResolutionContext): Promise<ResolvedTarget | null> {
    const needle = context.query.searchText.trim();
    if (!needle) {
      return null;
    }
    const elements = await context.elements();

    const byText = elements.find((element) =>
      element.text.toLowerCase().includes(needle),
    );
    if (byText) {
      return this.target(byText, 1);
    }

    const byDescription = elements.find((element) =>
      element.contentDescription.toLowerCase().includes(needle),
    );
    if (byDescription) {
      return this.target(byDescription, 1);
    }

    const queryWords = tokenize(needle);
    let best: UIElement | null = null;
    let bestScore = 0;
    for (const element of elements) {
      const score = scoreWordOverlap(queryWords, element);
      if (score > bestScore) {
        best = element;
        bestScore = score;
      }
    }

    if (!best || bestScore < WORD_OVERLAP_FLOOR) {
      return null;
    }
    return this.target(best, bestScore);
  }

  private target(element: UIElement, score: number): ResolvedTarget {
    return {
      coordinates: { ...element.center },
      tier: this.tier,
      label: labelOf(element),
      score,
    };
  }
}
