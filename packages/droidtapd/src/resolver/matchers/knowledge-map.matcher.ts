import { Inject, Injectable } from '@nestjs/common';
import { ResolvedTarget, UIElement } from '@droidtap/shared';
import { RESOLUTION_VOCABULARY } from '../../tokens';
import { ResolutionContext } from '../resolution-context';
import { KnowledgeEntry, ResolutionVocabulary } from '../resolution-vocabulary';
import { TierMatcher } from './tier-matcher.interface';

export function findKnowledgeEntry(
  searchText: string,
  vocabulary: ResolutionVocabulary,
): KnowledgeEntry | null {
  const exact = vocabulary.knowledgeMap.find((entry) => entry.key === searchText);
  if (exact) {
    return exact;
  }
  return (
    vocabulary.knowledgeMap.find(
      (entry) => entry.key.includes(searchText) || searchText.includes(entry.key),
    ) ?? null
  );
}

function isTappable(element: UIElement): boolean {
  return element.clickable || element.className.includes('Button');
}

function matchesLabel(description: string, labels: readonly string[]): boolean {
  return labels.some((label) => {
    const normalized = label.toLowerCase();
    return normalized.includes(description) || description.includes(normalized);
  });
}

/**
 * Tier 0: maps a canonical action ("subscribe", "back") to the accessibility
 * labels apps use for it and taps the first tappable element carrying one.
 */
@Injectable()
export class KnowledgeMapMatcher implements TierMatcher {
  readonly tier = 'knowledge-map' as const;

  constructor(
    @Inject(RESOLUTION_VOCABULARY)
    private readonly vocabulary: ResolutionVocabulary,
  ) {}

  isEnabled(): boolean {
    return true;
  }

  async attempt(context: ResolutionContext): Promise<ResolvedTarget | null> {
    const entry = findKnowledgeEntry(context.query.searchText, this.vocabulary);
    if (!entry) {
      return null;
    }

    const elements = await context.elements();
    const hit = elements.find((element) => {
      const description = element.contentDescription.toLowerCase();
      return (
        description.length > 0 &&
        isTappable(element) &&
        matchesLabel(description, entry.labels)
      );
    });

    if (!hit) {
      return null;
    }
    return {
      coordinates: { ...hit.center },
      tier: this.tier,
      label: hit.contentDescription,
    };
  }
}
