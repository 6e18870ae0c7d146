import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AccessibilityTreeSource,
  DeviceCommands,
  OrdinalQuery,
  ResolutionOutcome,
  ResolvedTarget,
  errorMessage,
} from '@droidtap/shared';
import { describeElements } from '../accessibility/screen-description';
import {
  ACCESSIBILITY_TREE_SOURCE,
  DEVICE_COMMANDS,
  RESOLUTION_VOCABULARY,
  TIER_MATCHERS,
} from '../tokens';
import { TierMatcher } from './matchers/tier-matcher.interface';
import { OrdinalItemFinder } from './ordinal-item-finder';
import { normalizeQuery } from './query-normalizer';
import { ResolutionContext } from './resolution-context';
import { ResolutionVocabulary } from './resolution-vocabulary';

/**
 * Resolves a natural-language element description to a tap target by trying
 * progressively more expensive tiers, and taps it.
 *
 * Ordinal queries ("the second video") go to the ordinal finder; queries
 * naming colours or pictured objects go straight to the vision tier.
 * Everything else walks the tiers in order and stops at the first hit.
 */
@Injectable()
export class ResolutionCascadeService {
  private readonly logger = new Logger(ResolutionCascadeService.name);

  constructor(
    @Inject(RESOLUTION_VOCABULARY)
    private readonly vocabulary: ResolutionVocabulary,
    @Inject(TIER_MATCHERS) private readonly matchers: TierMatcher[],
    private readonly ordinalFinder: OrdinalItemFinder,
    @Inject(ACCESSIBILITY_TREE_SOURCE)
    private readonly tree: AccessibilityTreeSource,
    @Inject(DEVICE_COMMANDS) private readonly device: DeviceCommands,
  ) {}

  /**
   * Finds the target for `query` without tapping it.
   */
  async resolve(query: string): Promise<ResolutionOutcome> {
    const normalized = normalizeQuery(query, this.vocabulary);
    if (!normalized.text) {
      return { success: false, query, reason: 'Empty query' };
    }

    if (normalized.ordinal) {
      return this.resolveOrdinal(query, normalized.ordinal);
    }

    const context = new ResolutionContext(normalized, this.tree);

    if (normalized.requiresVision) {
      const vision = this.matchers.find((matcher) => matcher.tier === 'vision');
      if (!vision || !vision.isEnabled()) {
        return {
          success: false,
          query,
          reason: 'Query needs the vision model, which is unavailable',
        };
      }
      return this.outcome(query, await this.attempt(vision, context));
    }

    this.logger.debug(`Searching for "${normalized.searchText}"`);
    for (const matcher of this.matchers) {
      if (!matcher.isEnabled()) {
        continue;
      }
      const target = await this.attempt(matcher, context);
      if (target) {
        return this.outcome(query, target);
      }
    }

    return this.outcome(query, null);
  }

  /**
   * Resolves `query` and taps the result.
   */
  async tapQuery(query: string): Promise<ResolutionOutcome> {
    const outcome = await this.resolve(query);
    if (!outcome.success) {
      this.logger.log(`Not found: ${query} (${outcome.reason})`);
      return outcome;
    }

    const { coordinates, tier, label } = outcome.target;
    try {
      await this.device.tap(coordinates.x, coordinates.y);
    } catch (error) {
      this.logger.error(`Tap at (${coordinates.x}, ${coordinates.y}) failed: ${errorMessage(error)}`);
      return { success: false, query, reason: `Tap failed: ${errorMessage(error)}` };
    }

    this.logger.log(`Tapped "${label}" via ${tier} at (${coordinates.x}, ${coordinates.y})`);
    return outcome;
  }

  async resolveAndTap(query: string): Promise<boolean> {
    const outcome = await this.tapQuery(query);
    return outcome.success;
  }

  async listVisibleText(): Promise<string[]> {
    const elements = await this.tree.captureTree();
    return elements
      .map((element) => element.text)
      .filter((text) => text.length > 1);
  }

  async describeScreen(): Promise<string> {
    return describeElements(await this.tree.captureTree());
  }

  private async resolveOrdinal(
    query: string,
    ordinal: OrdinalQuery,
  ): Promise<ResolutionOutcome> {
    let target: ResolvedTarget | null = null;
    try {
      target = await this.ordinalFinder.find(ordinal);
    } catch (error) {
      this.logger.warn(`Ordinal lookup failed: ${errorMessage(error)}`);
    }

    if (target) {
      return { success: true, query, target };
    }
    return {
      success: false,
      query,
      reason: `Could not find item #${ordinal.position} of type "${ordinal.itemType}"`,
      ordinal,
    };
  }

  private async attempt(
    matcher: TierMatcher,
    context: ResolutionContext,
  ): Promise<ResolvedTarget | null> {
    try {
      return await matcher.attempt(context);
    } catch (error) {
      this.logger.warn(`${matcher.tier} tier failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private outcome(query: string, target: ResolvedTarget | null): ResolutionOutcome {
    if (target) {
      return { success: true, query, target };
    }
    return { success: false, query, reason: 'No tier located the element' };
  }
}
