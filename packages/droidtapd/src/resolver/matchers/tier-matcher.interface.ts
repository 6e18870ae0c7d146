import { ResolutionTier, ResolvedTarget } from '@droidtap/shared';
import { ResolutionContext } from '../resolution-context';

/**
 * One tier of the resolution cascade. A matcher only locates a target; the
 * cascade performs the tap.
 */
export interface TierMatcher {
  readonly tier: ResolutionTier;
  isEnabled(): boolean;
  /** Resolves to null on a miss. May throw; the cascade treats that as a miss. */
  attempt(context: ResolutionContext): Promise<ResolvedTarget | null>;
}
