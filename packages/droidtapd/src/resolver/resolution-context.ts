import { AccessibilityTreeSource, UIElement } from '@droidtap/shared';
import { NormalizedQuery } from './query-normalizer';

/**
 * State shared by the tiers of a single resolution. The accessibility tree is
 * captured on first use and reused by later tiers. A failed capture is not
 * kept, so the next tier captures again.
 */
export class ResolutionContext {
  private tree: Promise<readonly UIElement[]> | null = null;

  constructor(
    readonly query: NormalizedQuery,
    private readonly treeSource: AccessibilityTreeSource,
  ) {}

  elements(): Promise<readonly UIElement[]> {
    if (!this.tree) {
      this.tree = this.treeSource.captureTree().catch((error: unknown) => {
        this.tree = null;
        throw error;
      });
    }
    return this.tree;
  }
}
