import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AccessibilityTreeSource,
  OrdinalQuery,
  ResolvedTarget,
  UIElement,
  VisionSource,
  errorMessage,
} from '@droidtap/shared';
import { ACCESSIBILITY_TREE_SOURCE, VISION_SOURCE } from '../tokens';
import { passesVisionGate } from './matchers/vision.matcher';

const ORDINAL_WORDS: Readonly<Record<number, string>> = Object.freeze({
  1: 'first',
  2: 'second',
  3: 'third',
  4: 'fourth',
  5: 'fifth',
  [-1]: 'last',
});

/**
 * Zero-based index for a 1-based position (or -1 for the last item), or null
 * when the list has no such item.
 */
export function ordinalIndex(position: number, length: number): number | null {
  const index = position === -1 ? length - 1 : position - 1;
  return index >= 0 && index < length ? index : null;
}

/** "the second video", "the last post", "the 7th reel" */
export function ordinalPhrase(ordinal: OrdinalQuery): string {
  const word = ORDINAL_WORDS[ordinal.position] ?? `${ordinal.position}th`;
  return `the ${word} ${ordinal.itemType}`;
}

const labelOf = (element: UIElement) =>
  element.text || element.contentDescription || element.className;

@Injectable()
export class OrdinalItemFinder {
  private readonly logger = new Logger(OrdinalItemFinder.name);

  constructor(
    @Inject(ACCESSIBILITY_TREE_SOURCE)
    private readonly tree: AccessibilityTreeSource,
    @Inject(VISION_SOURCE) private readonly vision: VisionSource,
  ) {}

  async find(ordinal: OrdinalQuery): Promise<ResolvedTarget | null> {
    const fromList = await this.findInList(ordinal);
    if (fromList) {
      return fromList;
    }

    if (!this.vision.available) {
      return null;
    }

    const phrase = ordinalPhrase(ordinal);
    const result = await this.vision.findElement(phrase);
    if (!passesVisionGate(result)) {
      this.logger.debug(`Vision could not place "${phrase}"`);
      return null;
    }
    return {
      coordinates: { ...result.coordinates },
      tier: 'ordinal-vision',
      label: result.description,
      score: result.confidence,
    };
  }

  private async findInList(ordinal: OrdinalQuery): Promise<ResolvedTarget | null> {
    let items: readonly UIElement[];
    try {
      items = await this.tree.detectListItems(ordinal.itemType);
    } catch (error) {
      this.logger.warn(`List detection failed: ${errorMessage(error)}`);
      return null;
    }

    const index = ordinalIndex(ordinal.position, items.length);
    if (index === null) {
      this.logger.debug(
        `No item at position ${ordinal.position} among ${items.length} ${ordinal.itemType} items`,
      );
      return null;
    }

    const item = items[index];
    return {
      coordinates: { ...item.center },
      tier: 'ordinal-list',
      label: labelOf(item),
    };
  }
}
