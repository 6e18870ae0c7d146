import { UIElement, heightOf, widthOf } from '@droidtap/shared';

const MIN_SIDE = 100;
const MAX_WIDTH = 900;
const MAX_HEIGHT = 1500;
const SIZE_BUCKET = 50;
const MIN_ITEMS = 2;

/** Nearest multiple of the bucket size; halves go to the even multiple. */
export function sizeBucket(size: number): number {
  const units = size / SIZE_BUCKET;
  const lower = Math.floor(units);
  const fraction = units - lower;
  let rounded = fraction > 0.5 ? lower + 1 : lower;
  if (fraction === 0.5 && lower % 2 !== 0) {
    rounded = lower + 1;
  }
  return rounded * SIZE_BUCKET;
}

/**
 * Finds the repeating items on screen (videos, posts, products) by grouping
 * elements of similar size. Returns the largest group in reading order, or an
 * empty list when nothing repeats.
 */
export function detectListItems(
  elements: readonly UIElement[],
  minItems = MIN_ITEMS,
): UIElement[] {
  const groups = new Map<string, UIElement[]>();

  for (const element of elements) {
    const width = widthOf(element.bounds);
    const height = heightOf(element.bounds);
    if (width < MIN_SIDE || height < MIN_SIDE) {
      continue;
    }
    if (width > MAX_WIDTH || height > MAX_HEIGHT) {
      continue;
    }

    const key = `${sizeBucket(width)}x${sizeBucket(height)}`;
    const group = groups.get(key);
    if (group) {
      group.push(element);
    } else {
      groups.set(key, [element]);
    }
  }

  let largest: UIElement[] = [];
  for (const group of groups.values()) {
    if (group.length > largest.length) {
      largest = group;
    }
  }

  if (largest.length < minItems) {
    return [];
  }

  return [...largest].sort(
    (a, b) => a.bounds.top - b.bounds.top || a.bounds.left - b.bounds.left,
  );
}
