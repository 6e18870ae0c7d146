import { UIElement, widthOf } from '@droidtap/shared';

const DESCRIBED_TEXT_LIMIT = 10;

/**
 * Short human-readable summary of a captured screen.
 */
export function describeElements(elements: readonly UIElement[]): string {
  if (elements.length === 0) {
    return 'Unable to analyze screen (UI tree empty)';
  }

  const packageCounts = new Map<string, number>();
  for (const element of elements) {
    if (element.packageName) {
      packageCounts.set(
        element.packageName,
        (packageCounts.get(element.packageName) ?? 0) + 1,
      );
    }
  }
  let mainPackage = 'unknown';
  let mainCount = 0;
  for (const [name, count] of packageCounts) {
    if (count > mainCount) {
      mainPackage = name;
      mainCount = count;
    }
  }

  const countClass = (fragment: string) =>
    elements.filter((element) => element.className.includes(fragment)).length;
  const visibleTexts = elements
    .filter((element) => element.text.length > 1 && widthOf(element.bounds) > 50)
    .map((element) => element.text);

  const lines = [
    'Screen Analysis:',
    `- App: ${mainPackage}`,
    `- Elements: ${countClass('Button')} buttons, ${countClass('TextView')} text views, ${countClass('Image')} images`,
  ];

  if (visibleTexts.length > 0) {
    lines.push(`- Visible text (${visibleTexts.length} items):`);
    visibleTexts.slice(0, DESCRIBED_TEXT_LIMIT).forEach((text, index) => {
      lines.push(`  ${index + 1}. ${text}`);
    });
    if (visibleTexts.length > DESCRIBED_TEXT_LIMIT) {
      lines.push(`  ... and ${visibleTexts.length - DESCRIBED_TEXT_LIMIT} more`);
    }
  }

  return lines.join('\n');
}
