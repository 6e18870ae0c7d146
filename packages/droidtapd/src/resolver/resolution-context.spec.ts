import { FakeTreeSource, element } from '../__tests__/fakes';
import { vocabulary } from '../__tests__/resolution.helpers';
import { normalizeQuery } from './query-normalizer';
import { ResolutionContext } from './resolution-context';

describe('ResolutionContext', () => {
  const query = normalizeQuery('tap share', vocabulary);

  it('captures the tree once for repeated reads', async () => {
    const tree = new FakeTreeSource([element({ text: 'Share' })]);
    const context = new ResolutionContext(query, tree);

    const [first, second] = await Promise.all([context.elements(), context.elements()]);

    expect(second).toBe(first);
    expect(tree.captureCount).toBe(1);
  });

  it('captures again after a failed capture', async () => {
    const tree = new FakeTreeSource([element({ text: 'Share' })]);
    tree.failure = new Error('adb link dropped');
    const context = new ResolutionContext(query, tree);

    await expect(context.elements()).rejects.toThrow('adb link dropped');
    tree.failure = null;

    await expect(context.elements()).resolves.toHaveLength(1);
    expect(tree.captureCount).toBe(2);
  });
});
