import { UIElement } from '@droidtap/shared';
import { AccessibilityTreeMatcher } from './matchers/accessibility-tree.matcher';
import { KnowledgeMapMatcher } from './matchers/knowledge-map.matcher';
import { OpticalTextMatcher } from './matchers/optical-text.matcher';
import { VisionMatcher } from './matchers/vision.matcher';
import { OrdinalItemFinder } from './ordinal-item-finder';
import { ResolutionCascadeService } from './resolution-cascade.service';
import {
  FakeDevice,
  FakeOpticalText,
  FakeScreenshots,
  FakeTreeSource,
  FakeVision,
  element,
  ocrMatch,
} from '../__tests__/fakes';
import { vocabulary } from '../__tests__/resolution.helpers';

function createCascade(elements: UIElement[] = []) {
  const device = new FakeDevice();
  const tree = new FakeTreeSource(elements);
  const screenshots = new FakeScreenshots();
  const ocr = new FakeOpticalText(false);
  const vision = new FakeVision(false);
  const cascade = new ResolutionCascadeService(
    vocabulary,
    [
      new KnowledgeMapMatcher(vocabulary),
      new AccessibilityTreeMatcher(),
      new OpticalTextMatcher(ocr, screenshots),
      new VisionMatcher(vision, device),
    ],
    new OrdinalItemFinder(tree, vision),
    tree,
    device,
  );
  return { cascade, device, tree, ocr, vision };
}

const videoRows = [0, 1, 2].map((row) =>
  element({
    text: `Video ${row + 1}`,
    clickable: true,
    bounds: { left: 0, top: 400 + row * 500, right: 1080, bottom: 880 + row * 500 },
  }),
);

describe('ResolutionCascadeService', () => {
  describe('tier order', () => {
    it('taps a known action through its accessibility label', async () => {
      const { cascade, device } = createCascade([
        element({
          contentDescription: 'Subscribe',
          className: 'android.widget.Button',
          bounds: { left: 800, top: 600, right: 1000, bottom: 700 },
        }),
      ]);

      const outcome = await cascade.tapQuery('click subscribe');

      expect(outcome).toEqual({
        success: true,
        query: 'click subscribe',
        target: {
          coordinates: { x: 900, y: 650 },
          tier: 'knowledge-map',
          label: 'Subscribe',
        },
      });
      expect(device.taps).toEqual([{ x: 900, y: 650 }]);
    });

    it('captures the tree once when several tiers read it', async () => {
      const { cascade, tree } = createCascade([
        element({ text: 'Share', bounds: { left: 0, top: 0, right: 200, bottom: 100 } }),
      ]);

      const outcome = await cascade.resolve('tap share');

      expect(outcome.success && outcome.target.tier).toBe('accessibility-tree');
      expect(tree.captureCount).toBe(1);
    });

    it('captures the tree again when an earlier tier lost it', async () => {
      const { cascade, tree } = createCascade([
        element({ text: 'Share this clip', bounds: { left: 0, top: 0, right: 400, bottom: 100 } }),
      ]);
      jest
        .spyOn(tree, 'captureTree')
        .mockRejectedValueOnce(new Error('adb link dropped'));

      const outcome = await cascade.resolve('tap share');

      expect(outcome).toEqual({
        success: true,
        query: 'tap share',
        target: {
          coordinates: { x: 200, y: 50 },
          tier: 'accessibility-tree',
          label: 'Share this clip',
          score: 1,
        },
      });
      expect(tree.captureCount).toBe(1);
    });

    it('moves on to text recognition when the tree has no match', async () => {
      const { cascade, ocr } = createCascade([element({ text: 'Home' })]);
      ocr.available = true;
      ocr.exact = [ocrMatch('Checkout', 0.9, { left: 0, top: 2000, right: 400, bottom: 2100 })];

      const outcome = await cascade.resolve('checkout');

      expect(outcome.success && outcome.target).toEqual({
        coordinates: { x: 200, y: 2050 },
        tier: 'optical-text',
        label: 'Checkout',
        score: 0.9,
      });
    });

    it('treats a failing tier as a miss', async () => {
      const { cascade, tree, ocr } = createCascade();
      tree.failure = new Error('dump failed');
      ocr.available = true;
      ocr.exact = [ocrMatch('Checkout', 0.9, { left: 0, top: 0, right: 100, bottom: 100 })];

      const outcome = await cascade.resolve('checkout');

      expect(outcome.success && outcome.target.tier).toBe('optical-text');
    });

    it('ends with the vision model', async () => {
      const { cascade, vision } = createCascade();
      vision.available = true;
      vision.result = {
        description: 'bell icon',
        coordinates: { x: 980, y: 150 },
        confidence: 0.8,
      };

      const outcome = await cascade.resolve('notification bell');

      expect(outcome.success && outcome.target.tier).toBe('vision');
      expect(vision.queries).toEqual(['notification bell']);
    });

    it('fails when every tier misses', async () => {
      const { cascade, device } = createCascade([element({ text: 'Home' })]);

      await expect(cascade.tapQuery('notification bell')).resolves.toEqual({
        success: false,
        query: 'notification bell',
        reason: 'No tier located the element',
      });
      expect(device.taps).toEqual([]);
    });
  });

  describe('vision-only queries', () => {
    it('skips the text tiers', async () => {
      const { cascade, tree, vision } = createCascade([element({ text: 'red car' })]);
      vision.available = true;
      vision.result = {
        description: 'red car',
        coordinates: { x: 300, y: 900 },
        confidence: 0.75,
      };

      const outcome = await cascade.resolve('tap the red car');

      expect(outcome.success && outcome.target.tier).toBe('vision');
      expect(tree.captureCount).toBe(0);
      expect(vision.queries).toEqual(['tap the red car']);
    });

    it('fails without the vision model', async () => {
      const { cascade, tree } = createCascade([element({ text: 'red car' })]);

      await expect(cascade.resolve('tap the red car')).resolves.toEqual({
        success: false,
        query: 'tap the red car',
        reason: 'Query needs the vision model, which is unavailable',
      });
      expect(tree.captureCount).toBe(0);
    });
  });

  describe('ordinal queries', () => {
    it('taps the item at the position in the detected list', async () => {
      const { cascade, device, tree } = createCascade();
      tree.listItems = videoRows;

      const outcome = await cascade.tapQuery('the second video');

      expect(outcome.success && outcome.target).toEqual({
        coordinates: { x: 540, y: 1140 },
        tier: 'ordinal-list',
        label: 'Video 2',
      });
      expect(tree.listRequests).toEqual(['video']);
      expect(device.taps).toEqual([{ x: 540, y: 1140 }]);
    });

    it('asks the vision model when the list is too short', async () => {
      const { cascade, tree, vision } = createCascade();
      tree.listItems = videoRows.slice(0, 1);
      vision.available = true;
      vision.result = {
        description: 'second video',
        coordinates: { x: 540, y: 1400 },
        confidence: 0.6,
      };

      const outcome = await cascade.resolve('the second video');

      expect(outcome.success && outcome.target.tier).toBe('ordinal-vision');
      expect(vision.queries).toEqual(['the second video']);
    });

    it('reports the ordinal when nothing is found', async () => {
      const { cascade } = createCascade();

      await expect(cascade.resolve('the second video')).resolves.toEqual({
        success: false,
        query: 'the second video',
        reason: 'Could not find item #2 of type "video"',
        ordinal: { position: 2, itemType: 'video' },
      });
    });
  });

  it('rejects an empty query without touching the device', async () => {
    const { cascade, tree } = createCascade();

    await expect(cascade.tapQuery('   ')).resolves.toEqual({
      success: false,
      query: '   ',
      reason: 'Empty query',
    });
    expect(tree.captureCount).toBe(0);
  });

  it('reports a failed tap', async () => {
    const { cascade, device } = createCascade([element({ text: 'Library' })]);
    jest.spyOn(device, 'tap').mockRejectedValue(new Error('device offline'));

    await expect(cascade.tapQuery('library')).resolves.toEqual({
      success: false,
      query: 'library',
      reason: 'Tap failed: device offline',
    });
  });

  describe('resolveAndTap', () => {
    it('reports whether the element was tapped', async () => {
      const { cascade } = createCascade([element({ text: 'Library' })]);

      await expect(cascade.resolveAndTap('library')).resolves.toBe(true);
      await expect(cascade.resolveAndTap('downloads folder')).resolves.toBe(false);
    });
  });

  describe('listVisibleText', () => {
    it('returns element texts longer than one character in tree order', async () => {
      const { cascade } = createCascade([
        element({ text: 'Home' }),
        element({ text: 'A' }),
        element({ contentDescription: 'Search' }),
        element({ text: 'Library' }),
      ]);

      await expect(cascade.listVisibleText()).resolves.toEqual(['Home', 'Library']);
    });
  });

  describe('describeScreen', () => {
    it('summarizes the captured tree', async () => {
      const { cascade } = createCascade();

      await expect(cascade.describeScreen()).resolves.toBe(
        'Unable to analyze screen (UI tree empty)',
      );
    });
  });
});
