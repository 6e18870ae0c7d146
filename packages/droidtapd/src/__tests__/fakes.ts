import {
  AccessibilityTreeSource,
  Bounds,
  DeviceCommands,
  OcrMatch,
  OpticalTextSource,
  ScoredOcrMatch,
  ScreenSize,
  Screenshot,
  ScreenshotReadOptions,
  ScreenshotSource,
  UIElement,
  VisionResult,
  VisionSource,
  centerOf,
} from '@droidtap/shared';

export function element(
  fields: Partial<Omit<UIElement, 'center'>> = {},
): UIElement {
  const bounds = fields.bounds ?? { left: 0, top: 0, right: 100, bottom: 50 };
  return Object.freeze({
    text: '',
    contentDescription: '',
    className: 'android.widget.TextView',
    resourceId: '',
    packageName: 'com.example.app',
    clickable: false,
    scrollable: false,
    ...fields,
    bounds,
    center: centerOf(bounds),
  });
}

export function ocrMatch(text: string, confidence: number, bounds: Bounds): OcrMatch {
  return Object.freeze({ text, confidence, bounds, center: centerOf(bounds) });
}

export class FakeDevice implements DeviceCommands {
  readonly taps: Array<{ x: number; y: number }> = [];
  size: ScreenSize | null = { width: 1080, height: 2400 };
  screenshotBytes = Buffer.from('png');
  captureCount = 0;

  async tap(x: number, y: number): Promise<void> {
    this.taps.push({ x, y });
  }

  async captureScreenshot(): Promise<Buffer> {
    this.captureCount += 1;
    return this.screenshotBytes;
  }

  async shell(_args: string[]): Promise<string> {
    return '';
  }

  async screenSize(): Promise<ScreenSize> {
    if (!this.size) {
      throw new Error('screen size unavailable');
    }
    return this.size;
  }
}

export class FakeTreeSource implements AccessibilityTreeSource {
  captureCount = 0;
  listItems: UIElement[] = [];
  readonly listRequests: string[] = [];
  failure: Error | null = null;

  constructor(public elements: UIElement[] = []) {}

  async captureTree(): Promise<readonly UIElement[]> {
    this.captureCount += 1;
    if (this.failure) {
      throw this.failure;
    }
    return this.elements;
  }

  async detectListItems(itemType: string): Promise<readonly UIElement[]> {
    this.listRequests.push(itemType);
    return this.listItems;
  }
}

export class FakeScreenshots implements ScreenshotSource {
  readonly frame: Screenshot = Object.freeze({
    bytes: Buffer.from('png'),
    capturedAt: 1000,
  });
  readonly reads: ScreenshotReadOptions[] = [];

  async read(options: ScreenshotReadOptions = {}): Promise<Screenshot> {
    this.reads.push(options);
    return this.frame;
  }
}

export class FakeOpticalText implements OpticalTextSource {
  exact: OcrMatch[] = [];
  fuzzy: ScoredOcrMatch[] = [];
  readonly queries: string[] = [];
  fuzzyThreshold: number | null = null;

  constructor(public available = true) {}

  async findText(_image: Screenshot, query: string): Promise<OcrMatch[]> {
    this.queries.push(query);
    return this.exact;
  }

  async findTextFuzzy(
    _image: Screenshot,
    _query: string,
    threshold: number,
  ): Promise<ScoredOcrMatch[]> {
    this.fuzzyThreshold = threshold;
    return this.fuzzy;
  }
}

export class FakeVision implements VisionSource {
  readonly queries: string[] = [];
  result: VisionResult = { description: 'not found', confidence: 0 };
  screenSize: ScreenSize | null = null;
  backgroundRunning = false;

  constructor(public available = true) {}

  async findElement(query: string): Promise<VisionResult> {
    this.queries.push(query);
    return this.result;
  }

  setScreenSize(width: number, height: number): void {
    this.screenSize = { width, height };
  }

  startBackgroundCapture(): void {
    this.backgroundRunning = true;
  }

  stopBackgroundCapture(): void {
    this.backgroundRunning = false;
  }
}
