import {
  OcrMatch,
  ScoredOcrMatch,
  ScreenSize,
  Screenshot,
  UIElement,
  VisionResult,
} from "./uiElement.types";

export interface DeviceCommands {
  tap(x: number, y: number): Promise<void>;
  captureScreenshot(): Promise<Buffer>;
  shell(args: string[]): Promise<string>;
  screenSize(): Promise<ScreenSize>;
}

export interface AccessibilityTreeSource {
  /** Throws EmptyCaptureError when the dump is empty or cannot be parsed */
  captureTree(): Promise<readonly UIElement[]>;
  detectListItems(itemType: string): Promise<readonly UIElement[]>;
}

export type ScreenshotReadOptions = { force?: boolean };

export interface ScreenshotSource {
  read(options?: ScreenshotReadOptions): Promise<Screenshot>;
}

export interface OpticalTextSource {
  readonly available: boolean;
  findText(image: Screenshot, query: string): Promise<OcrMatch[]>;
  findTextFuzzy(
    image: Screenshot,
    query: string,
    threshold: number,
  ): Promise<ScoredOcrMatch[]>;
}

export interface VisionSource {
  readonly available: boolean;
  findElement(query: string): Promise<VisionResult>;
  setScreenSize(width: number, height: number): void;
  startBackgroundCapture(): void;
  stopBackgroundCapture(): void;
}
