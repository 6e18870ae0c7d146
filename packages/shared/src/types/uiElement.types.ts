export type Coordinates = { x: number; y: number };

export type Bounds = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

export type ScreenSize = { width: number; height: number };

/**
 * One accessibility node as captured from the device. Instances are frozen:
 * a new capture produces new elements rather than mutating old ones.
 */
export type UIElement = {
  readonly text: string;
  readonly contentDescription: string;
  readonly className: string;
  readonly resourceId: string;
  readonly packageName: string;
  readonly bounds: Bounds;
  readonly center: Coordinates;
  readonly clickable: boolean;
  readonly scrollable: boolean;
};

export type OcrMatch = {
  readonly text: string;
  /** Recognition confidence, 0-1 */
  readonly confidence: number;
  readonly bounds: Bounds;
  readonly center: Coordinates;
};

export type ScoredOcrMatch = {
  score: number;
  match: OcrMatch;
};

export type VisionResult = {
  description: string;
  coordinates?: Coordinates;
  confidence: number;
};

export type Screenshot = {
  readonly bytes: Buffer;
  /** Epoch milliseconds */
  readonly capturedAt: number;
};
