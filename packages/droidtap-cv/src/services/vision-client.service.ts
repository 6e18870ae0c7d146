import { Logger } from '@nestjs/common';
import {
  Coordinates,
  ScreenSize,
  ScreenshotSource,
  VisionResult,
  VisionSource,
  errorMessage,
} from '@droidtap/shared';
import { ImageScaler, ScaledImage } from '../utils/image-scaler';
import { VisionModelClient } from './vision-model.client';
import { parseVisionReply } from './vision-reply.parser';

export interface VisionClientOptions {
  enabled: boolean;
  model: string;
  /** Screenshots wider than this are downscaled before upload */
  maxImageWidth: number;
  backgroundIntervalMs: number;
  temperature?: number;
}

function buildFindPrompt(target: string, width: number, height: number): string {
  return `You are analyzing a mobile app screenshot (resolution: ${width}x${height}).

Find the element: "${target}"

Respond ONLY with valid JSON in this exact format:
{
    "found": true/false,
    "x": pixel_x_coordinate,
    "y": pixel_y_coordinate,
    "confidence": 0-100,
    "description": "brief description of what you found"
}

Rules:
- x must be between 0 and ${width}
- y must be between 0 and ${height}
- If not found, set found=false and omit x,y
- Return ONLY the JSON, no other text`;
}

/**
 * Locates elements on the device screen with a vision-language model.
 *
 * The background capture loop keeps the shared screenshot cache warm so that
 * `findElement` rarely waits on the device.
 */
export class VisionClientService implements VisionSource {
  private readonly logger = new Logger(VisionClientService.name);
  private readonly temperature: number;
  private isAvailable = false;
  private screenSize: ScreenSize | null = null;
  private captureInterval: NodeJS.Timeout | null = null;
  private isCapturing = false;

  constructor(
    private readonly client: VisionModelClient,
    private readonly screenshots: ScreenshotSource,
    private readonly scaler: ImageScaler,
    private readonly options: VisionClientOptions,
  ) {
    this.temperature = options.temperature ?? 0.1;
  }

  get available(): boolean {
    return this.isAvailable;
  }

  get backgroundCaptureRunning(): boolean {
    return this.captureInterval !== null;
  }

  async initialize(): Promise<boolean> {
    if (!this.options.enabled) {
      this.logger.log('Vision model integration disabled');
      this.isAvailable = false;
      return false;
    }

    try {
      const models = await this.client.listModels();
      this.isAvailable = models.some((id) => id.includes(this.options.model));
      if (this.isAvailable) {
        this.logger.log(`Vision model ready: ${this.options.model}`);
      } else {
        this.logger.warn(
          `Vision model '${this.options.model}' not found (have: ${models.join(', ') || 'none'})`,
        );
      }
    } catch (error) {
      this.isAvailable = false;
      this.logger.warn(`Vision endpoint unreachable: ${errorMessage(error)}`);
    }
    return this.isAvailable;
  }

  setScreenSize(width: number, height: number): void {
    this.screenSize = { width, height };
  }

  async findElement(query: string): Promise<VisionResult> {
    if (!this.isAvailable) {
      return { description: 'Vision model unavailable', confidence: 0 };
    }

    try {
      const screenshot = await this.screenshots.read();
      const image = await this.scaler.fitWidth(
        screenshot.bytes,
        this.options.maxImageWidth,
      );
      const reply = await this.client.complete(this.options.model, {
        prompt: buildFindPrompt(query, image.width, image.height),
        imageBase64: image.bytes.toString('base64'),
        mimeType: 'image/png',
        temperature: this.temperature,
      });

      const result = parseVisionReply(reply, query, {
        width: image.width,
        height: image.height,
      });
      this.logger.debug(
        `Vision reply for "${query}": confidence ${result.confidence.toFixed(2)}`,
      );

      if (!result.coordinates) {
        return result;
      }
      return { ...result, coordinates: this.toScreen(result.coordinates, image) };
    } catch (error) {
      this.logger.warn(`Vision request failed: ${errorMessage(error)}`);
      return {
        description: `Vision request failed: ${errorMessage(error)}`,
        confidence: 0,
      };
    }
  }

  startBackgroundCapture(): void {
    if (this.captureInterval || !this.isAvailable) {
      return;
    }

    this.captureInterval = setInterval(async () => {
      // Skip if the previous capture is still running
      if (this.isCapturing) {
        return;
      }

      this.isCapturing = true;
      await this.screenshots
        .read({ force: true })
        .catch((error: unknown) => {
          this.logger.debug(`Background capture failed: ${errorMessage(error)}`);
        })
        .finally(() => {
          this.isCapturing = false;
        });
    }, this.options.backgroundIntervalMs);

    this.logger.debug(
      `Background capture started (${this.options.backgroundIntervalMs}ms interval)`,
    );
  }

  stopBackgroundCapture(): void {
    if (this.captureInterval) {
      clearInterval(this.captureInterval);
      this.captureInterval = null;
      this.logger.debug('Background capture stopped');
    }
  }

  private toScreen(point: Coordinates, image: ScaledImage): Coordinates {
    const target = this.screenSize ?? {
      width: image.sourceWidth,
      height: image.sourceHeight,
    };
    if (image.width <= 0 || image.height <= 0) {
      return point;
    }
    return {
      x: Math.round((point.x * target.width) / image.width),
      y: Math.round((point.y * target.height) / image.height),
    };
  }
}
