import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DeviceCommands,
  EmptyCaptureError,
  Screenshot,
  ScreenshotReadOptions,
  ScreenshotSource,
} from '@droidtap/shared';
import { DROIDTAP_CONFIG, DroidtapConfig } from '../config/droidtap.config';
import { DEVICE_COMMANDS } from '../tokens';

/**
 * Single-slot screenshot cache shared by the optical-text tier and the vision
 * pre-capture loop.
 *
 * The slot only ever holds a frozen screenshot and is replaced by reference,
 * so a reader sees either the old frame or the new one. Concurrent misses
 * share one device capture.
 */
@Injectable()
export class ScreenshotCacheService implements ScreenshotSource {
  private readonly logger = new Logger(ScreenshotCacheService.name);
  private slot: Screenshot | null = null;
  private pending: Promise<Screenshot> | null = null;

  constructor(
    @Inject(DEVICE_COMMANDS) private readonly device: DeviceCommands,
    @Inject(DROIDTAP_CONFIG) private readonly config: DroidtapConfig,
  ) {}

  async read(options: ScreenshotReadOptions = {}): Promise<Screenshot> {
    const current = this.slot;
    if (!options.force && current && this.isFresh(current)) {
      return current;
    }
    return this.capture();
  }

  private isFresh(screenshot: Screenshot): boolean {
    return Date.now() - screenshot.capturedAt < this.config.screenshotTtlMs;
  }

  private capture(): Promise<Screenshot> {
    if (!this.pending) {
      this.pending = this.captureFresh().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async captureFresh(): Promise<Screenshot> {
    const bytes = await this.device.captureScreenshot();
    if (bytes.length === 0) {
      throw new EmptyCaptureError('screenshot', 'device returned no image data');
    }

    const screenshot: Screenshot = Object.freeze({
      bytes,
      capturedAt: Date.now(),
    });
    this.slot = screenshot;
    this.logger.debug(`Screenshot cached (${bytes.length} bytes)`);
    return screenshot;
  }
}
