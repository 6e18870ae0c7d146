import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { OCRDetector, VisionClientService } from '@droidtap/cv';
import { DeviceCommands, errorMessage } from '@droidtap/shared';
import { DROIDTAP_CONFIG, DroidtapConfig } from '../config/droidtap.config';
import { DEVICE_COMMANDS } from '../tokens';

/**
 * Brings the recognition back ends up with the module and shuts them down
 * with it.
 */
@Injectable()
export class VisionWarmupService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(VisionWarmupService.name);

  constructor(
    private readonly vision: VisionClientService,
    private readonly ocr: OCRDetector,
    @Inject(DEVICE_COMMANDS) private readonly device: DeviceCommands,
    @Inject(DROIDTAP_CONFIG) private readonly config: DroidtapConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    const available = await this.vision.initialize();

    try {
      const { width, height } = await this.device.screenSize();
      this.vision.setScreenSize(width, height);
      this.logger.log(`Screen size ${width}x${height}`);
    } catch (error) {
      this.logger.warn(`Screen size unavailable: ${errorMessage(error)}`);
    }

    if (available && this.config.visionPrefetch) {
      this.vision.startBackgroundCapture();
    }
    this.logger.log(
      `OCR ${this.ocr.available ? 'enabled' : 'disabled'}, vision ${available ? 'ready' : 'unavailable'}`,
    );
  }

  async onModuleDestroy(): Promise<void> {
    this.vision.stopBackgroundCapture();
    await this.ocr.cleanup();
  }
}
