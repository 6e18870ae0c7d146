import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DeviceCommands,
  ResolvedTarget,
  ScreenSize,
  VisionResult,
  VisionSource,
  errorMessage,
  isWithinScreen,
} from '@droidtap/shared';
import { DEVICE_COMMANDS, VISION_SOURCE } from '../../tokens';
import { ResolutionContext } from '../resolution-context';
import { TierMatcher } from './tier-matcher.interface';

export const VISION_CONFIDENCE_GATE = 0.4;
/** Points this close to an edge are treated as hallucinated */
export const VISION_EDGE_MARGIN = 10;

export function passesVisionGate(
  result: VisionResult,
): result is VisionResult & Required<Pick<VisionResult, 'coordinates'>> {
  return (
    result.coordinates !== undefined &&
    result.confidence > VISION_CONFIDENCE_GATE
  );
}

/**
 * Tier 3: asks the vision model for the described element.
 */
@Injectable()
export class VisionMatcher implements TierMatcher {
  readonly tier = 'vision' as const;
  private readonly logger = new Logger(VisionMatcher.name);

  constructor(
    @Inject(VISION_SOURCE) private readonly vision: VisionSource,
    @Inject(DEVICE_COMMANDS) private readonly device: DeviceCommands,
  ) {}

  isEnabled(): boolean {
    return this.vision.available;
  }

  async attempt(context: ResolutionContext): Promise<ResolvedTarget | null> {
    const result = await this.vision.findElement(context.query.raw.trim());
    if (!passesVisionGate(result)) {
      this.logger.debug(
        `Vision miss: ${result.description} (confidence ${result.confidence})`,
      );
      return null;
    }

    const screen = await this.readScreenSize();
    if (screen && !isWithinScreen(result.coordinates, screen, VISION_EDGE_MARGIN)) {
      this.logger.warn(
        `Vision point (${result.coordinates.x}, ${result.coordinates.y}) is off screen or at an edge`,
      );
      return null;
    }

    return {
      coordinates: { ...result.coordinates },
      tier: this.tier,
      label: result.description,
      score: result.confidence,
    };
  }

  private async readScreenSize(): Promise<ScreenSize | null> {
    try {
      return await this.device.screenSize();
    } catch (error) {
      this.logger.debug(`Edge check skipped: ${errorMessage(error)}`);
      return null;
    }
  }
}
