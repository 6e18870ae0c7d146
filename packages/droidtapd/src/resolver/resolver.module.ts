import { Module } from '@nestjs/common';
import {
  OCRDetector,
  OpenAIVisionModelClient,
  SharpImageScaler,
  VisionClientService,
} from '@droidtap/cv';
import { ScreenshotSource } from '@droidtap/shared';
import { AccessibilityModule } from '../accessibility/accessibility.module';
import { DROIDTAP_CONFIG, DroidtapConfig } from '../config/droidtap.config';
import { DeviceModule } from '../device/device.module';
import {
  OPTICAL_TEXT_SOURCE,
  RESOLUTION_VOCABULARY,
  SCREENSHOT_SOURCE,
  TIER_MATCHERS,
  VISION_SOURCE,
} from '../tokens';
import { AccessibilityTreeMatcher } from './matchers/accessibility-tree.matcher';
import { KnowledgeMapMatcher } from './matchers/knowledge-map.matcher';
import { OpticalTextMatcher } from './matchers/optical-text.matcher';
import { TierMatcher } from './matchers/tier-matcher.interface';
import { VisionMatcher } from './matchers/vision.matcher';
import { OrdinalItemFinder } from './ordinal-item-finder';
import { ResolutionCascadeService } from './resolution-cascade.service';
import { buildVocabulary } from './resolution-vocabulary';
import { ResolverController } from './resolver.controller';
import { VisionWarmupService } from './vision-warmup.service';

@Module({
  imports: [DeviceModule, AccessibilityModule],
  controllers: [ResolverController],
  providers: [
    { provide: RESOLUTION_VOCABULARY, useFactory: () => buildVocabulary() },
    {
      provide: OCRDetector,
      inject: [DROIDTAP_CONFIG],
      useFactory: (config: DroidtapConfig) =>
        new OCRDetector({ enabled: config.ocrEnabled }),
    },
    {
      provide: VisionClientService,
      inject: [DROIDTAP_CONFIG, SCREENSHOT_SOURCE],
      useFactory: (config: DroidtapConfig, screenshots: ScreenshotSource) =>
        new VisionClientService(
          new OpenAIVisionModelClient({
            baseURL: config.visionUrl,
            apiKey: config.visionApiKey ?? undefined,
          }),
          screenshots,
          new SharpImageScaler(),
          {
            enabled: config.visionEnabled,
            model: config.visionModel,
            maxImageWidth: config.visionMaxWidth,
            backgroundIntervalMs: config.visionPrefetchMs,
          },
        ),
    },
    { provide: OPTICAL_TEXT_SOURCE, useExisting: OCRDetector },
    { provide: VISION_SOURCE, useExisting: VisionClientService },
    KnowledgeMapMatcher,
    AccessibilityTreeMatcher,
    OpticalTextMatcher,
    VisionMatcher,
    {
      provide: TIER_MATCHERS,
      inject: [
        KnowledgeMapMatcher,
        AccessibilityTreeMatcher,
        OpticalTextMatcher,
        VisionMatcher,
      ],
      useFactory: (...matchers: TierMatcher[]) => matchers,
    },
    OrdinalItemFinder,
    ResolutionCascadeService,
    VisionWarmupService,
  ],
  exports: [ResolutionCascadeService],
})
export class ResolverModule {}
