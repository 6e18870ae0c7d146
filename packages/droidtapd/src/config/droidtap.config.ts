import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export const DROIDTAP_CONFIG = Symbol('DROIDTAP_CONFIG');

export interface DroidtapConfig {
  port: number;
  adbPath: string;
  /** Target a specific device when several are attached */
  adbSerial: string | null;
  /** Maximum random offset, in pixels, applied to each tap */
  tapJitter: number;
  screenshotTtlMs: number;
  ocrEnabled: boolean;
  visionEnabled: boolean;
  visionUrl: string;
  visionModel: string;
  visionApiKey: string | null;
  visionPrefetch: boolean;
  visionPrefetchMs: number;
  visionMaxWidth: number;
}

function readInt(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const parsed = parseInt(configService.get<string>(key) ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function readFlag(
  configService: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const value = configService.get<string>(key);
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return value.trim().toLowerCase() !== 'false';
}

export function readDroidtapConfig(configService: ConfigService): DroidtapConfig {
  return {
    port: readInt(configService, 'DROIDTAP_PORT', 9870),
    adbPath: configService.get<string>('DROIDTAP_ADB_PATH') || 'adb',
    adbSerial: configService.get<string>('DROIDTAP_ADB_SERIAL') || null,
    tapJitter: readInt(configService, 'DROIDTAP_TAP_JITTER', 5),
    screenshotTtlMs: readInt(configService, 'DROIDTAP_SCREENSHOT_TTL_MS', 3000),
    ocrEnabled: readFlag(configService, 'DROIDTAP_OCR_ENABLED', true),
    visionEnabled: readFlag(configService, 'DROIDTAP_VISION_ENABLED', true),
    visionUrl:
      configService.get<string>('DROIDTAP_VISION_URL') ||
      'http://localhost:11434/v1',
    visionModel: configService.get<string>('DROIDTAP_VISION_MODEL') || 'llava-phi3',
    visionApiKey: configService.get<string>('DROIDTAP_VISION_API_KEY') || null,
    visionPrefetch: readFlag(configService, 'DROIDTAP_VISION_PREFETCH', true),
    visionPrefetchMs: readInt(configService, 'DROIDTAP_VISION_PREFETCH_MS', 2000),
    visionMaxWidth: readInt(configService, 'DROIDTAP_VISION_MAX_WIDTH', 720),
  };
}

export const droidtapConfigProvider: Provider = {
  provide: DROIDTAP_CONFIG,
  inject: [ConfigService],
  useFactory: readDroidtapConfig,
};
