import { DroidtapConfig } from '../config/droidtap.config';

export function testConfig(overrides: Partial<DroidtapConfig> = {}): DroidtapConfig {
  return {
    port: 9870,
    adbPath: 'adb',
    adbSerial: null,
    tapJitter: 0,
    screenshotTtlMs: 3000,
    ocrEnabled: false,
    visionEnabled: false,
    visionUrl: 'http://localhost:11434/v1',
    visionModel: 'llava-phi3',
    visionApiKey: null,
    visionPrefetch: false,
    visionPrefetchMs: 2000,
    visionMaxWidth: 720,
    ...overrides,
  };
}
