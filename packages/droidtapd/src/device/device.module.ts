import { Module } from '@nestjs/common';
import { AdbService } from './adb.service';
import { DeviceService } from './device.service';
import { ScreenshotCacheService } from './screenshot-cache.service';
import { DEVICE_COMMANDS, SCREENSHOT_SOURCE } from '../tokens';
import { droidtapConfigProvider, DROIDTAP_CONFIG } from '../config/droidtap.config';

@Module({
  providers: [
    droidtapConfigProvider,
    AdbService,
    DeviceService,
    ScreenshotCacheService,
    { provide: DEVICE_COMMANDS, useExisting: DeviceService },
    { provide: SCREENSHOT_SOURCE, useExisting: ScreenshotCacheService },
  ],
  exports: [
    DROIDTAP_CONFIG,
    AdbService,
    DeviceService,
    DEVICE_COMMANDS,
    SCREENSHOT_SOURCE,
  ],
})
export class DeviceModule {}
