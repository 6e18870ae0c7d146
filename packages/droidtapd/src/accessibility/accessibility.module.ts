import { Module } from '@nestjs/common';
import { DeviceModule } from '../device/device.module';
import { ACCESSIBILITY_TREE_SOURCE } from '../tokens';
import { UiTreeService } from './ui-tree.service';

@Module({
  imports: [DeviceModule],
  providers: [
    UiTreeService,
    { provide: ACCESSIBILITY_TREE_SOURCE, useExisting: UiTreeService },
  ],
  exports: [UiTreeService, ACCESSIBILITY_TREE_SOURCE],
})
export class AccessibilityModule {}
