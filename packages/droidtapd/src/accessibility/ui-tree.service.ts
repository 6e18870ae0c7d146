import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AccessibilityTreeSource,
  DeviceCommands,
  UIElement,
} from '@droidtap/shared';
import { DEVICE_COMMANDS } from '../tokens';
import { detectListItems } from './list-item.detector';
import { parseUiTree } from './ui-tree.parser';

const DUMP_PATH = '/sdcard/ui_dump.xml';

@Injectable()
export class UiTreeService implements AccessibilityTreeSource {
  private readonly logger = new Logger(UiTreeService.name);

  constructor(
    @Inject(DEVICE_COMMANDS) private readonly device: DeviceCommands,
  ) {}

  async captureTree(): Promise<readonly UIElement[]> {
    await this.device.shell(['uiautomator', 'dump', DUMP_PATH]);
    const xml = await this.device.shell(['cat', DUMP_PATH]);
    const elements = Object.freeze(parseUiTree(xml));
    this.logger.debug(`Captured ${elements.length} accessibility nodes`);
    return elements;
  }

  /**
   * The item type is only used for diagnostics: detection is purely
   * geometric.
   */
  async detectListItems(itemType: string): Promise<readonly UIElement[]> {
    const items = detectListItems(await this.captureTree());
    this.logger.debug(`Detected ${items.length} list items for "${itemType}"`);
    return items;
  }
}
