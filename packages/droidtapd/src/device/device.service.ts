import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import {
  DeviceCommands,
  ScreenSize,
  TransportError,
  clamp,
  errorMessage,
} from '@droidtap/shared';
import { DROIDTAP_CONFIG, DroidtapConfig } from '../config/droidtap.config';
import { AdbService } from './adb.service';

const SCREEN_SIZE_PATTERN = /(Physical|Override) size:\s*(\d+)x(\d+)/g;

/**
 * Parses `wm size` output. An override size, when present, wins over the
 * physical one since it is what input events are mapped against.
 */
export function parseScreenSize(output: string): ScreenSize | null {
  let physical: ScreenSize | null = null;
  let override: ScreenSize | null = null;

  for (const match of output.matchAll(SCREEN_SIZE_PATTERN)) {
    const size = {
      width: parseInt(match[2], 10),
      height: parseInt(match[3], 10),
    };
    if (match[1] === 'Override') {
      override = size;
    } else {
      physical = size;
    }
  }

  return override ?? physical;
}

@Injectable()
export class DeviceService implements DeviceCommands, OnModuleInit {
  private readonly logger = new Logger(DeviceService.name);
  private cachedScreenSize: ScreenSize | null = null;

  constructor(
    private readonly adb: AdbService,
    @Inject(DROIDTAP_CONFIG) private readonly config: DroidtapConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    try {
      const devices = await this.ensureDevice();
      this.logger.log(`Connected devices: ${devices.join(', ')}`);
    } catch (error) {
      this.logger.warn(`Device check failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Serials of the ready devices. Throws when none is attached, or when the
   * configured serial is not among them.
   */
  async ensureDevice(): Promise<string[]> {
    const devices = await this.adb.listDevices();
    if (devices.length === 0) {
      throw new TransportError(['devices'], 'No ADB device connected');
    }
    const serial = this.config.adbSerial;
    if (serial && !devices.includes(serial)) {
      throw new TransportError(['devices'], `Device ${serial} is not attached`);
    }
    return devices;
  }

  /**
   * Taps near `(x, y)`, offset by up to the configured jitter on each axis
   * and kept on screen.
   */
  async tap(x: number, y: number): Promise<void> {
    const jitter = this.config.tapJitter;
    let tapX = x + this.randomOffset(jitter);
    let tapY = y + this.randomOffset(jitter);

    try {
      const { width, height } = await this.screenSize();
      tapX = clamp(tapX, 0, width);
      tapY = clamp(tapY, 0, height);
    } catch (error) {
      this.logger.debug(`Tap not clamped, screen size unknown: ${errorMessage(error)}`);
    }

    this.logger.debug(`Tap (${x}, ${y}) -> (${tapX}, ${tapY})`);
    await this.adb.run(['shell', 'input', 'tap', String(tapX), String(tapY)]);
  }

  async screenSize(): Promise<ScreenSize> {
    if (this.cachedScreenSize) {
      return this.cachedScreenSize;
    }

    const output = await this.adb.run(['shell', 'wm', 'size']);
    const size = parseScreenSize(output);
    if (!size) {
      throw new Error(`Could not parse screen size from: ${output.trim()}`);
    }
    this.cachedScreenSize = size;
    return size;
  }

  async captureScreenshot(): Promise<Buffer> {
    return this.adb.runBinary(['exec-out', 'screencap', '-p']);
  }

  async shell(args: string[]): Promise<string> {
    return this.adb.run(['shell', ...args]);
  }

  private randomOffset(jitter: number): number {
    if (jitter <= 0) {
      return 0;
    }
    return Math.floor(Math.random() * (2 * jitter + 1)) - jitter;
  }
}
