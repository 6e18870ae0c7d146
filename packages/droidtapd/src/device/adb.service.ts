import { Inject, Injectable, Logger } from '@nestjs/common';
import { execFile } from 'child_process';
import { TransportError } from '@droidtap/shared';
import { DROIDTAP_CONFIG, DroidtapConfig } from '../config/droidtap.config';

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Thin wrapper over the adb binary. Every call targets the configured serial
 * when one is set.
 */
@Injectable()
export class AdbService {
  private readonly logger = new Logger(AdbService.name);

  constructor(
    @Inject(DROIDTAP_CONFIG) private readonly config: DroidtapConfig,
  ) {}

  async run(args: string[]): Promise<string> {
    const stdout = await this.exec(args);
    return stdout.toString('utf8');
  }

  async runBinary(args: string[]): Promise<Buffer> {
    return this.exec(args);
  }

  /**
   * Serials of attached devices in the `device` state.
   */
  async listDevices(): Promise<string[]> {
    const output = await this.run(['devices']);
    return output
      .split(/\r?\n/)
      .slice(1)
      .map((line) => line.trim())
      .filter((line) => /\tdevice$/.test(line))
      .map((line) => line.split('\t')[0]);
  }

  private exec(args: string[]): Promise<Buffer> {
    const fullArgs = this.config.adbSerial
      ? ['-s', this.config.adbSerial, ...args]
      : args;

    return new Promise<Buffer>((resolve, reject) => {
      execFile(
        this.config.adbPath,
        fullArgs,
        { encoding: 'buffer', maxBuffer: MAX_OUTPUT_BYTES },
        (error, stdout, stderr) => {
          if (error) {
            const detail = stderr.toString('utf8').trim() || error.message;
            this.logger.debug(`adb ${fullArgs.join(' ')} failed: ${detail}`);
            reject(new TransportError(fullArgs, detail));
            return;
          }
          resolve(stdout);
        },
      );
    });
  }
}
