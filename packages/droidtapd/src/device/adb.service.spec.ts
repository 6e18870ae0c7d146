jest.mock('child_process', () => ({
  execFile: jest.fn(),
}));

import { execFile } from 'child_process';
import { TransportError } from '@droidtap/shared';
import { AdbService } from './adb.service';
import { DroidtapConfig } from '../config/droidtap.config';
import { testConfig } from '../__tests__/test-config';

type ExecCallback = (
  error: Error | null,
  stdout: Buffer,
  stderr: Buffer,
) => void;

const execFileMock = execFile as unknown as jest.Mock;

function respond(stdout: string, stderr = '', error: Error | null = null) {
  execFileMock.mockImplementationOnce(
    (_file: string, _args: string[], _options: object, callback: ExecCallback) => {
      callback(error, Buffer.from(stdout), Buffer.from(stderr));
    },
  );
}

function createService(overrides: Partial<DroidtapConfig> = {}): AdbService {
  return new AdbService(
    testConfig({ adbPath: '/opt/platform-tools/adb', ...overrides }),
  );
}

describe('AdbService', () => {
  afterEach(() => {
    jest.clearAllMocks();
  });

  it('runs adb with the configured binary and returns text output', async () => {
    respond('Physical size: 1080x2400\n');

    const output = await createService().run(['shell', 'wm', 'size']);

    expect(output).toBe('Physical size: 1080x2400\n');
    expect(execFileMock).toHaveBeenCalledWith(
      '/opt/platform-tools/adb',
      ['shell', 'wm', 'size'],
      expect.objectContaining({ encoding: 'buffer' }),
      expect.any(Function),
    );
  });

  it('targets the configured serial', async () => {
    respond('');

    await createService({ adbSerial: 'emulator-5554' }).runBinary([
      'exec-out',
      'screencap',
      '-p',
    ]);

    expect(execFileMock.mock.calls[0][1]).toEqual([
      '-s',
      'emulator-5554',
      'exec-out',
      'screencap',
      '-p',
    ]);
  });

  it('raises a transport error carrying stderr on failure', async () => {
    respond('', 'error: no devices/emulators found\n', new Error('exit 1'));

    const failure = createService().run(['shell', 'input', 'tap', '1', '2']);

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({
      args: ['shell', 'input', 'tap', '1', '2'],
      stderr: 'error: no devices/emulators found',
    });
  });

  it('lists attached devices that are ready', async () => {
    respond(
      'List of devices attached\nemulator-5554\tdevice\nR58M123\tunauthorized\n\n',
    );

    await expect(createService().listDevices()).resolves.toEqual([
      'emulator-5554',
    ]);
  });
});
