/**
 * ADB Device Tests
 */

import { createServiceLogger } from '../../services/logger';
import { CaptureError, InjectionError } from '../../types/errors';
import { AdbDevice, resolveKeyCode, type CommandOptions } from '../adb';
import { encodeGrayToPng, rasterFromRows } from '../raster';
import { silentLogger } from '../../../tests/helpers/fakes';

describe('resolveKeyCode', () => {
  it('maps key names case-insensitively', () => {
    expect(resolveKeyCode('Escape')).toBe(111);
    expect(resolveKeyCode(' back ')).toBe(4);
  });

  it('passes numeric key codes through', () => {
    expect(resolveKeyCode('82')).toBe(82);
  });

  it('returns undefined for unknown names', () => {
    expect(resolveKeyCode('f13')).toBeUndefined();
  });
});

describe('AdbDevice', () => {
  let run: jest.Mock<Promise<Buffer>, [string, string[], CommandOptions]>;
  let device: AdbDevice;

  beforeEach(() => {
    run = jest.fn(async (_file: string, _args: string[], _options: CommandOptions) => Buffer.alloc(0));
    device = new AdbDevice(
      { serial: 'emulator-5556', adbPath: '/opt/adb', commandTimeoutMs: 3000 },
      run,
      createServiceLogger('adb-device', silentLogger())
    );
  });

  describe('listDevices', () => {
    it('parses the adb devices table', async () => {
      run.mockResolvedValueOnce(
        Buffer.from('List of devices attached\nemulator-5556\tdevice\nR58M123\toffline\n\n')
      );

      await expect(device.listDevices()).resolves.toEqual([
        { id: 'emulator-5556', status: 'device', emulator: true },
        { id: 'R58M123', status: 'offline', emulator: false }
      ]);
      expect(run).toHaveBeenCalledWith('/opt/adb', ['devices'], { timeoutMs: 3000 });
    });

    it('reports the configured device as connected only when online', async () => {
      run.mockResolvedValueOnce(Buffer.from('List of devices attached\nemulator-5556\tunauthorized\n'));
      await expect(device.isConnected()).resolves.toBe(false);

      run.mockResolvedValueOnce(Buffer.from('List of devices attached\nemulator-5556\tdevice\n'));
      await expect(device.isConnected()).resolves.toBe(true);
    });

    it('reports not connected when adb fails', async () => {
      run.mockRejectedValueOnce(new Error('spawn adb ENOENT'));

      await expect(device.isConnected()).resolves.toBe(false);
    });
  });

  describe('captureScreen', () => {
    it('decodes the screencap output', async () => {
      run.mockResolvedValueOnce(encodeGrayToPng(rasterFromRows([[5, 6], [7, 8]])));

      const frame = await device.captureScreen();

      expect(run).toHaveBeenCalledWith('/opt/adb', ['-s', 'emulator-5556', 'exec-out', 'screencap', '-p'], {
        timeoutMs: 3000
      });
      expect(frame.width).toBe(2);
      expect(Array.from(frame.data)).toEqual([5, 6, 7, 8]);
    });

    it('rejects empty output', async () => {
      await expect(device.captureScreen()).rejects.toThrow('Screen capture returned no data');
    });

    it('rejects output that is not a PNG', async () => {
      run.mockResolvedValueOnce(Buffer.from('error: device offline'));

      await expect(device.captureScreen()).rejects.toBeInstanceOf(CaptureError);
    });

    it('wraps command failures', async () => {
      run.mockRejectedValueOnce(new Error('exited with code 1'));

      await expect(device.captureScreen()).rejects.toThrow('Screen capture failed: exited with code 1');
    });
  });

  describe('input', () => {
    it('taps at the last pointer position', async () => {
      await device.movePointer(120.4, 80.6, 200);

      await expect(device.click('left')).resolves.toBe(true);
      expect(device.pointerPosition).toEqual({ x: 120, y: 81 });
      expect(run).toHaveBeenCalledWith('/opt/adb', ['-s', 'emulator-5556', 'shell', 'input', 'tap', '120', '81'], {
        timeoutMs: 3000
      });
    });

    it('refuses to click before the pointer has moved', async () => {
      await expect(device.click()).resolves.toBe(false);
      expect(run).not.toHaveBeenCalled();
    });

    it('raises InjectionError when the tap fails', async () => {
      await device.movePointer(10, 10, 0);
      run.mockRejectedValueOnce(new Error('device offline'));

      await expect(device.click()).rejects.toBeInstanceOf(InjectionError);
    });

    it('sends key events by Android key code', async () => {
      await expect(device.pressKey('escape')).resolves.toBe(true);

      expect(run).toHaveBeenCalledWith('/opt/adb', ['-s', 'emulator-5556', 'shell', 'input', 'keyevent', '111'], {
        timeoutMs: 3000
      });
    });

    it('declines keys without a key code', async () => {
      await expect(device.pressKey('f13')).resolves.toBe(false);
      expect(run).not.toHaveBeenCalled();
    });

    it('omits the serial when none is configured', async () => {
      const anyDevice = new AdbDevice({ serial: '' }, run, createServiceLogger('adb-device', silentLogger()));

      await anyDevice.pressKey('back');

      expect(run).toHaveBeenCalledWith('adb', ['shell', 'input', 'keyevent', '4'], { timeoutMs: 10000 });
    });
  });
});
