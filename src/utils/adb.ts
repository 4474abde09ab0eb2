/**
 * ADB Device Integration
 *
 * Screen capture and input injection for an Android device or emulator
 * through the adb command line: `exec-out screencap -p` for frames,
 * `input tap` and `input keyevent` for input.
 */

import { spawn } from 'child_process';
import { createServiceLogger, type ServiceLogger } from '../services/logger';
import { CaptureError, InjectionError, toError } from '../types/errors';
import type { InputInjector, MouseButton, Point, Raster, ScreenCaptureProvider } from '../types/navigation';
import { decodePngToGray } from './raster';

export interface CommandOptions {
  timeoutMs: number;
}

/**
 * Runs a command and resolves with its stdout. Rejects on spawn failure,
 * a non-zero exit code or a timeout.
 */
export type CommandRunner = (file: string, args: string[], options: CommandOptions) => Promise<Buffer>;

export interface AdbDeviceConfig {
  serial: string;
  adbPath: string;
  commandTimeoutMs: number;
}

export interface AdbDeviceEntry {
  id: string;
  status: string;
  emulator: boolean;
}

/** Android key codes for the key names the navigator uses */
export const KEY_CODES: Readonly<Record<string, number>> = {
  escape: 111,
  esc: 111,
  back: 4,
  enter: 66,
  home: 3,
  space: 62,
  tab: 61
};

export function resolveKeyCode(key: string): number | undefined {
  const normalized = key.trim().toLowerCase();
  if (/^\d+$/.test(normalized)) {
    return Number(normalized);
  }
  return KEY_CODES[normalized];
}

export const spawnCommand: CommandRunner = (file, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(file, args);
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const timeoutId = setTimeout(() => {
      child.kill('SIGKILL');
      reject(new Error(`${file} ${args.join(' ')} timed out after ${options.timeoutMs}ms`));
    }, options.timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', error => {
      clearTimeout(timeoutId);
      reject(error);
    });

    child.on('close', code => {
      clearTimeout(timeoutId);
      if (code === 0) {
        resolve(Buffer.concat(stdout));
      } else {
        const message = Buffer.concat(stderr).toString().trim();
        reject(new Error(`${file} ${args.join(' ')} exited with code ${code}${message ? `: ${message}` : ''}`));
      }
    });
  });

export class AdbDevice implements ScreenCaptureProvider, InputInjector {
  private readonly config: AdbDeviceConfig;
  private readonly run: CommandRunner;
  private readonly logger: ServiceLogger;
  private pointer?: Point;

  constructor(
    config: Partial<AdbDeviceConfig> = {},
    run: CommandRunner = spawnCommand,
    logger: ServiceLogger = createServiceLogger('adb-device')
  ) {
    this.config = {
      serial: 'emulator-5554',
      adbPath: 'adb',
      commandTimeoutMs: 10000,
      ...config
    };
    this.run = run;
    this.logger = logger;
  }

  get serial(): string {
    return this.config.serial;
  }

  get pointerPosition(): Point | undefined {
    return this.pointer ? { ...this.pointer } : undefined;
  }

  private args(...command: string[]): string[] {
    return this.config.serial ? ['-s', this.config.serial, ...command] : command;
  }

  private exec(...command: string[]): Promise<Buffer> {
    return this.run(this.config.adbPath, this.args(...command), { timeoutMs: this.config.commandTimeoutMs });
  }

  /**
   * List attached devices (`adb devices`)
   */
  async listDevices(): Promise<AdbDeviceEntry[]> {
    const stdout = await this.run(this.config.adbPath, ['devices'], { timeoutMs: this.config.commandTimeoutMs });
    return stdout
      .toString()
      .split('\n')
      .slice(1)
      .map(line => line.trim())
      .filter(line => line.length > 0)
      .map(line => {
        const [id, status = 'unknown'] = line.split(/\s+/);
        return { id, status, emulator: id.startsWith('emulator-') };
      });
  }

  /**
   * Whether the configured device is attached and online
   */
  async isConnected(): Promise<boolean> {
    try {
      const devices = await this.listDevices();
      if (!this.config.serial) {
        return devices.some(device => device.status === 'device');
      }
      return devices.some(device => device.id === this.config.serial && device.status === 'device');
    } catch (error) {
      this.logger.warn('device_list_failed', `adb devices failed: ${toError(error).message}`);
      return false;
    }
  }

  async captureScreen(): Promise<Raster> {
    let png: Buffer;
    try {
      png = await this.exec('exec-out', 'screencap', '-p');
    } catch (error) {
      throw new CaptureError(`Screen capture failed: ${toError(error).message}`, { serial: this.config.serial });
    }

    if (png.length === 0) {
      throw new CaptureError('Screen capture returned no data', { serial: this.config.serial });
    }

    try {
      return decodePngToGray(png);
    } catch (error) {
      throw new CaptureError(`Screen capture is not a valid PNG: ${toError(error).message}`, {
        serial: this.config.serial,
        bytes: png.length
      });
    }
  }

  /**
   * Touch screens have no hover; the position is remembered for the next
   * click.
   */
  async movePointer(x: number, y: number, _durationMs: number): Promise<boolean> {
    this.pointer = { x: Math.round(x), y: Math.round(y) };
    return true;
  }

  async click(button: MouseButton = 'left'): Promise<boolean> {
    if (!this.pointer) {
      this.logger.warn('click_without_position', 'Click requested before any pointer move');
      return false;
    }
    if (button !== 'left') {
      this.logger.debug('button_mapped', `${button} click sent as a tap`);
    }

    const { x, y } = this.pointer;
    try {
      await this.exec('shell', 'input', 'tap', String(x), String(y));
      return true;
    } catch (error) {
      throw new InjectionError(`Tap at (${x}, ${y}) failed: ${toError(error).message}`, { x, y });
    }
  }

  async pressKey(key: string, _durationMs?: number): Promise<boolean> {
    const keyCode = resolveKeyCode(key);
    if (keyCode === undefined) {
      this.logger.warn('unknown_key', `No Android key code for "${key}"`, undefined, { key });
      return false;
    }

    try {
      await this.exec('shell', 'input', 'keyevent', String(keyCode));
      return true;
    } catch (error) {
      throw new InjectionError(`Key ${key} (${keyCode}) failed: ${toError(error).message}`, { key, keyCode });
    }
  }
}
