/**
 * Capture drivers.
 *
 * The service talks to hardware only through CaptureDriver. The shipped
 * StillImageDriver serves image files from a directory in rotation, which
 * is what development setups and tests use in place of a camera.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { Resolution } from '../domain/artifact';
import { PipelineError, deviceUnavailableError } from '../domain/errors';

export interface CaptureDevice {
  id: string;
  name: string;
}

export interface CaptureFrame {
  bytes: Buffer;
  mimeType: string;
  resolution: Resolution;
}

export interface CaptureDriver {
  listDevices(): Promise<CaptureDevice[]>;
  isPresent(deviceId: string): Promise<boolean>;
  /** Read one frame. Must stop work when `signal` aborts. */
  read(deviceId: string, resolution: Resolution, signal: AbortSignal): Promise<CaptureFrame>;
}

const MIME_BY_EXTENSION: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
};

export function extensionForMime(mimeType: string): string {
  return mimeType === 'image/png' ? 'png' : 'jpg';
}

export interface StillImageDriverOptions {
  /** Directory holding the frames; read on every capture so config changes apply. */
  sourceDir: () => string;
  /** Device ids this driver answers for. */
  deviceIds: () => string[];
}

export class StillImageDriver implements CaptureDriver {
  private cursor = new Map<string, number>();

  constructor(private readonly options: StillImageDriverOptions) {}

  async listDevices(): Promise<CaptureDevice[]> {
    return this.options.deviceIds().map((id) => ({ id, name: `Still images (${id})` }));
  }

  async isPresent(deviceId: string): Promise<boolean> {
    if (!this.options.deviceIds().includes(deviceId)) return false;
    try {
      const stat = await fs.stat(this.options.sourceDir());
      return stat.isDirectory();
    } catch {
      return false;
    }
  }

  async read(deviceId: string, resolution: Resolution, signal: AbortSignal): Promise<CaptureFrame> {
    const dir = this.options.sourceDir();
    const files = (await fs.readdir(dir))
      .filter((name) => path.extname(name).toLowerCase() in MIME_BY_EXTENSION)
      .sort();
    if (files.length === 0) {
      throw new PipelineError(deviceUnavailableError(deviceId, `no images in ${dir}`));
    }

    const index = (this.cursor.get(deviceId) ?? 0) % files.length;
    this.cursor.set(deviceId, index + 1);
    const file = files[index];
    const bytes = await fs.readFile(path.join(dir, file), { signal });
    return {
      bytes,
      mimeType: MIME_BY_EXTENSION[path.extname(file).toLowerCase()] ?? 'image/jpeg',
      resolution,
    };
  }
}
