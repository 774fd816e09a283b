/**
 * CaptureService: serialized access per capture device.
 *
 * One capture per device at a time; distinct devices never wait on each
 * other. The image is on disk before the artifact is registered, so a
 * registration failure leaves an orphan file that is reported as
 * PartialCapture.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { createHash } from 'crypto';
import { v4 as uuid } from 'uuid';
import { CaptureArtifact, Resolution, formatResolution } from '../domain/artifact';
import {
  PipelineError,
  captureTimeoutError,
  deviceUnavailableError,
  internalError,
  notFoundError,
  partialCaptureError,
  validationError,
} from '../domain/errors';
import { ConfigStore } from '../config/config-store';
import { Store } from '../storage/store';
import { moveFile } from '../storage/atomic-file';
import { NotificationBus } from '../notifications/bus';
import { KeyedLock, LockTimeoutError } from '../engine/concurrency';
import { DeadlineExceededError, withDeadline } from '../engine/deadline';
import { CaptureDriver, CaptureFrame, extensionForMime } from './driver';
import { logger } from '../logger';

const log = logger.child({ module: 'capture' });

export interface DeviceStatus {
  deviceId: string;
  present: boolean;
  busy: boolean;
}

export interface CaptureStatus {
  defaultDeviceId: string;
  resolution: Resolution;
  frameRate: number;
  autoStart: boolean;
  devices: DeviceStatus[];
}

export interface CaptureServiceDeps {
  config: ConfigStore;
  store: Store;
  bus: NotificationBus;
  driver: CaptureDriver;
  clock?: () => Date;
}

/** `capture_20261018_093015_1a2b3c4d.jpg` */
function captureFileName(at: Date, id: string, extension: string): string {
  const stamp = at.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `capture_${stamp}_${id.slice(0, 8)}.${extension}`;
}

export class CaptureService {
  private locks = new KeyedLock();
  private readonly clock: () => Date;

  constructor(private readonly deps: CaptureServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Capture one image. Omitted arguments fall back to the `capture`
   * configuration section.
   */
  async capture(deviceId?: string, resolution?: Resolution, timeoutMs?: number): Promise<CaptureArtifact> {
    const settings = this.deps.config.section('capture');
    const device = deviceId ?? settings.deviceId;
    const size = resolution ?? { width: settings.resolution[0], height: settings.resolution[1] };
    const deadline = timeoutMs ?? settings.timeoutMs;

    if (!Number.isInteger(size.width) || !Number.isInteger(size.height) || size.width <= 0 || size.height <= 0) {
      throw new PipelineError(validationError('resolution', 'width and height must be positive integers'));
    }
    if (!Number.isFinite(deadline) || deadline <= 0) {
      throw new PipelineError(validationError('timeoutMs', 'must be a positive number'));
    }

    const startedAt = Date.now();
    let release: () => void;
    try {
      release = await this.locks.acquire(device, deadline);
    } catch (err) {
      if (err instanceof LockTimeoutError) {
        throw new PipelineError(deviceUnavailableError(device, `busy for more than ${deadline}ms`));
      }
      throw err;
    }

    try {
      if (!(await this.deps.driver.isPresent(device))) {
        throw new PipelineError(deviceUnavailableError(device, 'device not present'));
      }

      const remaining = Math.max(1, deadline - (Date.now() - startedAt));
      let frame: CaptureFrame;
      try {
        frame = await withDeadline((signal) => this.deps.driver.read(device, size, signal), remaining);
      } catch (err) {
        if (err instanceof DeadlineExceededError) {
          throw new PipelineError(captureTimeoutError(device, deadline));
        }
        throw err;
      }

      const capturedAt = this.clock();
      const id = uuid();
      const imagesDir = path.resolve(this.deps.config.section('storage').imagesDir);
      const imagePath = path.join(imagesDir, captureFileName(capturedAt, id, extensionForMime(frame.mimeType)));
      try {
        await fs.mkdir(imagesDir, { recursive: true });
        await fs.writeFile(imagePath, frame.bytes);
      } catch (err) {
        throw new PipelineError(internalError(`Failed to store captured image: ${err instanceof Error ? err.message : String(err)}`, {
          imagePath,
        }));
      }

      const artifact: CaptureArtifact = {
        id: `cap_${id}`,
        deviceId: device,
        imagePath,
        resolution: frame.resolution,
        capturedAt: capturedAt.toISOString(),
        mimeType: frame.mimeType,
        byteLength: frame.bytes.length,
        sha256: createHash('sha256').update(frame.bytes).digest('hex'),
      };

      try {
        await this.deps.store.artifacts.create(artifact);
      } catch (err) {
        const cause = err instanceof Error ? err.message : String(err);
        log.error('Captured image written but artifact not registered', { imagePath, cause });
        throw new PipelineError(partialCaptureError(imagePath, cause));
      }

      log.info('Image captured', {
        artifactId: artifact.id,
        deviceId: device,
        resolution: formatResolution(artifact.resolution),
        bytes: artifact.byteLength,
      });
      this.deps.bus.publish({
        type: 'capture.completed',
        payload: { artifactId: artifact.id, deviceId: device, imagePath, capturedAt: artifact.capturedAt },
      });
      return artifact;
    } finally {
      release();
    }
  }

  /** Presence and busy flag of every known device. */
  async status(): Promise<CaptureStatus> {
    const settings = this.deps.config.section('capture');
    const known = await this.deps.driver.listDevices();
    const ids = new Set([settings.deviceId, ...known.map((device) => device.id)]);
    const devices: DeviceStatus[] = [];
    for (const deviceId of ids) {
      devices.push({
        deviceId,
        present: await this.deps.driver.isPresent(deviceId),
        busy: this.locks.isLocked(deviceId),
      });
    }
    return {
      defaultDeviceId: settings.deviceId,
      resolution: { width: settings.resolution[0], height: settings.resolution[1] },
      frameRate: settings.frameRate,
      autoStart: settings.autoStart,
      devices,
    };
  }

  /**
   * Apply `storage.imageRetention` to an artifact whose Job is terminal:
   * `archive` moves the image to `storage.archiveDir`, `delete` removes the
   * image and the artifact.
   */
  async retire(artifactId: string): Promise<void> {
    const { imageRetention, archiveDir } = this.deps.config.section('storage');
    if (imageRetention === 'keep') return;
    const artifact = await this.deps.store.artifacts.getById(artifactId);
    if (!artifact) return;

    if (imageRetention === 'delete') {
      await fs.rm(artifact.imagePath, { force: true });
      await this.deps.store.artifacts.delete(artifact.id);
      log.info('Capture image deleted', { artifactId, imagePath: artifact.imagePath });
      return;
    }

    if (artifact.archivedAt) return;
    const archivedPath = path.join(path.resolve(archiveDir), path.basename(artifact.imagePath));
    await moveFile(artifact.imagePath, archivedPath);
    await this.deps.store.artifacts.update({
      ...artifact,
      imagePath: archivedPath,
      archivedAt: this.clock().toISOString(),
    });
    log.info('Capture image archived', { artifactId, imagePath: archivedPath });
  }

  async getArtifact(id: string): Promise<CaptureArtifact> {
    const artifact = await this.deps.store.artifacts.getById(id);
    if (!artifact) {
      throw new PipelineError(notFoundError('Capture artifact', id));
    }
    return artifact;
  }
}
