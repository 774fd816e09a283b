/**
 * LabelGenerator: QR labels that point at a record.
 *
 * The payload is the record's view URL in the record system. Equal
 * externalId and profile always give the same label id, payload and PNG.
 */

import crypto from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import QRCode from 'qrcode';
import { EncodingProfile, Label } from '../domain/label';
import { PipelineError, encodingError, internalError, notFoundError, validationError } from '../domain/errors';
import { ConfigStore } from '../config/config-store';
import { NotificationBus } from '../notifications/bus';
import { LabelStore, ListResult } from '../storage/store';
import { isFsError, writeFileAtomic } from '../storage/atomic-file';
import { logger } from '../logger';

const log = logger.child({ module: 'labels' });

export interface LabelGeneratorDeps {
  config: ConfigStore;
  labels: LabelStore;
  bus: NotificationBus;
  clock?: () => Date;
}

export interface GenerateOptions {
  /** Human-readable title used in the file name. */
  title?: string;
  jobId?: string;
}

/** Record view URL: the part of `baseUrl` before `/api/`, then the item view. */
export function labelPayload(baseUrl: string, externalId: string): string {
  const root = baseUrl.split('/api/')[0].replace(/\/+$/, '');
  return `${root}/database.php?mode=view&id=${encodeURIComponent(externalId)}`;
}

export function sanitizeFileName(title: string): string {
  const cleaned = title
    .trim()
    .replace(/[^A-Za-z0-9 _-]/g, '_')
    .replace(/\s+/g, '_')
    .slice(0, 60);
  return cleaned || 'asset';
}

export function labelId(externalId: string, profile: EncodingProfile): string {
  const digest = crypto
    .createHash('sha256')
    .update([externalId, profile.errorCorrectionLevel, profile.maxVersion, profile.margin, profile.scale].join('|'))
    .digest('hex');
  return `lbl_${digest.slice(0, 16)}`;
}

export class LabelGenerator {
  private readonly clock: () => Date;

  constructor(private readonly deps: LabelGeneratorDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /** The configured profile with `overrides` applied. */
  profile(overrides: Partial<EncodingProfile> = {}): EncodingProfile {
    const settings = this.deps.config.section('label');
    return {
      errorCorrectionLevel: overrides.errorCorrectionLevel ?? settings.errorCorrectionLevel,
      maxVersion: overrides.maxVersion ?? settings.maxVersion,
      margin: overrides.margin ?? settings.margin,
      scale: overrides.scale ?? settings.scale,
    };
  }

  async generate(
    externalId: string,
    encodingProfile: Partial<EncodingProfile> = {},
    options: GenerateOptions = {},
  ): Promise<Label> {
    if (!externalId.trim()) {
      throw new PipelineError(validationError('externalId', 'must not be empty'));
    }
    const profile = this.profile(encodingProfile);
    if (!Number.isInteger(profile.maxVersion) || profile.maxVersion < 1 || profile.maxVersion > 40) {
      throw new PipelineError(validationError('maxVersion', 'must be an integer between 1 and 40'));
    }

    const payload = labelPayload(this.deps.config.section('recordSystem').baseUrl, externalId);
    const symbolVersion = this.fit(payload, profile);

    let png: Buffer;
    try {
      png = await QRCode.toBuffer(payload, {
        type: 'png',
        errorCorrectionLevel: profile.errorCorrectionLevel,
        version: symbolVersion,
        margin: profile.margin,
        scale: profile.scale,
      });
    } catch (err) {
      throw new PipelineError(encodingError(`QR rendering failed: ${err instanceof Error ? err.message : String(err)}`, {
        externalId,
      }));
    }

    const title = options.title?.trim() || `asset_${externalId}`;
    const fileName = `${sanitizeFileName(title)}_${sanitizeFileName(externalId)}.png`;
    const imagePath = path.join(path.resolve(this.deps.config.section('storage').labelsDir), fileName);
    try {
      await writeFileAtomic(imagePath, png);
    } catch (err) {
      throw new PipelineError(internalError(`Cannot write label ${imagePath}: ${err instanceof Error ? err.message : String(err)}`));
    }

    const label: Label = {
      id: labelId(externalId, profile),
      jobId: options.jobId,
      externalId,
      title,
      payload,
      imagePath,
      profile,
      symbolVersion,
      generatedAt: this.clock().toISOString(),
    };
    await this.deps.labels.save(label);

    log.info('Label generated', { labelId: label.id, externalId, symbolVersion });
    this.deps.bus.publish({
      type: 'label.generated',
      jobId: options.jobId,
      payload: { labelId: label.id, externalId, imagePath, symbolVersion },
    });
    return label;
  }

  async list(options: { externalId?: string; limit?: number; offset?: number } = {}): Promise<ListResult<Label>> {
    return this.deps.labels.list(options);
  }

  async get(id: string): Promise<Label> {
    const label = await this.deps.labels.getById(id);
    if (!label) throw new PipelineError(notFoundError('Label', id));
    return label;
  }

  /** Remove the label and its PNG. */
  async delete(id: string): Promise<void> {
    const label = await this.get(id);
    try {
      await fs.unlink(label.imagePath);
    } catch (err) {
      if (!isFsError(err, 'ENOENT')) throw err;
      log.warn('Label image already gone', { labelId: id, imagePath: label.imagePath });
    }
    await this.deps.labels.delete(id);
    this.deps.bus.publish({
      type: 'label.deleted',
      jobId: label.jobId,
      payload: { labelId: id, externalId: label.externalId },
    });
  }

  /** Smallest QR version holding `payload`; EncodingError beyond `maxVersion`. */
  private fit(payload: string, profile: EncodingProfile): number {
    let version: number;
    try {
      version = QRCode.create(payload, { errorCorrectionLevel: profile.errorCorrectionLevel }).version;
    } catch (err) {
      throw new PipelineError(encodingError(`Payload cannot be encoded: ${err instanceof Error ? err.message : String(err)}`, {
        payloadLength: payload.length,
        errorCorrectionLevel: profile.errorCorrectionLevel,
      }));
    }
    if (version > profile.maxVersion) {
      throw new PipelineError(encodingError(
        `Payload of ${payload.length} characters needs QR version ${version}, above the maximum ${profile.maxVersion}`,
        {
          payloadLength: payload.length,
          requiredVersion: version,
          maxVersion: profile.maxVersion,
          errorCorrectionLevel: profile.errorCorrectionLevel,
        },
      ));
    }
    return version;
  }
}
