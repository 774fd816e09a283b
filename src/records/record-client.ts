/**
 * RecordClient: adapter to the external record-management system.
 *
 * Creates are idempotent per key: the key is looked up in the local create
 * log and as an item tag before anything is created, so a retried create
 * never makes a second item. An item found that way without its intake
 * metadata is filled in before its id is returned. Updates carry the version the caller last saw
 * and are refused with Conflict, without writing, when the stored version
 * has moved on.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { AssetRecord, AssetRecordSummary, RecordFields, RecordFilter, RecordTemplate } from '../domain/record';
import { PipelineError, conflictError, notFoundError, validationError } from '../domain/errors';
import { ConfigStore } from '../config/config-store';
import { RecordSystemSettings } from '../config/schema';
import { KeyedLock } from '../engine/concurrency';
import { withRetry } from '../engine/retry';
import { HttpFetch, createHttpFetch } from '../http';
import { isFsError } from '../storage/atomic-file';
import { CreateLogStore } from '../storage/store';
import { stripHtml } from '../analysis/prompt';
import { BackendItem, RecordBackend, RecordBackendKind, hasIntake, idempotencyTag, readIntake } from './backend';
import { ElabftwBackend } from './elabftw-backend';
import { MemoryRecordBackend } from './memory-backend';
import { logger } from '../logger';

const log = logger.child({ module: 'records' });

export interface RecordClientDeps {
  config: ConfigStore;
  createLog: CreateLogStore;
  /** Fixed backend; when omitted the backend follows `recordSystem`. */
  backend?: RecordBackend;
  /** Builds the HTTP client for the eLabFTW backend. */
  fetchFactory?: (settings: RecordSystemSettings) => HttpFetch;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RecordSystemHealth {
  backend: RecordBackendKind;
  baseUrl: string;
  reachable: boolean;
  detail?: string;
}

export class RecordClient {
  private createLocks = new KeyedLock();
  private updateLocks = new KeyedLock();
  private memoryBackend?: MemoryRecordBackend;
  private remote?: { key: string; backend: ElabftwBackend };

  constructor(private readonly deps: RecordClientDeps) {}

  /** The backend for the current settings; the HTTP one is rebuilt when its settings change. */
  backend(): RecordBackend {
    if (this.deps.backend) return this.deps.backend;
    const settings = this.deps.config.section('recordSystem');
    if (settings.backend === 'memory') {
      this.memoryBackend ??= new MemoryRecordBackend();
      return this.memoryBackend;
    }
    const key = JSON.stringify([settings.baseUrl, settings.credential, settings.teamId, settings.verifyTls, settings.timeoutMs]);
    if (this.remote?.key !== key) {
      const fetch = this.deps.fetchFactory?.(settings) ?? createHttpFetch({ verifyTls: settings.verifyTls });
      this.remote = {
        key,
        backend: new ElabftwBackend({
          baseUrl: settings.baseUrl,
          credential: settings.credential,
          teamId: settings.teamId,
          timeoutMs: settings.timeoutMs,
          fetch,
        }),
      };
    }
    return this.remote.backend;
  }

  /**
   * Create a record, or return the id of the one already created under
   * `idempotencyKey`.
   */
  async create(record: AssetRecord, idempotencyKey: string): Promise<string> {
    if (!idempotencyKey.trim()) {
      throw new PipelineError(validationError('idempotencyKey', 'must not be empty'));
    }
    const settings = this.deps.config.section('recordSystem');
    const categoryId = record.categoryId || settings.defaultCategory;
    const tag = idempotencyTag(idempotencyKey);

    return this.createLocks.run(idempotencyKey, async () => {
      const backend = this.backend();
      const logged = await this.deps.createLog.get(idempotencyKey);
      const existing = logged
        ? await this.retry(() => backend.getItem(logged))
        : (await this.retry(() => backend.findByTag(tag)))[0];

      if (existing) {
        if (!logged) {
          log.info('Record already exists for idempotency key', { idempotencyKey, externalId: existing.id });
          await this.deps.createLog.record(idempotencyKey, existing.id);
        }
        if (hasIntake(existing.metadata)) return existing.id;
        log.warn('Completing a record an earlier create left empty', { idempotencyKey, externalId: existing.id });
        await this.fillIn(backend, existing.id, record, idempotencyKey);
        return existing.id;
      }

      const tags = [...record.tags.filter((t) => t !== tag), tag];
      let attempted = false;
      const externalId = await this.retry(async () => {
        // a create that landed before its response was lost carries the tag
        if (attempted) {
          const [landed] = await backend.findByTag(tag);
          if (landed) return landed.id;
        }
        attempted = true;
        return backend.createItem({ categoryId, tags });
      });
      await this.deps.createLog.record(idempotencyKey, externalId);
      await this.fillIn(backend, externalId, record, idempotencyKey);
      log.info('Record created', { externalId, idempotencyKey });
      return externalId;
    });
  }

  /**
   * Apply `fields` if the stored version equals `expectedVersion`.
   * Resolves with the new version.
   *
   * Only single backend calls are retried. The version is checked once;
   * tags go on before the versioned write, so a failure anywhere leaves the
   * stored version where it was.
   */
  async update(externalId: string, fields: RecordFields, expectedVersion: number): Promise<number> {
    return this.updateLocks.run(externalId, async () => {
      const backend = this.backend();
      const item = await this.retry(() => backend.getItem(externalId));
      const intake = readIntake(item.metadata);
      if (intake.version !== expectedVersion) {
        throw new PipelineError(conflictError(externalId, expectedVersion, intake.version));
      }

      for (const tag of fields.tags ?? []) {
        if (!item.tags.includes(tag)) await this.retry(() => backend.addTag(externalId, tag));
      }

      const version = intake.version + 1;
      const patch = {
        title: fields.title,
        body: fields.body,
        metadata: {
          ...item.metadata,
          intake: {
            version,
            idempotencyKey: intake.idempotencyKey,
            attributes: fields.attributes ?? intake.attributes,
            status: fields.status ?? intake.status,
          },
        },
      };
      await this.retry(() => backend.patchItem(externalId, patch));
      log.info('Record updated', { externalId, version });
      return version;
    });
  }

  /** Write title, body and version 1 bookkeeping into a freshly created item. */
  private fillIn(backend: RecordBackend, externalId: string, record: AssetRecord, idempotencyKey: string): Promise<void> {
    return this.retry(() => backend.patchItem(externalId, {
      title: record.title,
      body: record.body,
      metadata: {
        intake: { version: 1, idempotencyKey, attributes: record.attributes, status: record.status },
      },
    }));
  }

  async get(externalId: string): Promise<AssetRecord> {
    const item = await this.retry(() => this.backend().getItem(externalId));
    return toAssetRecord(item);
  }

  async list(filter: RecordFilter = {}): Promise<AssetRecordSummary[]> {
    const items = await this.retry(() => this.backend().listItems(filter));
    return items.map((item) => {
      const intake = readIntake(item.metadata);
      return {
        externalId: item.id,
        title: item.title,
        categoryId: item.categoryId,
        status: intake.status,
        recordVersion: intake.version,
      };
    });
  }

  async listTemplates(): Promise<RecordTemplate[]> {
    return this.retry(() => this.backend().listTemplates());
  }

  /** Template body as plain text, for the analysis prompt. */
  async templateStructure(templateId: string): Promise<string> {
    const template = await this.retry(() => this.backend().getTemplate(templateId));
    const body = stripHtml(template.body);
    return body ? `${template.title}\n${body}` : template.title;
  }

  /** Upload the capture image to the record. */
  async attachImage(externalId: string, imagePath: string, comment = 'Captured image'): Promise<void> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(imagePath);
    } catch (err) {
      if (isFsError(err, 'ENOENT')) throw new PipelineError(notFoundError('Image file', imagePath));
      throw err;
    }
    const name = path.basename(imagePath);
    const mimeType = /\.png$/i.test(name) ? 'image/png' : 'image/jpeg';
    await this.retry(() => this.backend().uploadFile(externalId, { name, bytes, mimeType }, comment));
  }

  async ping(): Promise<RecordSystemHealth> {
    const settings = this.deps.config.section('recordSystem');
    const backend = this.backend();
    const health = await backend.ping();
    return { backend: backend.kind, baseUrl: settings.baseUrl, ...health };
  }

  private retry<T>(fn: () => Promise<T>): Promise<T> {
    const settings = this.deps.config.snapshot().config;
    return withRetry(() => fn(), {
      policy: {
        maxRetries: settings.recordSystem.maxRetries,
        baseMs: settings.inference.backoffBaseMs,
        capMs: settings.inference.backoffCapMs,
      },
      onRetry: (info) => log.warn('Record system call failed, retrying', {
        attempt: info.attempt,
        delayMs: info.delayMs,
        errorKind: info.error.kind,
      }),
      sleep: this.deps.sleep,
      random: this.deps.random,
    });
  }
}

export function toAssetRecord(item: BackendItem): AssetRecord {
  const intake = readIntake(item.metadata);
  return {
    externalId: item.id,
    title: item.title,
    body: item.body,
    categoryId: item.categoryId,
    attributes: intake.attributes,
    status: intake.status,
    recordVersion: intake.version,
    tags: item.tags,
  };
}
