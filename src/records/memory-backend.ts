/**
 * In-process record system.
 *
 * Used when `recordSystem.backend` is "memory" and by tests. Like the real
 * system it assigns ids on create; unlike it, a second create carrying an
 * idempotency tag it has already seen is refused.
 */

import { PipelineError, createTypedError, notFoundError } from '../domain/errors';
import { RecordFilter, RecordTemplate } from '../domain/record';
import { BackendHealth, BackendItem, IDEMPOTENCY_TAG_PREFIX, ItemPatch, RecordBackend, UploadFile } from './backend';

export interface MemoryRecordBackendOptions {
  idPrefix?: string;
  startId?: number;
  templates?: RecordTemplate[];
}

export interface StoredUpload {
  itemId: string;
  name: string;
  mimeType: string;
  byteLength: number;
  comment: string;
}

function copy<T>(value: T): T {
  return structuredClone(value);
}

export class MemoryRecordBackend implements RecordBackend {
  readonly kind = 'memory' as const;
  private items = new Map<string, BackendItem>();
  private templates = new Map<string, RecordTemplate>();
  private nextId: number;
  private readonly idPrefix: string;
  readonly uploads: StoredUpload[] = [];
  /** Number of createItem calls that produced an item. */
  createCalls = 0;

  constructor(options: MemoryRecordBackendOptions = {}) {
    this.idPrefix = options.idPrefix ?? '';
    this.nextId = options.startId ?? 1;
    for (const template of options.templates ?? []) {
      this.templates.set(template.id, copy(template));
    }
  }

  async createItem(input: { categoryId: string; tags: string[] }): Promise<string> {
    for (const tag of input.tags.filter((t) => t.startsWith(IDEMPOTENCY_TAG_PREFIX))) {
      const owner = [...this.items.values()].find((item) => item.tags.includes(tag));
      if (owner) {
        throw new PipelineError(createTypedError({
          kind: 'Conflict',
          code: 'RECORD.DUPLICATE_CREATE',
          message: `Item ${owner.id} already carries ${tag}`,
          details: { externalId: owner.id, tag },
        }));
      }
    }
    const id = `${this.idPrefix}${this.nextId++}`;
    this.items.set(id, {
      id,
      title: '',
      body: '',
      categoryId: input.categoryId,
      tags: [...input.tags],
      metadata: {},
    });
    this.createCalls++;
    return id;
  }

  async patchItem(id: string, patch: ItemPatch): Promise<void> {
    const item = this.require(id);
    if (patch.title !== undefined) item.title = patch.title;
    if (patch.body !== undefined) item.body = patch.body;
    if (patch.metadata !== undefined) item.metadata = copy(patch.metadata);
  }

  async addTag(id: string, tag: string): Promise<void> {
    const item = this.require(id);
    if (!item.tags.includes(tag)) item.tags.push(tag);
  }

  async getItem(id: string): Promise<BackendItem> {
    return copy(this.require(id));
  }

  async listItems(filter: RecordFilter): Promise<BackendItem[]> {
    const query = filter.query?.toLowerCase();
    const offset = filter.offset ?? 0;
    const limit = filter.limit ?? 20;
    return [...this.items.values()]
      .filter((item) => !filter.categoryId || item.categoryId === filter.categoryId)
      .filter((item) => !query || item.title.toLowerCase().includes(query) || item.body.toLowerCase().includes(query))
      .slice(offset, offset + limit)
      .map(copy);
  }

  async findByTag(tag: string): Promise<BackendItem[]> {
    return [...this.items.values()].filter((item) => item.tags.includes(tag)).map(copy);
  }

  async listTemplates(): Promise<RecordTemplate[]> {
    return [...this.templates.values()].map(copy);
  }

  async getTemplate(id: string): Promise<RecordTemplate> {
    const template = this.templates.get(id);
    if (!template) throw new PipelineError(notFoundError('Template', id));
    return copy(template);
  }

  async uploadFile(id: string, file: UploadFile, comment: string): Promise<void> {
    this.require(id);
    this.uploads.push({ itemId: id, name: file.name, mimeType: file.mimeType, byteLength: file.bytes.length, comment });
  }

  async ping(): Promise<BackendHealth> {
    return { reachable: true };
  }

  /** Insert or replace an item as-is. */
  seed(item: BackendItem): void {
    this.items.set(item.id, copy(item));
  }

  get size(): number {
    return this.items.size;
  }

  private require(id: string): BackendItem {
    const item = this.items.get(id);
    if (!item) throw new PipelineError(notFoundError('Record', id));
    return item;
  }
}
