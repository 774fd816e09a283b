/**
 * eLabFTW API v2 backend.
 *
 * Items are created empty (POST /items answers 201 with the new id in the
 * Location header) and filled in by PATCH. eLabFTW returns `metadata` as a
 * JSON string and `tags` as a `|`-separated string; both are normalized
 * here so RecordClient only sees BackendItem values.
 */

import {
  PipelineError,
  authError,
  createTypedError,
  internalError,
  maskSecretsInMessage,
  notFoundError,
  transientNetworkError,
  validationError,
} from '../domain/errors';
import { RecordFilter, RecordTemplate } from '../domain/record';
import { isRecord, readString } from '../domain/values';
import { DeadlineExceededError, withDeadline } from '../engine/deadline';
import { FormData, HttpFetch, HttpResponse } from '../http';
import { BackendHealth, BackendItem, ItemPatch, RecordBackend, UploadFile } from './backend';

const SERVICE = 'eLabFTW';

export interface ElabftwBackendOptions {
  /** API root, e.g. https://elab.example.org/api/v2 */
  baseUrl: string;
  credential: string;
  teamId: number;
  timeoutMs: number;
  fetch: HttpFetch;
}

interface RequestOptions {
  method?: string;
  json?: unknown;
  form?: FormData;
  query?: Array<[string, string]>;
}

export class ElabftwBackend implements RecordBackend {
  readonly kind = 'elabftw' as const;
  private readonly baseUrl: string;

  constructor(private readonly options: ElabftwBackendOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async createItem(input: { categoryId: string; tags: string[] }): Promise<string> {
    const res = await this.request('/items', {
      method: 'POST',
      json: { category_id: toNumericId(input.categoryId), tags: input.tags },
    });
    const location = res.headers.get('location');
    const id = location ? location.replace(/\/+$/, '').split('/').pop() : undefined;
    if (!id) {
      throw new PipelineError(internalError(`${SERVICE} did not return the id of the created item`, {
        status: res.status,
      }));
    }
    return id;
  }

  async patchItem(id: string, patch: ItemPatch): Promise<void> {
    const body: Record<string, unknown> = {};
    if (patch.title !== undefined) body['title'] = patch.title;
    if (patch.body !== undefined) body['body'] = patch.body;
    if (patch.metadata !== undefined) body['metadata'] = JSON.stringify(patch.metadata);
    await this.request(`/items/${encodeURIComponent(id)}`, { method: 'PATCH', json: body });
  }

  async addTag(id: string, tag: string): Promise<void> {
    await this.request(`/items/${encodeURIComponent(id)}/tags`, { method: 'POST', json: { tag } });
  }

  async getItem(id: string): Promise<BackendItem> {
    const res = await this.request(`/items/${encodeURIComponent(id)}`, {}, id);
    return toBackendItem(await this.readJson(res));
  }

  async listItems(filter: RecordFilter): Promise<BackendItem[]> {
    const query: Array<[string, string]> = [];
    if (filter.query) query.push(['q', filter.query]);
    if (filter.categoryId) query.push(['cat', filter.categoryId]);
    query.push(['limit', String(filter.limit ?? 20)]);
    query.push(['offset', String(filter.offset ?? 0)]);
    const res = await this.request('/items', { query });
    return toItemList(await this.readJson(res));
  }

  async findByTag(tag: string): Promise<BackendItem[]> {
    const res = await this.request('/items', { query: [['tags[]', tag]] });
    // tag search is a prefix match on some versions
    return toItemList(await this.readJson(res)).filter((item) => item.tags.includes(tag));
  }

  async listTemplates(): Promise<RecordTemplate[]> {
    const res = await this.request('/items_types');
    const data = await this.readJson(res);
    return Array.isArray(data) ? data.filter(isRecord).map(toTemplate) : [];
  }

  async getTemplate(id: string): Promise<RecordTemplate> {
    const res = await this.request(`/items_types/${encodeURIComponent(id)}`, {}, id, 'Template');
    const data = await this.readJson(res);
    if (!isRecord(data)) {
      throw new PipelineError(internalError(`${SERVICE} returned a malformed template`));
    }
    return toTemplate(data);
  }

  async uploadFile(id: string, file: UploadFile, comment: string): Promise<void> {
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(file.bytes)], { type: file.mimeType }), file.name);
    form.append('comment', comment);
    await this.request(`/items/${encodeURIComponent(id)}/uploads`, { method: 'POST', form });
  }

  /** Reachable when the credential can read the configured team. */
  async ping(): Promise<BackendHealth> {
    try {
      await this.request(`/teams/${this.options.teamId}`);
      return { reachable: true };
    } catch (err) {
      const message = err instanceof PipelineError ? err.typedError.message : String(err);
      return { reachable: false, detail: message };
    }
  }

  private async request(
    path: string,
    options: RequestOptions = {},
    resourceId?: string,
    resourceType = 'Record',
  ): Promise<HttpResponse> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of options.query ?? []) {
      url.searchParams.append(key, value);
    }

    const headers: Record<string, string> = {
      Authorization: this.options.credential,
      Accept: 'application/json',
    };
    let body: string | FormData | undefined;
    if (options.form) {
      body = options.form;
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    let res: HttpResponse;
    try {
      res = await withDeadline(
        (signal) => this.options.fetch(url.toString(), { method: options.method ?? 'GET', headers, body, signal }),
        this.options.timeoutMs,
      );
    } catch (err) {
      if (err instanceof DeadlineExceededError) {
        throw new PipelineError(transientNetworkError(SERVICE, `request timed out after ${this.options.timeoutMs}ms`));
      }
      if (err instanceof PipelineError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new PipelineError(
        transientNetworkError(SERVICE, `connection failed: ${maskSecretsInMessage(message, [this.options.credential])}`),
      );
    }

    if (!res.ok) {
      throw await this.failure(res, resourceType, resourceId ?? path);
    }
    return res;
  }

  /**
   * 401/403 AuthError, 404 NotFound, 429 and 5xx TransientNetworkError,
   * 400/422 ValidationError.
   */
  private async failure(res: HttpResponse, resourceType: string, resourceId: string): Promise<PipelineError> {
    const text = await res.text().catch(() => '');
    const snippet = maskSecretsInMessage(text.slice(0, 200), [this.options.credential]);

    if (res.status === 401 || res.status === 403) {
      return new PipelineError(authError(SERVICE, res.status));
    }
    if (res.status === 404) {
      return new PipelineError(notFoundError(resourceType, resourceId));
    }
    if (res.status === 429 || res.status >= 500) {
      return new PipelineError(transientNetworkError(SERVICE, `HTTP ${res.status}: ${snippet}`, res.status));
    }
    if (res.status === 400 || res.status === 422) {
      return new PipelineError(validationError('record', `${SERVICE} rejected the request: ${snippet}`));
    }
    return new PipelineError(createTypedError({
      kind: 'Internal',
      code: 'RECORD.HTTP',
      message: `${SERVICE} returned HTTP ${res.status}: ${snippet}`,
      details: { statusCode: res.status },
    }));
  }

  private async readJson(res: HttpResponse): Promise<unknown> {
    try {
      return await res.json();
    } catch {
      throw new PipelineError(internalError(`${SERVICE} returned a non-JSON body`));
    }
  }
}

function toNumericId(id: string): number | string {
  const numeric = Number(id);
  return Number.isInteger(numeric) ? numeric : id;
}

function toItemList(data: unknown): BackendItem[] {
  return Array.isArray(data) ? data.filter(isRecord).map(toBackendItem) : [];
}

function idOf(value: unknown): string {
  return typeof value === 'number' || typeof value === 'string' ? String(value) : '';
}

function parseTags(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((tag): tag is string => typeof tag === 'string');
  }
  if (typeof value === 'string' && value.length > 0) {
    return value.split('|');
  }
  return [];
}

function parseMetadata(value: unknown): Record<string, unknown> {
  if (isRecord(value)) return value;
  if (typeof value !== 'string' || value.length === 0) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export function toBackendItem(data: unknown): BackendItem {
  if (!isRecord(data)) {
    throw new PipelineError(internalError(`${SERVICE} returned a malformed item`));
  }
  return {
    id: idOf(data['id']),
    title: readString(data, 'title') ?? '',
    body: readString(data, 'body') ?? '',
    categoryId: idOf(data['category'] ?? data['category_id']),
    tags: parseTags(data['tags']),
    metadata: parseMetadata(data['metadata']),
  };
}

function toTemplate(data: Record<string, unknown>): RecordTemplate {
  return {
    id: idOf(data['id']),
    title: readString(data, 'title') ?? '',
    body: readString(data, 'body') ?? '',
  };
}
