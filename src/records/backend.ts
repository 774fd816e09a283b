/**
 * Record-system backend contract.
 *
 * Backends speak in raw items; RecordClient layers idempotency, optimistic
 * versioning and retries on top. Pipeline bookkeeping lives in the item's
 * metadata under `intake`.
 */

import { Attributes } from '../domain/analysis';
import { RecordFilter, RecordStatus, RecordTemplate } from '../domain/record';
import { isRecord, readNumber, readString, toAttributes } from '../domain/values';

export type RecordBackendKind = 'elabftw' | 'memory';

export interface BackendItem {
  id: string;
  title: string;
  body: string;
  categoryId: string;
  tags: string[];
  metadata: Record<string, unknown>;
}

export interface ItemPatch {
  title?: string;
  body?: string;
  metadata?: Record<string, unknown>;
}

export interface UploadFile {
  name: string;
  bytes: Buffer;
  mimeType: string;
}

export interface BackendHealth {
  reachable: boolean;
  detail?: string;
}

export interface RecordBackend {
  readonly kind: RecordBackendKind;
  /** Create an empty item; resolves with the id the system assigned. */
  createItem(input: { categoryId: string; tags: string[] }): Promise<string>;
  patchItem(id: string, patch: ItemPatch): Promise<void>;
  addTag(id: string, tag: string): Promise<void>;
  /** Raises NotFound for an unknown id. */
  getItem(id: string): Promise<BackendItem>;
  listItems(filter: RecordFilter): Promise<BackendItem[]>;
  findByTag(tag: string): Promise<BackendItem[]>;
  listTemplates(): Promise<RecordTemplate[]>;
  getTemplate(id: string): Promise<RecordTemplate>;
  uploadFile(id: string, file: UploadFile, comment: string): Promise<void>;
  ping(): Promise<BackendHealth>;
}

/** Pipeline bookkeeping stored in item metadata. */
export interface IntakeMetadata {
  version: number;
  idempotencyKey?: string;
  attributes: Attributes;
  status: RecordStatus;
}

const RECORD_STATUSES: readonly RecordStatus[] = ['draft', 'registered', 'labeled'];

function toRecordStatus(value: unknown): RecordStatus {
  return RECORD_STATUSES.find((status) => status === value) ?? 'registered';
}

/** Whether the pipeline has written its bookkeeping into the item. */
export function hasIntake(metadata: Record<string, unknown>): boolean {
  return isRecord(metadata['intake']);
}

/** Read `metadata.intake`; items created outside the pipeline start at version 1. */
export function readIntake(metadata: Record<string, unknown>): IntakeMetadata {
  const intake = metadata['intake'];
  if (!isRecord(intake)) {
    return { version: 1, attributes: {}, status: 'registered' };
  }
  const attributes = intake['attributes'];
  return {
    version: readNumber(intake, 'version') ?? 1,
    idempotencyKey: readString(intake, 'idempotencyKey'),
    attributes: isRecord(attributes) ? toAttributes(attributes) : {},
    status: toRecordStatus(intake['status']),
  };
}

export const IDEMPOTENCY_TAG_PREFIX = 'intake:';

export function idempotencyTag(key: string): string {
  return `${IDEMPOTENCY_TAG_PREFIX}${key}`;
}
