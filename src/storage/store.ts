/**
 * Storage layer interfaces.
 *
 * Defines the contract for job, artifact and label persistence with
 * pluggable backends. Every method returns copies; mutating a returned
 * object never changes stored state.
 */

import { CaptureArtifact } from '../domain/artifact';
import { Job, JobFilter } from '../domain/job';
import { Label } from '../domain/label';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Store interface for jobs. */
export interface JobStore {
  create(job: Job): Promise<Job>;
  getById(id: string): Promise<Job | null>;
  /** Replace the stored job. Returns null when it does not exist. */
  update(job: Job): Promise<Job | null>;
  /** Newest first. */
  list(filter?: JobFilter): Promise<ListResult<Job>>;
}

/** Store interface for capture artifacts. */
export interface ArtifactStore {
  create(artifact: CaptureArtifact): Promise<CaptureArtifact>;
  getById(id: string): Promise<CaptureArtifact | null>;
  /** Returns null if the artifact does not exist. */
  update(artifact: CaptureArtifact): Promise<CaptureArtifact | null>;
  delete(id: string): Promise<boolean>;
  list(options?: ListOptions): Promise<ListResult<CaptureArtifact>>;
}

/** Store interface for generated labels. */
export interface LabelStore {
  /** Insert or replace by id. */
  save(label: Label): Promise<Label>;
  getById(id: string): Promise<Label | null>;
  list(options?: ListOptions & { externalId?: string }): Promise<ListResult<Label>>;
  delete(id: string): Promise<boolean>;
}

/** Idempotency keys of record creates that already succeeded. */
export interface CreateLogStore {
  get(idempotencyKey: string): Promise<string | null>;
  record(idempotencyKey: string, externalId: string): Promise<void>;
}

/** Build a paginated ListResult from the full, filtered item list. */
export function toListResult<T>(items: T[], options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  const page = items.slice(offset, offset + limit);
  return {
    items: page,
    total: items.length,
    limit,
    offset,
    hasMore: offset + page.length < items.length,
  };
}

/** Composite store interface. */
export interface Store {
  jobs: JobStore;
  artifacts: ArtifactStore;
  labels: LabelStore;
  createLog: CreateLogStore;
}
