/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Values are deep
 * copied on the way in and out, so callers never share references with
 * stored state.
 */

import { CaptureArtifact } from '../domain/artifact';
import { Job, JobFilter } from '../domain/job';
import { Label } from '../domain/label';
import {
  Store,
  JobStore,
  ArtifactStore,
  LabelStore,
  CreateLogStore,
  ListOptions,
  ListResult,
  toListResult,
} from './store';

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

function newestFirst<T extends { createdAt: string }>(a: T, b: T): number {
  return b.createdAt.localeCompare(a.createdAt);
}

class MemoryJobStore implements JobStore {
  private data = new Map<string, Job>();

  async create(job: Job): Promise<Job> {
    this.data.set(job.id, deepCopy(job));
    return deepCopy(job);
  }

  async getById(id: string): Promise<Job | null> {
    const job = this.data.get(id);
    return job ? deepCopy(job) : null;
  }

  async update(job: Job): Promise<Job | null> {
    if (!this.data.has(job.id)) return null;
    this.data.set(job.id, deepCopy(job));
    return deepCopy(job);
  }

  async list(filter?: JobFilter): Promise<ListResult<Job>> {
    const items = [...this.data.values()]
      .filter((job) => !filter?.status || job.status === filter.status)
      .filter((job) => !filter?.captureArtifactId || job.captureArtifactId === filter.captureArtifactId)
      .sort(newestFirst);
    return toListResult(items.map(deepCopy), filter);
  }
}

class MemoryArtifactStore implements ArtifactStore {
  private data = new Map<string, CaptureArtifact>();

  async create(artifact: CaptureArtifact): Promise<CaptureArtifact> {
    this.data.set(artifact.id, deepCopy(artifact));
    return deepCopy(artifact);
  }

  async getById(id: string): Promise<CaptureArtifact | null> {
    const artifact = this.data.get(id);
    return artifact ? deepCopy(artifact) : null;
  }

  async update(artifact: CaptureArtifact): Promise<CaptureArtifact | null> {
    if (!this.data.has(artifact.id)) return null;
    this.data.set(artifact.id, deepCopy(artifact));
    return deepCopy(artifact);
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }

  async list(options?: ListOptions): Promise<ListResult<CaptureArtifact>> {
    const items = [...this.data.values()].sort((a, b) => b.capturedAt.localeCompare(a.capturedAt));
    return toListResult(items.map(deepCopy), options);
  }
}

class MemoryLabelStore implements LabelStore {
  private data = new Map<string, Label>();

  async save(label: Label): Promise<Label> {
    this.data.set(label.id, deepCopy(label));
    return deepCopy(label);
  }

  async getById(id: string): Promise<Label | null> {
    const label = this.data.get(id);
    return label ? deepCopy(label) : null;
  }

  async list(options?: ListOptions & { externalId?: string }): Promise<ListResult<Label>> {
    const items = [...this.data.values()]
      .filter((label) => !options?.externalId || label.externalId === options.externalId)
      .sort((a, b) => b.generatedAt.localeCompare(a.generatedAt));
    return toListResult(items.map(deepCopy), options);
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }
}

class MemoryCreateLogStore implements CreateLogStore {
  private data = new Map<string, string>();

  async get(idempotencyKey: string): Promise<string | null> {
    return this.data.get(idempotencyKey) ?? null;
  }

  async record(idempotencyKey: string, externalId: string): Promise<void> {
    this.data.set(idempotencyKey, externalId);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    jobs: new MemoryJobStore(),
    artifacts: new MemoryArtifactStore(),
    labels: new MemoryLabelStore(),
    createLog: new MemoryCreateLogStore(),
  };
}
