/**
 * ConfigStore: process-wide versioned configuration.
 *
 * Readers get a frozen snapshot and never wait on a writer. Mutations run
 * one at a time, are validated against the schema before they apply, and
 * are persisted with write-then-rename before the new snapshot becomes
 * visible. A rejected mutation leaves value and version untouched.
 */

import { promises as fs } from 'fs';
import { ZodError } from 'zod';
import {
  ConfigSection,
  Configuration,
  configSchema,
  defaultConfiguration,
  isConfigSection,
} from './schema';
import {
  PipelineError,
  configError,
  validationError,
} from '../domain/errors';
import { isRecord } from '../domain/values';
import { writeFileAtomic, isFsError } from '../storage/atomic-file';
import { logger } from '../logger';

const log = logger.child({ module: 'config' });

export interface ConfigSnapshot {
  version: number;
  config: Readonly<Configuration>;
}

export interface ConfigChange {
  version: number;
  section: ConfigSection;
  /** Dotted paths written by the mutation. */
  paths: string[];
}

export type ConfigListener = (change: ConfigChange, snapshot: ConfigSnapshot) => void;

export interface ConfigStoreOptions {
  /** JSON file backing the store; omit for an in-memory store. */
  filePath?: string;
  /** Settings overriding the defaults before load(). */
  initial?: unknown;
}

export class ConfigStore {
  private current: ConfigSnapshot;
  private listeners = new Set<ConfigListener>();
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: ConfigStoreOptions = {}) {
    const parsed = configSchema.safeParse(options.initial ?? {});
    if (!parsed.success) {
      throw new PipelineError(configError('Invalid initial configuration', { issues: formatIssues(parsed.error) }));
    }
    this.current = { version: 1, config: deepFreeze(parsed.data) };
  }

  get filePath(): string | undefined {
    return this.options.filePath;
  }

  /**
   * Read the backing file, writing defaults when it does not exist.
   * Malformed JSON or a schema violation raises ConfigError.
   */
  async load(): Promise<Configuration> {
    const filePath = this.options.filePath;
    if (!filePath) return this.current.config;

    return this.serialize(async () => {
      let raw: string;
      try {
        raw = await fs.readFile(filePath, 'utf8');
      } catch (err) {
        if (!isFsError(err, 'ENOENT')) {
          throw new PipelineError(configError(`Cannot read configuration file ${filePath}`, {
            cause: err instanceof Error ? err.message : String(err),
          }));
        }
        const defaults = defaultConfiguration();
        await writeFileAtomic(filePath, serializeConfig(defaults));
        log.info('Configuration file created with defaults', { filePath });
        this.current = { version: this.current.version + 1, config: deepFreeze(defaults) };
        return this.current.config;
      }

      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (err) {
        throw new PipelineError(configError(`Configuration file ${filePath} is not valid JSON`, {
          cause: err instanceof Error ? err.message : String(err),
        }));
      }

      const parsed = configSchema.safeParse(json);
      if (!parsed.success) {
        throw new PipelineError(configError(`Configuration file ${filePath} failed validation`, {
          issues: formatIssues(parsed.error),
        }));
      }

      this.current = { version: this.current.version + 1, config: deepFreeze(parsed.data) };
      log.info('Configuration loaded', { filePath, version: this.current.version });
      return this.current.config;
    });
  }

  /** Current frozen snapshot. */
  snapshot(): ConfigSnapshot {
    return this.current;
  }

  get version(): number {
    return this.current.version;
  }

  /** One section of the current snapshot. */
  section<K extends ConfigSection>(name: K): Configuration[K] {
    return this.current.config[name];
  }

  /** Value at a dotted path (e.g. "inference.model"); undefined when absent. */
  get(path: string): unknown {
    let node: unknown = this.current.config;
    for (const segment of splitPath(path)) {
      if (Array.isArray(node)) {
        const index = Number(segment);
        node = Number.isInteger(index) ? node[index] : undefined;
      } else if (isRecord(node)) {
        node = node[segment];
      } else {
        return undefined;
      }
    }
    return node;
  }

  /**
   * Set one value. Resolves with the new version; rejects with
   * ValidationError and changes nothing when the result is invalid.
   */
  set(path: string, value: unknown): Promise<number> {
    return this.serialize(async () => {
      const segments = splitPath(path);
      const [section] = segments;
      if (!section || !isConfigSection(section) || segments.length < 2) {
        throw new PipelineError(validationError(path, 'path must name a configuration section and key'));
      }
      const candidate: unknown = structuredClone(this.current.config);
      if (!assignPath(candidate, segments, value)) {
        throw new PipelineError(validationError(path, 'path does not exist'));
      }
      return this.commit(candidate, { section, paths: [path] });
    });
  }

  /** Merge several keys into one section with a single version bump. */
  update(section: ConfigSection, patch: Record<string, unknown>): Promise<number> {
    return this.serialize(async () => {
      const candidate: unknown = structuredClone(this.current.config);
      const paths: string[] = [];
      for (const [key, value] of Object.entries(patch)) {
        const path = `${section}.${key}`;
        if (!assignPath(candidate, [section, key], value)) {
          throw new PipelineError(validationError(path, 'path does not exist'));
        }
        paths.push(path);
      }
      if (paths.length === 0) return this.current.version;
      return this.commit(candidate, { section, paths });
    });
  }

  /** Listen for committed changes. Returns an unsubscribe function. */
  subscribe(listener: ConfigListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async commit(candidate: unknown, change: Omit<ConfigChange, 'version'>): Promise<number> {
    const parsed = configSchema.safeParse(candidate);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : change.paths[0];
      throw new PipelineError(validationError(field, issue?.message ?? 'invalid value'));
    }

    if (this.options.filePath) {
      await writeFileAtomic(this.options.filePath, serializeConfig(parsed.data));
    }

    this.current = { version: this.current.version + 1, config: deepFreeze(parsed.data) };
    const event: ConfigChange = { ...change, version: this.current.version };
    log.info('Configuration updated', { section: change.section, paths: change.paths, version: event.version });
    this.notify(event);
    return this.current.version;
  }

  private notify(change: ConfigChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change, this.current);
      } catch (err) {
        log.warn('Configuration listener failed', {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  /** Chain `op` behind every earlier mutation. */
  private serialize<T>(op: () => Promise<T>): Promise<T> {
    const next = this.writeChain.then(op, op);
    // Failures reach the caller through `next`; the chain only orders writes.
    this.writeChain = next.catch(() => undefined);
    return next;
  }
}

function splitPath(path: string): string[] {
  return path.split('.').filter((segment) => segment.length > 0);
}

/** Assign `value` at an existing object path. Returns false when a parent is missing. */
function assignPath(root: unknown, segments: string[], value: unknown): boolean {
  let node: unknown = root;
  for (let i = 0; i < segments.length - 1; i++) {
    if (!isRecord(node)) return false;
    node = node[segments[i]];
  }
  if (!isRecord(node)) return false;
  node[segments[segments.length - 1]] = value;
  return true;
}

function serializeConfig(config: Configuration): string {
  return `${JSON.stringify(config, null, 2)}\n`;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
