/**
 * AnalysisEngine: image plus prompt in, structured attributes out.
 *
 * Each call selects the configured provider, renders the prompt from
 * artifact metadata, and runs the request under the provider's concurrency
 * ceiling with a per-call deadline. Network-class failures are retried with
 * backoff; once retries run out the call fails with ProviderError.
 */

import { promises as fs } from 'fs';
import { AnalysisResult, ProviderId } from '../domain/analysis';
import { CaptureArtifact } from '../domain/artifact';
import {
  PipelineError,
  internalError,
  notFoundError,
  providerError,
  providerTimeoutError,
} from '../domain/errors';
import { ConfigStore } from '../config/config-store';
import { InferenceSettings } from '../config/schema';
import { Semaphore } from '../engine/concurrency';
import { DeadlineExceededError, withDeadline } from '../engine/deadline';
import { RetryAttemptInfo, withRetry } from '../engine/retry';
import { HttpFetch, createHttpFetch } from '../http';
import { isFsError } from '../storage/atomic-file';
import { createProvider } from './providers';
import { normalizeAttributes } from './extraction';
import { buildPrompts } from './prompt';
import { logger } from '../logger';

const log = logger.child({ module: 'analysis' });

export interface AnalysisEngineDeps {
  config: ConfigStore;
  fetch?: HttpFetch;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface AnalyzeOptions {
  /** Record-template text for the `{{template}}` placeholder. */
  templateText?: string;
  /** Appended to the user prompt. */
  additionalPrompt?: string;
  /** Called with the 1-based number of every provider attempt. */
  onAttempt?: (attempt: number) => void;
  onRetry?: (info: RetryAttemptInfo) => void;
}

export class AnalysisEngine {
  private semaphores = new Map<ProviderId, Semaphore>();
  private readonly fetch: HttpFetch;

  constructor(private readonly deps: AnalysisEngineDeps) {
    this.fetch = deps.fetch ?? createHttpFetch();
  }

  /**
   * Analyze one artifact. `promptTemplate` overrides the configured
   * template; `providerConfig` overrides individual inference settings.
   */
  async analyze(
    artifact: CaptureArtifact,
    promptTemplate?: string,
    providerConfig?: Partial<InferenceSettings>,
    options: AnalyzeOptions = {},
  ): Promise<AnalysisResult> {
    const settings: InferenceSettings = { ...this.deps.config.section('inference'), ...providerConfig };
    const provider = createProvider(settings.providerId, this.fetch);
    provider.checkSettings(settings);

    const image = await readImage(artifact.imagePath);
    const prompts = buildPrompts(artifact, {
      promptTemplate: promptTemplate ?? settings.promptTemplate,
      templateText: options.templateText,
      additionalPrompt: options.additionalPrompt,
    });
    const semaphore = this.semaphoreFor(settings.providerId, settings.maxConcurrent);
    const alog = log.child({ artifactId: artifact.id, providerId: settings.providerId, model: settings.model });

    let attempts = 0;
    const raw = await withRetry(
      async (attempt) => {
        attempts = attempt;
        options.onAttempt?.(attempt);
        return semaphore.run(async () => {
          try {
            return await withDeadline(
              (signal) =>
                provider.complete({
                  model: settings.model,
                  systemPrompt: prompts.system,
                  userPrompt: prompts.user,
                  image,
                  mimeType: artifact.mimeType,
                  temperature: settings.temperature,
                  maxOutputTokens: settings.maxOutputTokens,
                  credential: settings.credential,
                  endpoint: settings.localEndpoint,
                  signal,
                }),
              settings.timeoutMs,
            );
          } catch (err) {
            if (err instanceof DeadlineExceededError) {
              throw new PipelineError(providerTimeoutError(provider.service, settings.timeoutMs));
            }
            throw err;
          }
        });
      },
      {
        policy: {
          maxRetries: settings.maxRetries,
          baseMs: settings.backoffBaseMs,
          capMs: settings.backoffCapMs,
        },
        onRetry: (info) => {
          alog.warn('Provider call failed, retrying', {
            attempt: info.attempt,
            delayMs: info.delayMs,
            errorKind: info.error.kind,
          });
          options.onRetry?.(info);
        },
        onExhausted: (last, count) =>
          providerError(`${provider.service} failed after ${count} attempts: ${last.message}`, {
            attempts: count,
            lastError: last,
          }),
        sleep: this.deps.sleep,
        random: this.deps.random,
      },
    );

    const { attributes, confidence } = normalizeAttributes(provider.extract(raw), raw);
    alog.info('Analysis completed', { attempts, attributeCount: Object.keys(attributes).length, confidence });

    return {
      attributes,
      confidence,
      rawProviderOutput: raw,
      providerId: settings.providerId,
      model: settings.model,
      analyzedAt: new Date().toISOString(),
      attempts,
    };
  }

  /** Current concurrency state per provider, for system-status. */
  concurrency(): Array<{ providerId: ProviderId; limit: number; active: number; pending: number }> {
    return [...this.semaphores.entries()].map(([providerId, semaphore]) => ({
      providerId,
      limit: semaphore.getLimit(),
      active: semaphore.active,
      pending: semaphore.pending,
    }));
  }

  private semaphoreFor(providerId: ProviderId, limit: number): Semaphore {
    const existing = this.semaphores.get(providerId);
    if (existing) {
      if (existing.getLimit() !== limit) existing.setLimit(limit);
      return existing;
    }
    const created = new Semaphore(limit);
    this.semaphores.set(providerId, created);
    return created;
  }
}

async function readImage(imagePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(imagePath);
  } catch (err) {
    if (isFsError(err, 'ENOENT')) {
      throw new PipelineError(notFoundError('Image file', imagePath));
    }
    throw new PipelineError(internalError(`Cannot read image ${imagePath}: ${err instanceof Error ? err.message : String(err)}`));
  }
}
