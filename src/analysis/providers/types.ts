/**
 * Vision provider contract and the HTTP failure mapping shared by the
 * provider adapters.
 */

import { ProviderId } from '../../domain/analysis';
import {
  PipelineError,
  authError,
  maskSecretsInMessage,
  providerError,
  rateLimitedError,
  transientNetworkError,
} from '../../domain/errors';
import { InferenceSettings } from '../../config/schema';
import { HttpResponse, parseRetryAfter } from '../../http';

/** One image-plus-prompt inference call. */
export interface VisionRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  image: Buffer;
  mimeType: string;
  temperature: number;
  maxOutputTokens: number;
  credential: string;
  /** Base URL for locally hosted providers. */
  endpoint: string;
  signal: AbortSignal;
}

export interface VisionProvider {
  readonly id: ProviderId;
  /** Human-readable name used in error messages. */
  readonly service: string;
  /** Reject settings this provider cannot work with; raises ConfigError. */
  checkSettings(settings: InferenceSettings): void;
  /** Send the request and return the model's text output. */
  complete(request: VisionRequest): Promise<string>;
  /** Pull the attribute object out of the text `complete` returned; raises InvalidResponse. */
  extract(raw: string): Record<string, unknown>;
}

/**
 * Map a non-2xx provider response to a typed failure:
 * 429 is RateLimited, 401/403 AuthError, 5xx TransientNetworkError,
 * any other status ProviderError.
 */
export async function failureFromResponse(
  service: string,
  res: HttpResponse,
  secrets: string[],
): Promise<PipelineError> {
  const body = await res.text().catch(() => '');
  const snippet = maskSecretsInMessage(body.slice(0, 200), secrets);

  if (res.status === 429) {
    return new PipelineError(rateLimitedError(service, parseRetryAfter(res.headers.get('retry-after'))));
  }
  if (res.status === 401 || res.status === 403) {
    return new PipelineError(authError(service, res.status));
  }
  if (res.status >= 500) {
    return new PipelineError(transientNetworkError(service, `HTTP ${res.status}: ${snippet}`, res.status));
  }
  return new PipelineError(providerError(`${service} returned HTTP ${res.status}: ${snippet}`, { statusCode: res.status }));
}

/** A fetch that never produced a response is a transient network failure. */
export function failureFromException(service: string, err: unknown, secrets: string[]): PipelineError {
  if (err instanceof PipelineError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new PipelineError(
    transientNetworkError(service, `connection failed: ${maskSecretsInMessage(message, secrets)}`),
  );
}

/** Read a JSON body, treating a non-JSON body as a provider failure. */
export async function readJson(service: string, res: HttpResponse): Promise<unknown> {
  try {
    return await res.json();
  } catch {
    throw new PipelineError(providerError(`${service} returned a non-JSON body (HTTP ${res.status})`, {
      statusCode: res.status,
    }));
  }
}
