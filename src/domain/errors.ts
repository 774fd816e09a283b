/**
 * Typed error model for machine-actionable error handling.
 *
 * Errors are values (`TypedError`) with a stable `kind`, a namespaced `code`
 * and remediation hints. Code that has to unwind the stack throws a
 * `PipelineError` carrying the value; the HTTP layer and the orchestrator
 * read the value back out.
 */

/** Stable error kinds surfaced to API consumers and recorded on failed Jobs. */
export type ErrorKind =
  | 'ConfigError'
  | 'ValidationError'
  | 'DeviceUnavailable'
  | 'CaptureTimeout'
  | 'PartialCapture'
  | 'ProviderError'
  | 'RateLimited'
  | 'ProviderTimeout'
  | 'TransientNetworkError'
  | 'InvalidResponse'
  | 'AuthError'
  | 'NotFound'
  | 'Conflict'
  | 'EncodingError'
  | 'DuplicateJob'
  | 'JobFailed'
  | 'Cancelled'
  | 'Internal';

/** Pipeline stages a failure can be attributed to. */
export type StageName = 'capture' | 'analysis' | 'registration' | 'labeling';

/** Typed suggested fix that operators or clients can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and events. */
export interface TypedError {
  kind: ErrorKind;
  /** Namespaced error code (e.g., "ANALYSIS.RATE_LIMITED"). */
  code: string;
  message: string;
  jobId?: string;
  stage?: StageName;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  kind: ErrorKind;
  code: string;
  message: string;
  jobId?: string;
  stage?: StageName;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    kind: params.kind,
    code: params.code,
    message: params.message,
    jobId: params.jobId,
    stage: params.stage,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error wrapper used wherever a TypedError has to be thrown. */
export class PipelineError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'PipelineError';
  }

  get kind(): ErrorKind {
    return this.typedError.kind;
  }
}

/** True when `err` is a PipelineError of one of the given kinds. */
export function isErrorKind(err: unknown, ...kinds: ErrorKind[]): err is PipelineError {
  return err instanceof PipelineError && kinds.includes(err.typedError.kind);
}

/**
 * Normalize anything thrown into a TypedError. Unknown errors become
 * `Internal`, with secrets masked out of the message.
 */
export function toTypedError(err: unknown, secrets: string[] = []): TypedError {
  if (err instanceof PipelineError) return err.typedError;
  const message = err instanceof Error ? err.message : String(err);
  return internalError(maskSecretsInMessage(message, secrets));
}

// --- Configuration & validation ---

export function configError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    kind: 'ConfigError',
    code: 'CONFIG.INVALID',
    message,
    details,
    suggestedFixes: [
      { type: 'FIX_CONFIGURATION', params: {}, description: 'Correct the configuration file or settings and retry' },
    ],
  });
}

export function validationError(field: string, reason: string): TypedError {
  return createTypedError({
    kind: 'ValidationError',
    code: 'VALIDATION.SCHEMA',
    message: field ? `Invalid value for "${field}": ${reason}` : reason,
    details: { field, reason },
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    kind: 'NotFound',
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    details: { resourceType, resourceId },
  });
}

// --- Capture ---

export function deviceUnavailableError(deviceId: string, reason: string): TypedError {
  return createTypedError({
    kind: 'DeviceUnavailable',
    code: 'CAPTURE.DEVICE_UNAVAILABLE',
    message: `Capture device "${deviceId}" unavailable: ${reason}`,
    retryable: true,
    details: { deviceId, reason },
    suggestedFixes: [
      { type: 'CHECK_DEVICE', params: { deviceId }, description: 'Verify the device is connected and not in use' },
    ],
  });
}

export function captureTimeoutError(deviceId: string, timeoutMs: number): TypedError {
  return createTypedError({
    kind: 'CaptureTimeout',
    code: 'CAPTURE.TIMEOUT',
    message: `Capture from "${deviceId}" exceeded ${timeoutMs}ms`,
    retryable: true,
    details: { deviceId, timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function partialCaptureError(imagePath: string, cause: string): TypedError {
  return createTypedError({
    kind: 'PartialCapture',
    code: 'CAPTURE.PARTIAL',
    message: `Image written to ${imagePath} but the artifact was not registered: ${cause}`,
    details: { imagePath, cause },
  });
}

// --- Network / provider ---

export function rateLimitedError(service: string, retryAfterMs?: number): TypedError {
  return createTypedError({
    kind: 'RateLimited',
    code: 'NETWORK.RATE_LIMITED',
    message: `${service} rate limit exceeded`,
    retryable: true,
    details: retryAfterMs !== undefined ? { service, retryAfterMs } : { service },
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { delayMs: retryAfterMs ?? 1000 } },
    ],
  });
}

export function providerTimeoutError(service: string, timeoutMs: number): TypedError {
  return createTypedError({
    kind: 'ProviderTimeout',
    code: 'NETWORK.TIMEOUT',
    message: `${service} request timed out after ${timeoutMs}ms`,
    retryable: true,
    details: { service, timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: Math.round(timeoutMs * 1.5) } },
    ],
  });
}

export function transientNetworkError(service: string, message: string, statusCode?: number): TypedError {
  return createTypedError({
    kind: 'TransientNetworkError',
    code: 'NETWORK.TRANSIENT',
    message: `${service}: ${message}`,
    retryable: true,
    details: statusCode !== undefined ? { service, statusCode } : { service },
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { delayMs: 5000 }, description: 'Transient failure. Retry after backoff.' },
    ],
  });
}

export function providerError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    kind: 'ProviderError',
    code: 'ANALYSIS.PROVIDER',
    message,
    details,
    suggestedFixes: [
      { type: 'SWITCH_PROVIDER', params: {}, description: 'Try again later or select a different inference provider' },
    ],
  });
}

export function invalidResponseError(message: string, rawPreview: string): TypedError {
  return createTypedError({
    kind: 'InvalidResponse',
    code: 'ANALYSIS.INVALID_RESPONSE',
    message,
    details: { rawResponsePreview: rawPreview.slice(0, 500) },
    suggestedFixes: [
      { type: 'CHANGE_PROMPT', params: {}, description: 'Adjust the prompt template so the model returns a JSON object' },
      { type: 'SWITCH_PROVIDER', params: {} },
    ],
  });
}

export function authError(service: string, statusCode?: number): TypedError {
  return createTypedError({
    kind: 'AuthError',
    code: 'AUTH.REJECTED',
    message: `${service} rejected the configured credential`,
    details: statusCode !== undefined ? { service, statusCode } : { service },
    suggestedFixes: [
      { type: 'CHECK_API_KEY', params: { service }, description: 'Verify the credential has the required permissions' },
    ],
  });
}

// --- Records & labels ---

export function conflictError(externalId: string, expectedVersion: number, actualVersion: number): TypedError {
  return createTypedError({
    kind: 'Conflict',
    code: 'RECORD.VERSION_CONFLICT',
    message: `Record ${externalId} is at version ${actualVersion}, expected ${expectedVersion}`,
    retryable: true,
    details: { externalId, expectedVersion, actualVersion },
    suggestedFixes: [
      { type: 'REFETCH_AND_RETRY', params: { externalId } },
    ],
  });
}

export function encodingError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    kind: 'EncodingError',
    code: 'LABEL.ENCODING',
    message,
    details,
    suggestedFixes: [
      { type: 'RAISE_MAX_VERSION', params: {}, description: 'Choose a higher-capacity label profile' },
      { type: 'LOWER_ERROR_CORRECTION', params: {} },
    ],
  });
}

// --- Jobs ---

export function duplicateJobError(captureArtifactId: string, activeJobId: string): TypedError {
  return createTypedError({
    kind: 'DuplicateJob',
    code: 'JOB.DUPLICATE',
    message: `Artifact ${captureArtifactId} already has an active job (${activeJobId})`,
    jobId: activeJobId,
    details: { captureArtifactId, activeJobId },
  });
}

/** Wraps the `lastError` of a failed Job for callers that waited on it. */
export function jobFailedError(jobId: string, cause: TypedError): TypedError {
  const during = cause.stage ? ` during ${cause.stage}` : '';
  return createTypedError({
    kind: 'JobFailed',
    code: 'JOB.FAILED',
    message: `Job ${jobId} failed${during}: ${cause.message}`,
    jobId,
    stage: cause.stage,
    details: { cause },
  });
}

export function cancelledError(jobId: string, stage?: StageName): TypedError {
  return createTypedError({
    kind: 'Cancelled',
    code: 'JOB.CANCELLED',
    message: `Job ${jobId} was cancelled`,
    jobId,
    stage,
  });
}

export function internalError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    kind: 'Internal',
    code: 'SYSTEM.INTERNAL',
    message,
    details,
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** True when `value` looks like the output of maskSecret(). */
export function isMaskedSecret(value: string): boolean {
  return /^\*{4,}[^*]{0,4}$/.test(value);
}

/**
 * Replace every occurrence of the given secrets in `message` with its
 * masked form.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex special characters in the secret
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** HTTP status for each error kind. */
const HTTP_STATUS_BY_KIND: Record<ErrorKind, number> = {
  ValidationError: 400,
  NotFound: 404,
  Conflict: 409,
  DuplicateJob: 409,
  Cancelled: 409,
  ConfigError: 422,
  EncodingError: 422,
  JobFailed: 422,
  RateLimited: 429,
  ProviderError: 502,
  InvalidResponse: 502,
  TransientNetworkError: 502,
  AuthError: 502,
  DeviceUnavailable: 503,
  ProviderTimeout: 504,
  CaptureTimeout: 504,
  PartialCapture: 500,
  Internal: 500,
};

export function httpStatusFor(kind: ErrorKind): number {
  return HTTP_STATUS_BY_KIND[kind];
}

/** Wire shape of an API error. */
export interface ApiErrorBody {
  errorKind: ErrorKind;
  code: string;
  message: string;
  retryable: boolean;
  jobId?: string;
  stage?: StageName;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: ApiErrorBody;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return {
    error: {
      errorKind: error.kind,
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      jobId: error.jobId,
      stage: error.stage,
      details: error.details,
      suggestedFixes: error.suggestedFixes,
    },
  };
}
