/**
 * API middleware: body validation, query parsing and error responses.
 */

import { NextFunction, Request, Response } from 'express';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import {
  PipelineError,
  apiError,
  httpStatusFor,
  isMaskedSecret,
  jobFailedError,
  maskSecret,
  toTypedError,
  validationError,
} from '../domain/errors';
import { Job, JobStatus } from '../domain/job';
import { logger } from '../logger';

const log = logger.child({ module: 'api' });

function firstIssue(error: ZodError): { field: string; reason: string } {
  const issue = error.issues[0];
  return issue
    ? { field: issue.path.join('.'), reason: issue.message }
    : { field: '', reason: 'Invalid request' };
}

/** Validate a request body, raising ValidationError on the first issue. */
export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const { field, reason } = firstIssue(parsed.error);
    throw new PipelineError(validationError(field, reason));
  }
  return parsed.data;
}

/** Read a string query parameter; repeated parameters take the first value. */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (typeof value === 'string') return value || undefined;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0] || undefined;
  return undefined;
}

/** Read a non-negative integer query parameter, clamped to `max`. */
export function queryInt(req: Request, name: string, fallback: number, max = 1000): number {
  const raw = queryString(req, name);
  if (raw === undefined) return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new PipelineError(validationError(name, 'must be a non-negative integer'));
  }
  return Math.min(value, max);
}

/** Send the apiError() body with the status for its kind. */
export function sendError(res: Response, err: unknown, secrets: string[] = []): void {
  const typed = toTypedError(err, secrets);
  const status = httpStatusFor(typed.kind);
  if (status >= 500) {
    log.error('Request failed', { code: typed.code, errorKind: typed.kind, status, message: typed.message });
  } else {
    log.warn('Request error', { code: typed.code, errorKind: typed.kind, status });
  }
  res.status(status).json(apiError(typed));
}

/**
 * Respond to a submit. A Job that was waited on and failed is answered
 * with a JobFailed error alongside the Job, so the failing stage is visible.
 */
export function sendSubmitted<T extends { job: Job }>(res: Response, payload: T): void {
  const { job } = payload;
  if (job.status === JobStatus.Failed && job.lastError) {
    const failure = jobFailedError(job.id, job.lastError);
    res.status(httpStatusFor(failure.kind)).json({ ...apiError(failure), ...payload });
    return;
  }
  res.status(201).json(payload);
}

/** Replace a non-empty credential with its masked form. */
export function maskCredential<T extends { credential: string }>(settings: T): T {
  return { ...settings, credential: settings.credential ? maskSecret(settings.credential) : '' };
}

/**
 * Keys of a settings update that should be written. A credential echoed
 * back in masked form keeps the stored secret.
 */
export function settingsPatch(patch: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    if (key === 'credential' && typeof value === 'string' && isMaskedSecret(value)) continue;
    out[key] = value;
  }
  return out;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof SyntaxError) {
    sendError(res, new PipelineError(validationError('body', 'Malformed JSON')));
    return;
  }
  sendError(res, err);
}
