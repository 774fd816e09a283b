/**
 * Job API routes.
 *
 * POST /: submit a captured artifact as a Job
 * GET /: list Jobs; GET /:id: one Job
 * POST /:id/cancel: request cooperative cancellation
 */

import { Router } from 'express';
import { ConfigStore } from '../config/config-store';
import { configSecrets } from '../config/schema';
import { JobStatus } from '../domain/job';
import { PipelineError, validationError } from '../domain/errors';
import { PipelineOrchestrator } from '../engine/orchestrator';
import { submitJobSchema } from './schemas';
import { parseBody, queryInt, queryString, sendError, sendSubmitted } from './middleware';

function parseStatus(value: string | undefined): JobStatus | undefined {
  if (value === undefined) return undefined;
  const status = Object.values(JobStatus).find((candidate) => candidate === value);
  if (!status) {
    throw new PipelineError(validationError('status', `must be one of ${Object.values(JobStatus).join(', ')}`));
  }
  return status;
}

export function createJobRoutes(config: ConfigStore, orchestrator: PipelineOrchestrator): Router {
  const router = Router();
  const secrets = () => configSecrets(config.snapshot().config);

  router.post('/', async (req, res) => {
    try {
      const body = parseBody(submitJobSchema, req.body);
      const job = await orchestrator.submit(body.captureArtifactId, body.options);
      if (body.wait) {
        sendSubmitted(res, { job: await orchestrator.run(job.id) });
        return;
      }
      orchestrator.start(job.id);
      res.status(201).json({ job });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.get('/', async (req, res) => {
    try {
      res.json(await orchestrator.list({
        status: parseStatus(queryString(req, 'status')),
        captureArtifactId: queryString(req, 'captureArtifactId'),
        limit: queryInt(req, 'limit', 100),
        offset: queryInt(req, 'offset', 0, Number.MAX_SAFE_INTEGER),
      }));
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.get('/:id', async (req, res) => {
    try {
      res.json({ job: await orchestrator.get(req.params.id) });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.post('/:id/cancel', async (req, res) => {
    try {
      res.json({ job: await orchestrator.cancel(req.params.id) });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  return router;
}
