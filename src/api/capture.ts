/**
 * Capture API routes.
 *
 * GET /status: device presence and busy flags
 * POST /: capture an image, optionally submitting it as a Job
 * GET /artifacts: list captured artifacts
 * GET /artifacts/:id: one artifact
 */

import { Router } from 'express';
import { ConfigStore } from '../config/config-store';
import { configSecrets } from '../config/schema';
import { CaptureService } from '../capture/capture-service';
import { PipelineOrchestrator } from '../engine/orchestrator';
import { Store } from '../storage/store';
import { captureRequestSchema } from './schemas';
import { parseBody, queryInt, sendError, sendSubmitted } from './middleware';

export function createCaptureRoutes(
  config: ConfigStore,
  store: Store,
  capture: CaptureService,
  orchestrator: PipelineOrchestrator,
): Router {
  const router = Router();
  const secrets = () => configSecrets(config.snapshot().config);

  router.get('/status', async (_req, res) => {
    try {
      res.json(await capture.status());
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.post('/', async (req, res) => {
    try {
      const body = parseBody(captureRequestSchema, req.body);
      if (body.process) {
        const result = await orchestrator.captureAndProcess({
          deviceId: body.deviceId,
          resolution: body.resolution,
          timeoutMs: body.timeoutMs,
          options: body.options,
          wait: body.wait,
        });
        sendSubmitted(res, result);
        return;
      }
      const artifact = await capture.capture(body.deviceId, body.resolution, body.timeoutMs);
      res.status(201).json({ artifact });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.get('/artifacts', async (req, res) => {
    try {
      const limit = queryInt(req, 'limit', 100);
      const offset = queryInt(req, 'offset', 0, Number.MAX_SAFE_INTEGER);
      res.json(await store.artifacts.list({ limit, offset }));
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.get('/artifacts/:id', async (req, res) => {
    try {
      res.json({ artifact: await capture.getArtifact(req.params.id) });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  return router;
}
