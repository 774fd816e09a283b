/**
 * Analysis API routes.
 *
 * GET /settings: inference settings, credential masked
 * PUT /settings: update inference settings
 * POST /: analyze a captured artifact outside any Job
 */

import { Router } from 'express';
import { ConfigStore } from '../config/config-store';
import { configSecrets } from '../config/schema';
import { CaptureService } from '../capture/capture-service';
import { AnalysisEngine } from '../analysis/analysis-engine';
import { RecordClient } from '../records/record-client';
import { analyzeRequestSchema, inferencePatchSchema } from './schemas';
import { maskCredential, parseBody, sendError, settingsPatch } from './middleware';

export function createAnalysisRoutes(
  config: ConfigStore,
  capture: CaptureService,
  analysis: AnalysisEngine,
  records: RecordClient,
): Router {
  const router = Router();
  const secrets = () => configSecrets(config.snapshot().config);

  router.get('/settings', (_req, res) => {
    res.json({ settings: maskCredential(config.section('inference')), version: config.version });
  });

  router.put('/settings', async (req, res) => {
    try {
      const patch = settingsPatch(parseBody(inferencePatchSchema, req.body));
      const version = await config.update('inference', patch);
      res.json({ settings: maskCredential(config.section('inference')), version });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.post('/', async (req, res) => {
    try {
      const body = parseBody(analyzeRequestSchema, req.body);
      const artifact = await capture.getArtifact(body.artifactId);
      const templateText = body.templateId ? await records.templateStructure(body.templateId) : undefined;
      const result = await analysis.analyze(artifact, body.prompt, undefined, {
        templateText,
        additionalPrompt: body.additionalPrompt,
      });
      res.json({ artifactId: artifact.id, result });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  return router;
}
