/**
 * System API routes.
 *
 * GET /status: health of every component
 * GET /logs: recent log entries
 * GET /config: current configuration, credentials masked
 * PUT /config: set one value by dotted path
 */

import { Router } from 'express';
import { ConfigStore } from '../config/config-store';
import { Configuration, configSecrets } from '../config/schema';
import { PipelineError, validationError } from '../domain/errors';
import { CaptureService } from '../capture/capture-service';
import { AnalysisEngine } from '../analysis/analysis-engine';
import { RecordClient } from '../records/record-client';
import { PipelineOrchestrator } from '../engine/orchestrator';
import { NotificationBus } from '../notifications/bus';
import { getRecentLogs, parseLogLevel } from '../logger';
import { configSetSchema } from './schemas';
import { maskCredential, parseBody, queryInt, queryString, sendError } from './middleware';

export interface SystemRouteDeps {
  config: ConfigStore;
  capture: CaptureService;
  analysis: AnalysisEngine;
  records: RecordClient;
  orchestrator: PipelineOrchestrator;
  bus: NotificationBus;
  startedAt: number;
  version: string;
}

function maskedConfig(config: Configuration): Configuration {
  return {
    ...config,
    inference: maskCredential(config.inference),
    recordSystem: maskCredential(config.recordSystem),
  };
}

export function createSystemRoutes(deps: SystemRouteDeps): Router {
  const router = Router();
  const { config } = deps;
  const secrets = () => configSecrets(config.snapshot().config);

  router.get('/status', async (_req, res) => {
    try {
      const inference = config.section('inference');
      const [capture, recordSystem] = await Promise.all([deps.capture.status(), deps.records.ping()]);
      res.json({
        status: recordSystem.reachable ? 'ok' : 'degraded',
        version: deps.version,
        uptimeMs: Date.now() - deps.startedAt,
        configVersion: config.version,
        capture,
        analysis: {
          providerId: inference.providerId,
          model: inference.model,
          credentialConfigured: inference.credential.length > 0 || inference.providerId === 'ollama',
          concurrency: deps.analysis.concurrency(),
        },
        recordSystem,
        pipeline: deps.orchestrator.status(),
        events: { subscribers: deps.bus.subscriberCount, lastSeq: deps.bus.lastSeq },
      });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.get('/logs', (req, res) => {
    try {
      const limit = queryInt(req, 'limit', 100, 1000);
      const rawLevel = queryString(req, 'level');
      const level = parseLogLevel(rawLevel);
      if (rawLevel && !level) {
        throw new PipelineError(validationError('level', 'must be one of debug, info, warn, error'));
      }
      res.json({ logs: getRecentLogs(limit, level) });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.get('/config', (_req, res) => {
    const snapshot = config.snapshot();
    res.json({ version: snapshot.version, config: maskedConfig(snapshot.config) });
  });

  router.put('/config', async (req, res) => {
    try {
      const body = parseBody(configSetSchema, req.body);
      const version = await config.set(body.path, body.value);
      res.json({ version, config: maskedConfig(config.snapshot().config) });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  return router;
}
