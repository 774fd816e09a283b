/**
 * Record API routes.
 *
 * GET /settings, PUT /settings: record-system settings, credential masked
 * GET /templates: record templates; GET /templates/:id: template text
 * GET /: list records; POST /: create (idempotent per key)
 * GET /:id: one record; PATCH /:id: versioned update
 */

import { Router } from 'express';
import { ConfigStore } from '../config/config-store';
import { configSecrets } from '../config/schema';
import { AssetRecord, RecordFields } from '../domain/record';
import { toAttributes } from '../domain/values';
import { RecordClient } from '../records/record-client';
import { renderRecordBody } from '../records/body';
import { createRecordSchema, recordSystemPatchSchema, updateRecordSchema } from './schemas';
import { maskCredential, parseBody, queryInt, queryString, sendError, settingsPatch } from './middleware';

export function createRecordRoutes(config: ConfigStore, records: RecordClient): Router {
  const router = Router();
  const secrets = () => configSecrets(config.snapshot().config);

  router.get('/settings', (_req, res) => {
    res.json({ settings: maskCredential(config.section('recordSystem')), version: config.version });
  });

  router.put('/settings', async (req, res) => {
    try {
      const patch = settingsPatch(parseBody(recordSystemPatchSchema, req.body));
      const version = await config.update('recordSystem', patch);
      res.json({ settings: maskCredential(config.section('recordSystem')), version });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.get('/templates', async (_req, res) => {
    try {
      res.json({ templates: await records.listTemplates() });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.get('/templates/:id', async (req, res) => {
    try {
      res.json({ templateId: req.params.id, structure: await records.templateStructure(req.params.id) });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.get('/', async (req, res) => {
    try {
      const summaries = await records.list({
        query: queryString(req, 'q'),
        categoryId: queryString(req, 'category'),
        limit: queryInt(req, 'limit', 20, 100),
        offset: queryInt(req, 'offset', 0, Number.MAX_SAFE_INTEGER),
      });
      res.json({ records: summaries });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.post('/', async (req, res) => {
    try {
      const body = parseBody(createRecordSchema, req.body);
      const attributes = toAttributes(body.attributes);
      const record: AssetRecord = {
        externalId: null,
        title: body.title,
        body: body.body ?? renderRecordBody(attributes),
        categoryId: body.categoryId ?? config.section('recordSystem').defaultCategory,
        attributes,
        status: 'registered',
        recordVersion: 1,
        tags: body.tags,
      };
      const externalId = await records.create(record, body.idempotencyKey);
      res.status(201).json({ externalId, record: await records.get(externalId) });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.get('/:id', async (req, res) => {
    try {
      res.json({ record: await records.get(req.params.id) });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  router.patch('/:id', async (req, res) => {
    try {
      const body = parseBody(updateRecordSchema, req.body);
      const attributes = body.attributes ? toAttributes(body.attributes) : undefined;
      const fields: RecordFields = {
        title: body.title,
        body: body.body ?? (attributes ? renderRecordBody(attributes) : undefined),
        attributes,
        status: body.status,
        tags: body.tags,
      };
      const recordVersion = await records.update(req.params.id, fields, body.expectedVersion);
      res.json({ externalId: req.params.id, recordVersion });
    } catch (err) {
      sendError(res, err, secrets());
    }
  });

  return router;
}
