/**
 * Label API routes.
 *
 * POST /: generate a label for a record
 * GET /: list labels (optionally by externalId)
 * GET /:id: label metadata; GET /:id/image: the PNG
 * DELETE /:id: remove label and PNG
 */

import { Router } from 'express';
import { LabelGenerator } from '../labels/label-generator';
import { generateLabelSchema } from './schemas';
import { parseBody, queryInt, queryString, sendError } from './middleware';

export function createLabelRoutes(labels: LabelGenerator): Router {
  const router = Router();

  router.post('/', async (req, res) => {
    try {
      const { externalId, title, ...profile } = parseBody(generateLabelSchema, req.body);
      const label = await labels.generate(externalId, profile, { title });
      res.status(201).json({ label });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/', async (req, res) => {
    try {
      res.json(await labels.list({
        externalId: queryString(req, 'externalId'),
        limit: queryInt(req, 'limit', 100),
        offset: queryInt(req, 'offset', 0, Number.MAX_SAFE_INTEGER),
      }));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:id', async (req, res) => {
    try {
      res.json({ label: await labels.get(req.params.id) });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:id/image', async (req, res) => {
    try {
      const label = await labels.get(req.params.id);
      res.type('png').sendFile(label.imagePath);
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete('/:id', async (req, res) => {
    try {
      await labels.delete(req.params.id);
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
