/**
 * Event API routes.
 *
 * GET /stream: Server-Sent Events, filtered by `jobId` and `types`
 * GET /: recent events from the replay buffer
 */

import { Router, Request } from 'express';
import { PipelineEvent, PipelineEventType, isPipelineEventType } from '../domain/events';
import { PipelineError, validationError } from '../domain/errors';
import { EventFilter, NotificationBus } from '../notifications/bus';
import { logger } from '../logger';
import { queryInt, queryString, sendError } from './middleware';

const log = logger.child({ module: 'events' });

function parseFilter(req: Request): EventFilter {
  const rawTypes = queryString(req, 'types');
  let types: PipelineEventType[] | undefined;
  if (rawTypes) {
    types = [];
    for (const candidate of rawTypes.split(',').map((t) => t.trim()).filter((t) => t.length > 0)) {
      if (!isPipelineEventType(candidate)) {
        throw new PipelineError(validationError('types', `unknown event type "${candidate}"`));
      }
      types.push(candidate);
    }
  }
  return { jobId: queryString(req, 'jobId'), types };
}

function formatSse(event: PipelineEvent): string {
  return `id: ${event.seq}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

export function createEventRoutes(bus: NotificationBus): Router {
  const router = Router();

  router.get('/stream', async (req, res) => {
    let filter: EventFilter;
    try {
      filter = parseFilter(req);
    } catch (err) {
      sendError(res, err);
      return;
    }

    const stream = bus.subscribe(filter);
    req.on('close', () => stream.close());

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    // Replay what a reconnecting client missed, when still buffered
    const lastEventId = Number(req.header('last-event-id'));
    if (Number.isInteger(lastEventId) && lastEventId > 0) {
      for (const event of bus.recent(Number.MAX_SAFE_INTEGER, filter)) {
        if (event.seq > lastEventId) res.write(formatSse(event));
      }
    }
    res.write(`: subscribed ${stream.id}\n\n`);

    try {
      for await (const event of stream) {
        res.write(formatSse(event));
      }
      if (stream.dropped) {
        res.write(`event: dropped\ndata: ${JSON.stringify({ lastSeq: bus.lastSeq })}\n\n`);
      }
    } catch (err) {
      log.warn('Event stream ended with an error', {
        subscriberId: stream.id,
        error: err instanceof Error ? err.message : String(err),
      });
    } finally {
      stream.close();
      res.end();
    }
  });

  router.get('/', (req, res) => {
    try {
      const filter = parseFilter(req);
      const events = bus.recent(queryInt(req, 'limit', 50, 1000), filter);
      res.json({ events, lastSeq: bus.lastSeq });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
