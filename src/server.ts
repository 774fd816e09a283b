/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import path from 'path';
import { ConfigStore } from './config/config-store';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { NotificationBus } from './notifications/bus';
import { CaptureDriver, StillImageDriver } from './capture/driver';
import { CaptureService } from './capture/capture-service';
import { AnalysisEngine } from './analysis/analysis-engine';
import { RecordClient } from './records/record-client';
import { RecordBackend } from './records/backend';
import { LabelGenerator } from './labels/label-generator';
import { PipelineOrchestrator } from './engine/orchestrator';
import { HttpFetch } from './http';
import { errorHandler } from './api/middleware';
import { createCaptureRoutes } from './api/capture';
import { createAnalysisRoutes } from './api/analysis';
import { createRecordRoutes } from './api/records';
import { createLabelRoutes } from './api/labels';
import { createJobRoutes } from './api/jobs';
import { createSystemRoutes } from './api/system';
import { createEventRoutes } from './api/events';
import { logger } from './logger';

export const VERSION = '0.1.0';

/** Application context containing all services. */
export interface AppContext {
  config: ConfigStore;
  store: Store;
  bus: NotificationBus;
  capture: CaptureService;
  analysis: AnalysisEngine;
  records: RecordClient;
  labels: LabelGenerator;
  orchestrator: PipelineOrchestrator;
  startedAt: number;
}

export interface AppContextOptions {
  config?: ConfigStore;
  store?: Store;
  bus?: NotificationBus;
  driver?: CaptureDriver;
  /** HTTP client for the inference providers. */
  fetch?: HttpFetch;
  /** Fixed record backend, bypassing `recordSystem.backend`. */
  recordBackend?: RecordBackend;
  /** HTTP client for the eLabFTW backend. */
  recordFetch?: HttpFetch;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  clock?: () => Date;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? new ConfigStore();
  const store = options.store ?? createMemoryStore();
  const bus = options.bus ?? new NotificationBus();
  const recordFetch = options.recordFetch;

  const driver = options.driver ?? new StillImageDriver({
    sourceDir: () => config.section('capture').sourceDir,
    deviceIds: () => [config.section('capture').deviceId],
  });
  const capture = new CaptureService({ config, store, bus, driver, clock: options.clock });
  const analysis = new AnalysisEngine({ config, fetch: options.fetch, sleep: options.sleep, random: options.random });
  const records = new RecordClient({
    config,
    createLog: store.createLog,
    backend: options.recordBackend,
    fetchFactory: recordFetch ? () => recordFetch : undefined,
    sleep: options.sleep,
    random: options.random,
  });
  const labels = new LabelGenerator({ config, labels: store.labels, bus, clock: options.clock });
  const orchestrator = new PipelineOrchestrator({
    config,
    store,
    bus,
    capture,
    analysis,
    records,
    labels,
    clock: options.clock,
  });

  config.subscribe((change) => {
    bus.publish({
      type: 'config.changed',
      payload: { version: change.version, section: change.section, paths: change.paths },
    });
  });

  return { config, store, bus, capture, analysis, records, labels, orchestrator, startedAt: Date.now() };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', version: VERSION, uptimeMs: Date.now() - ctx.startedAt });
  });

  app.use('/api/capture', createCaptureRoutes(ctx.config, ctx.store, ctx.capture, ctx.orchestrator));
  app.use('/api/analysis', createAnalysisRoutes(ctx.config, ctx.capture, ctx.analysis, ctx.records));
  app.use('/api/records', createRecordRoutes(ctx.config, ctx.records));
  app.use('/api/labels', createLabelRoutes(ctx.labels));
  app.use('/api/jobs', createJobRoutes(ctx.config, ctx.orchestrator));
  app.use('/api/events', createEventRoutes(ctx.bus));
  app.use('/api/system', createSystemRoutes({
    config: ctx.config,
    capture: ctx.capture,
    analysis: ctx.analysis,
    records: ctx.records,
    orchestrator: ctx.orchestrator,
    bus: ctx.bus,
    startedAt: ctx.startedAt,
    version: VERSION,
  }));

  app.use(errorHandler);

  return app;
}

/** Resolve the configuration file from `LAB_INTAKE_CONFIG` or the working directory. */
export function configPathFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(env.LAB_INTAKE_CONFIG ?? 'config.json');
}

/**
 * Load configuration and build the context. With `capture.autoStart` a
 * first capture is taken and submitted.
 */
export async function bootstrap(options: AppContextOptions & { configPath?: string } = {}): Promise<AppContext> {
  const config = options.config ?? new ConfigStore({ filePath: options.configPath ?? configPathFromEnv() });
  await config.load();
  const ctx = createAppContext({ ...options, config });

  if (config.section('capture').autoStart) {
    try {
      const { artifact, job } = await ctx.orchestrator.captureAndProcess();
      logger.info('Startup capture submitted', { artifactId: artifact.id, jobId: job.id });
    } catch (err) {
      logger.warn('Startup capture failed', { error: err instanceof Error ? err.message : String(err) });
    }
  }
  return ctx;
}
