import { promises as fs } from 'fs';
import path from 'path';
import { ConfigStore } from '../../src/config/config-store';
import { CaptureArtifact } from '../../src/domain/artifact';
import { PipelineError } from '../../src/domain/errors';
import { PipelineEvent } from '../../src/domain/events';
import { Job, JobStatus } from '../../src/domain/job';
import { HttpFetch } from '../../src/http';
import { MemoryRecordBackend } from '../../src/records/memory-backend';
import { AppContext, createAppContext } from '../../src/server';
import { resetLogHandler } from '../../src/logger';
import {
  collectLogs,
  drain,
  gatedFetch,
  makeTempDir,
  midRandom,
  noSleep,
  openAiReply,
  removeDir,
  scriptedFetch,
  textResponse,
  waitFor,
  writeSourceImage,
} from '../helpers';

const CENTRIFUGE = '{"name":"Centrifuge","serial":"X123"}';
const NOW = '2026-10-18T09:30:15.000Z';

describe('PipelineOrchestrator', () => {
  let dir: string;
  let backend: MemoryRecordBackend;

  beforeEach(async () => {
    dir = await makeTempDir();
    backend = new MemoryRecordBackend({ idPrefix: 'rec-', startId: 42 });
  });

  afterEach(async () => {
    resetLogHandler();
    await removeDir(dir);
  });

  function context(fetch: HttpFetch, overrides: Record<string, Record<string, unknown>> = {}): AppContext {
    const config = new ConfigStore({
      initial: {
        inference: { credential: 'test-secret', model: 'gpt-4o', maxRetries: 2, ...overrides['inference'] },
        recordSystem: { baseUrl: 'https://elab.test/api/v2', ...overrides['recordSystem'] },
        capture: { deviceId: 'cam-1', sourceDir: path.join(dir, 'source') },
        storage: { imagesDir: path.join(dir, 'images'), labelsDir: path.join(dir, 'labels'), ...overrides['storage'] },
        pipeline: { ...overrides['pipeline'] },
        label: { ...overrides['label'] },
      },
    });
    return createAppContext({
      config,
      fetch,
      recordBackend: backend,
      sleep: noSleep,
      random: midRandom,
      clock: () => new Date(NOW),
    });
  }

  async function seedArtifact(ctx: AppContext, id = 'img-1', sha256 = `sha-${id}`): Promise<CaptureArtifact> {
    const imagePath = await writeSourceImage(path.join(dir, 'images'), `${id}.png`);
    const artifact: CaptureArtifact = {
      id,
      deviceId: 'cam-1',
      imagePath,
      resolution: { width: 640, height: 480 },
      capturedAt: NOW,
      mimeType: 'image/png',
      byteLength: 14,
      sha256,
    };
    await ctx.store.artifacts.create(artifact);
    return artifact;
  }

  function jobEvents(ctx: AppContext, jobId: string): PipelineEvent[] {
    return ctx.bus.recent(100, { jobId });
  }

  it('runs a captured artifact through to a labeled record', async () => {
    const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
    const ctx = context(fetch);
    await seedArtifact(ctx);

    const submitted = await ctx.orchestrator.submit('img-1');
    expect(submitted.status).toBe(JobStatus.Pending);
    expect(submitted.stage).toBeNull();

    const job = await ctx.orchestrator.run(submitted.id);

    expect(job.status).toBe(JobStatus.Completed);
    expect(job.completedAt).toBe(NOW);
    expect(job.analysis?.attributes).toEqual({ name: 'Centrifuge', serial: 'X123' });
    expect(job.record?.externalId).toBe('rec-42');
    expect(job.record?.recordVersion).toBe(2);
    expect(job.record?.status).toBe('registered');
    expect(job.label?.externalId).toBe('rec-42');
    expect(job.label?.payload).toBe('https://elab.test/database.php?mode=view&id=rec-42');
    expect(job.label?.imagePath).toBe(path.join(dir, 'labels', 'Centrifuge_rec-42.png'));
    expect(job.attemptCounts).toEqual({ analysis: 1, registration: 1, labeling: 1 });
    expect(job.history.map((t) => t.to)).toEqual([
      JobStatus.Analyzing,
      JobStatus.Analyzed,
      JobStatus.Registering,
      JobStatus.Registered,
      JobStatus.Labeling,
      JobStatus.Completed,
    ]);

    const stored = await ctx.store.jobs.getById(job.id);
    expect(stored?.status).toBe(JobStatus.Completed);

    const record = await ctx.records.get('rec-42');
    expect(record.title).toBe('Centrifuge');
    expect(record.recordVersion).toBe(2);
    expect(backend.createCalls).toBe(1);
    expect(backend.uploads.map((u) => u.name)).toEqual(['img-1.png']);

    expect(jobEvents(ctx, job.id).map((e) => e.type)).toEqual([
      'job.created',
      'job.transitioned',
      'job.transitioned',
      'job.transitioned',
      'job.transitioned',
      'job.transitioned',
      'label.generated',
      'job.transitioned',
      'job.completed',
    ]);
    expect(ctx.orchestrator.status().activeJobs).toBe(0);
  });

  it('fails the job with ProviderError after exhausting rate-limit retries', async () => {
    const { fetch, calls } = scriptedFetch([textResponse(429, 'slow down')]);
    const ctx = context(fetch);
    await seedArtifact(ctx);

    const { id } = await ctx.orchestrator.submit('img-1');
    const job = await ctx.orchestrator.run(id);

    expect(calls).toHaveLength(3);
    expect(job.status).toBe(JobStatus.Failed);
    expect(job.stage).toBe('analysis');
    expect(job.lastError?.kind).toBe('ProviderError');
    expect(job.lastError?.jobId).toBe(id);
    expect(job.lastError?.stage).toBe('analysis');
    expect(job.record).toBeUndefined();
    expect(backend.size).toBe(0);

    const failed = jobEvents(ctx, id).find((e) => e.type === 'job.failed');
    expect(failed?.payload).toEqual({
      stage: 'analysis',
      errorKind: 'ProviderError',
      code: 'ANALYSIS.PROVIDER',
      message: 'OpenAI failed after 3 attempts: OpenAI rate limit exceeded',
    });
  });

  it('allows a fresh job once the previous one is terminal', async () => {
    const { fetch } = scriptedFetch([textResponse(401, 'no')]);
    const ctx = context(fetch);
    await seedArtifact(ctx);

    const first = await ctx.orchestrator.run((await ctx.orchestrator.submit('img-1')).id);
    expect(first.status).toBe(JobStatus.Failed);
    expect(first.lastError?.kind).toBe('AuthError');

    await expect(ctx.orchestrator.submit('img-1')).resolves.toMatchObject({ status: JobStatus.Pending });
  });

  it('admits one job per artifact under concurrent submits', async () => {
    const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
    const ctx = context(fetch);
    await seedArtifact(ctx);

    const results = await Promise.allSettled([ctx.orchestrator.submit('img-1'), ctx.orchestrator.submit('img-1')]);

    const fulfilled = results.filter((r): r is PromiseFulfilledResult<Job> => r.status === 'fulfilled');
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    const reason: unknown = rejected[0]?.reason;
    expect(reason).toBeInstanceOf(PipelineError);
    if (reason instanceof PipelineError) {
      expect(reason.kind).toBe('DuplicateJob');
      expect(reason.typedError.details).toEqual({ captureArtifactId: 'img-1', activeJobId: fulfilled[0]?.value.id });
    }
    expect((await ctx.orchestrator.list()).total).toBe(1);
  });

  it('deduplicates by image content when enabled', async () => {
    const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
    const ctx = context(fetch, { pipeline: { dedupByContent: true } });
    await seedArtifact(ctx, 'img-1', 'same-bytes');
    await seedArtifact(ctx, 'img-2', 'same-bytes');

    await ctx.orchestrator.submit('img-1');
    await expect(ctx.orchestrator.submit('img-2')).rejects.toMatchObject({ kind: 'DuplicateJob' });
  });

  it('raises NotFound for an unknown artifact', async () => {
    const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
    await expect(context(fetch).orchestrator.submit('img-404')).rejects.toMatchObject({ kind: 'NotFound' });
  });

  it('refuses a second run of a running job', async () => {
    const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
    const ctx = context(fetch);
    await seedArtifact(ctx);
    const { id } = await ctx.orchestrator.submit('img-1');

    const first = ctx.orchestrator.run(id);
    await expect(ctx.orchestrator.run(id)).rejects.toMatchObject({ kind: 'DuplicateJob', typedError: { code: 'JOB.ALREADY_RUNNING' } });
    await expect(first).resolves.toMatchObject({ status: JobStatus.Completed });
  });

  it('re-reads and retries registration after a version conflict', async () => {
    const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
    const ctx = context(fetch);
    const artifact = await seedArtifact(ctx);
    backend.seed({
      id: 'rec-42',
      title: 'Centrifuge',
      body: '',
      categoryId: '1',
      tags: [],
      metadata: { intake: { version: 4, attributes: {}, status: 'registered' } },
    });

    const job: Job = {
      id: 'job_resume',
      captureArtifactId: artifact.id,
      status: JobStatus.Analyzed,
      stage: 'analysis',
      attemptCounts: { analysis: 1, registration: 0, labeling: 0 },
      history: [],
      analysis: {
        attributes: { name: 'Centrifuge', serial: 'X123' },
        confidence: 1,
        rawProviderOutput: CENTRIFUGE,
        providerId: 'openai',
        model: 'gpt-4o',
        analyzedAt: NOW,
        attempts: 1,
      },
      record: {
        externalId: 'rec-42',
        title: 'Centrifuge',
        body: '',
        categoryId: '1',
        attributes: {},
        status: 'draft',
        recordVersion: 3,
        tags: [],
      },
      options: {},
      cancelRequested: false,
      createdAt: NOW,
      updatedAt: NOW,
    };
    await ctx.store.jobs.create(job);

    const done = await ctx.orchestrator.run(job.id);

    expect(done.status).toBe(JobStatus.Completed);
    expect(done.record?.recordVersion).toBe(5);
    expect((await ctx.records.get('rec-42')).recordVersion).toBe(5);
    expect(backend.createCalls).toBe(0);
  });

  it('fails with Conflict once conflict retries are spent', async () => {
    const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
    const ctx = context(fetch, { recordSystem: { maxConflictRetries: 0 } });
    await seedArtifact(ctx);
    const { id } = await ctx.orchestrator.submit('img-1');

    // Another writer bumps the record between create and the first update
    const update = ctx.records.update.bind(ctx.records);
    let bumped = false;
    ctx.records.update = async (externalId, fields, expectedVersion) => {
      if (!bumped) {
        bumped = true;
        await update(externalId, { title: 'Edited elsewhere' }, expectedVersion);
      }
      return update(externalId, fields, expectedVersion);
    };

    const job = await ctx.orchestrator.run(id);
    expect(job.status).toBe(JobStatus.Failed);
    expect(job.stage).toBe('registration');
    expect(job.lastError?.kind).toBe('Conflict');
    expect(job.record?.externalId).toBe('rec-42');
  });

  it('reports partial progress when labeling fails', async () => {
    const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
    const ctx = context(fetch);
    await seedArtifact(ctx);
    const { id } = await ctx.orchestrator.submit('img-1', { labelProfile: { maxVersion: 1, errorCorrectionLevel: 'H' } });

    const job = await ctx.orchestrator.run(id);

    expect(job.status).toBe(JobStatus.Failed);
    expect(job.stage).toBe('labeling');
    expect(job.lastError?.kind).toBe('EncodingError');
    expect(job.record?.externalId).toBe('rec-42');
    expect(job.label).toBeUndefined();
    expect((await ctx.labels.list()).total).toBe(0);
  });

  describe('cancel', () => {
    it('fails a job that is not running', async () => {
      const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
      const ctx = context(fetch);
      await seedArtifact(ctx);
      const { id } = await ctx.orchestrator.submit('img-1');

      const job = await ctx.orchestrator.cancel(id);

      expect(job.status).toBe(JobStatus.Failed);
      expect(job.cancelRequested).toBe(true);
      expect(job.lastError?.kind).toBe('Cancelled');
      expect(jobEvents(ctx, id).map((e) => e.type)).toEqual([
        'job.created',
        'job.cancel_requested',
        'job.transitioned',
        'job.failed',
      ]);
    });

    it('discards an in-flight result and stops at the stage boundary', async () => {
      let jobId = '';
      let ctx: AppContext | undefined;
      const { fetch } = scriptedFetch([
        async () => {
          if (ctx) await ctx.orchestrator.cancel(jobId);
          return openAiReply(CENTRIFUGE);
        },
      ]);
      ctx = context(fetch);
      await seedArtifact(ctx);
      jobId = (await ctx.orchestrator.submit('img-1')).id;

      const job = await ctx.orchestrator.run(jobId);

      expect(job.status).toBe(JobStatus.Failed);
      expect(job.lastError?.kind).toBe('Cancelled');
      expect(job.lastError?.stage).toBe('analysis');
      expect(job.analysis).toBeUndefined();
      expect(backend.size).toBe(0);
    });

    it('leaves a terminal job unchanged', async () => {
      const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
      const ctx = context(fetch);
      await seedArtifact(ctx);
      const done = await ctx.orchestrator.run((await ctx.orchestrator.submit('img-1')).id);

      const after = await ctx.orchestrator.cancel(done.id);
      expect(after.status).toBe(JobStatus.Completed);
      expect(after.cancelRequested).toBe(false);
    });
  });

  it('captures and processes in one call', async () => {
    const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
    const ctx = context(fetch);
    await writeSourceImage(path.join(dir, 'source'), 'frame.png');

    const { artifact, job } = await ctx.orchestrator.captureAndProcess({ wait: true });

    expect(artifact.deviceId).toBe('cam-1');
    expect(job.captureArtifactId).toBe(artifact.id);
    expect(job.status).toBe(JobStatus.Completed);
  });

  it('reports worker status', async () => {
    const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
    const ctx = context(fetch, { pipeline: { workerLimit: 3 } });
    await seedArtifact(ctx);
    await ctx.orchestrator.submit('img-1');
    expect(ctx.orchestrator.status()).toEqual({ workerLimit: 3, runningJobs: 0, queuedJobs: 0, activeJobs: 1 });
  });

  it('runs at most workerLimit jobs at once', async () => {
    const gate = gatedFetch(() => openAiReply(CENTRIFUGE));
    const ctx = context(gate.fetch, { pipeline: { workerLimit: 2 }, inference: { maxConcurrent: 10 } });
    const ids: string[] = [];
    for (const artifactId of ['img-1', 'img-2', 'img-3']) {
      await seedArtifact(ctx, artifactId);
      ids.push((await ctx.orchestrator.submit(artifactId)).id);
    }

    const runs = Promise.all(ids.map((id) => ctx.orchestrator.run(id)));
    await waitFor(() => gate.waiting() === 2);
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(gate.waiting()).toBe(2);
    expect(ctx.orchestrator.status()).toEqual({ workerLimit: 2, runningJobs: 2, queuedJobs: 1, activeJobs: 3 });

    const jobs = await drain(runs, gate);
    expect(jobs.map((job) => job.status)).toEqual([JobStatus.Completed, JobStatus.Completed, JobStatus.Completed]);
    expect(gate.peak()).toBe(2);
    expect(ctx.orchestrator.status().activeJobs).toBe(0);
  });

  describe('image retention', () => {
    it('keeps the capture image by default', async () => {
      const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
      const ctx = context(fetch);
      const artifact = await seedArtifact(ctx);

      await ctx.orchestrator.run((await ctx.orchestrator.submit('img-1')).id);

      await expect(ctx.store.artifacts.getById('img-1')).resolves.toEqual(artifact);
      await expect(fs.readFile(artifact.imagePath, 'utf8')).resolves.toBe('fake-png-bytes');
    });

    it('archives the image once the job completes', async () => {
      const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
      const archiveDir = path.join(dir, 'archive');
      const ctx = context(fetch, { storage: { imageRetention: 'archive', archiveDir } });
      const artifact = await seedArtifact(ctx);

      const job = await ctx.orchestrator.run((await ctx.orchestrator.submit('img-1')).id);

      expect(job.status).toBe(JobStatus.Completed);
      expect(backend.uploads.map((u) => u.name)).toEqual(['img-1.png']);
      const archived = await ctx.store.artifacts.getById('img-1');
      expect(archived?.imagePath).toBe(path.join(archiveDir, 'img-1.png'));
      expect(archived?.archivedAt).toBe(NOW);
      await expect(fs.readFile(path.join(archiveDir, 'img-1.png'), 'utf8')).resolves.toBe('fake-png-bytes');
      await expect(fs.access(artifact.imagePath)).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('deletes the image and artifact once the job fails', async () => {
      const { fetch } = scriptedFetch([textResponse(429, 'slow down')]);
      const ctx = context(fetch, { storage: { imageRetention: 'delete' } });
      const artifact = await seedArtifact(ctx);

      const job = await ctx.orchestrator.run((await ctx.orchestrator.submit('img-1')).id);

      expect(job.status).toBe(JobStatus.Failed);
      await expect(ctx.store.artifacts.getById('img-1')).resolves.toBeNull();
      await expect(fs.access(artifact.imagePath)).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('logs a retention failure without changing the terminal job', async () => {
      const logs = collectLogs();
      const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
      const ctx = context(fetch, { storage: { imageRetention: 'archive', archiveDir: path.join(dir, 'archive') } });
      const artifact = await seedArtifact(ctx);
      await fs.rm(artifact.imagePath);
      const { id } = await ctx.orchestrator.submit('img-1');

      const job = await ctx.orchestrator.cancel(id);

      expect(job.status).toBe(JobStatus.Failed);
      expect(job.lastError?.kind).toBe('Cancelled');
      expect((await ctx.store.jobs.getById(id))?.status).toBe(JobStatus.Failed);
      const warning = logs.find((entry) => entry.message === 'Capture image retention failed');
      expect(warning?.context).toMatchObject({ jobId: id, captureArtifactId: 'img-1' });
      expect((await ctx.store.artifacts.getById('img-1'))?.archivedAt).toBeUndefined();
    });
  });

  it('filters the job list by status', async () => {
    const { fetch } = scriptedFetch([openAiReply(CENTRIFUGE)]);
    const ctx = context(fetch);
    await seedArtifact(ctx, 'img-1');
    await seedArtifact(ctx, 'img-2');
    await ctx.orchestrator.run((await ctx.orchestrator.submit('img-1')).id);
    await ctx.orchestrator.submit('img-2');

    const pending = await ctx.orchestrator.list({ status: JobStatus.Pending });
    expect(pending.items.map((job) => job.captureArtifactId)).toEqual(['img-2']);
  });
});
