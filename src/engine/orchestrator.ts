/**
 * PipelineOrchestrator: drives Jobs through analysis, registration and
 * labeling.
 *
 * A Job runs its stages strictly in order; each stage's output is persisted
 * before the next stage starts, so a Job read back from the store can be
 * resumed from its last status. Distinct Jobs run concurrently up to
 * `pipeline.workerLimit`.
 */

import { v4 as uuid } from 'uuid';
import { AnalysisResult } from '../domain/analysis';
import { CaptureArtifact, Resolution } from '../domain/artifact';
import {
  PipelineError,
  TypedError,
  cancelledError,
  createTypedError,
  duplicateJobError,
  internalError,
  isErrorKind,
  notFoundError,
  toTypedError,
  validationError,
} from '../domain/errors';
import { Job, JobFilter, JobOptions, JobStage, JobStatus } from '../domain/job';
import { AssetRecord } from '../domain/record';
import { Label } from '../domain/label';
import { ConfigStore } from '../config/config-store';
import { configSecrets } from '../config/schema';
import { Store, ListResult } from '../storage/store';
import { NotificationBus } from '../notifications/bus';
import { CaptureService } from '../capture/capture-service';
import { AnalysisEngine } from '../analysis/analysis-engine';
import { RecordClient } from '../records/record-client';
import { recordTags, recordTitle, renderRecordBody } from '../records/body';
import { LabelGenerator } from '../labels/label-generator';
import { Semaphore } from './concurrency';
import { STAGE_STATUSES, isTerminalJobStatus, nextStage, transitionJobStatus } from './state-machine';
import { logger } from '../logger';

const log = logger.child({ module: 'orchestrator' });

export interface OrchestratorDeps {
  config: ConfigStore;
  store: Store;
  bus: NotificationBus;
  capture: CaptureService;
  analysis: AnalysisEngine;
  records: RecordClient;
  labels: LabelGenerator;
  clock?: () => Date;
}

export interface CaptureAndProcessRequest {
  deviceId?: string;
  resolution?: Resolution;
  timeoutMs?: number;
  options?: JobOptions;
  /** Resolve only once the Job is terminal; otherwise it runs in the background. */
  wait?: boolean;
}

export interface CaptureAndProcessResult {
  artifact: CaptureArtifact;
  job: Job;
}

export interface OrchestratorStatus {
  workerLimit: number;
  runningJobs: number;
  queuedJobs: number;
  activeJobs: number;
}

export class PipelineOrchestrator {
  /** captureArtifactId -> id of its non-terminal Job */
  private activeByArtifact = new Map<string, string>();
  /** artifact sha256 -> id of its non-terminal Job, when dedupByContent is on */
  private activeByHash = new Map<string, string>();
  /** Guard against concurrent run() calls on the same Job. */
  private running = new Set<string>();
  private cancelRequests = new Set<string>();
  private readonly workers: Semaphore;
  private readonly clock: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.workers = new Semaphore(deps.config.section('pipeline').workerLimit);
  }

  /** Create a pending Job for a captured artifact. */
  async submit(captureArtifactId: string, options: JobOptions = {}): Promise<Job> {
    const artifact = await this.deps.store.artifacts.getById(captureArtifactId);
    if (!artifact) {
      throw new PipelineError(notFoundError('Capture artifact', captureArtifactId));
    }

    // Claim the dedup slots before the first await below
    const active = this.activeByArtifact.get(artifact.id);
    if (active) {
      throw new PipelineError(duplicateJobError(artifact.id, active));
    }
    const byContent = this.deps.config.section('pipeline').dedupByContent;
    const hashOwner = byContent ? this.activeByHash.get(artifact.sha256) : undefined;
    if (hashOwner) {
      throw new PipelineError(duplicateJobError(artifact.id, hashOwner));
    }

    const now = this.clock().toISOString();
    const job: Job = {
      id: `job_${uuid()}`,
      captureArtifactId: artifact.id,
      contentHash: artifact.sha256,
      status: JobStatus.Pending,
      stage: null,
      attemptCounts: { analysis: 0, registration: 0, labeling: 0 },
      history: [],
      options,
      cancelRequested: false,
      createdAt: now,
      updatedAt: now,
    };
    this.activeByArtifact.set(artifact.id, job.id);
    if (byContent) this.activeByHash.set(artifact.sha256, job.id);

    try {
      await this.deps.store.jobs.create(job);
    } catch (err) {
      this.release(job);
      throw err;
    }

    log.info('Job submitted', { jobId: job.id, captureArtifactId: artifact.id });
    this.deps.bus.publish({
      type: 'job.created',
      jobId: job.id,
      payload: { captureArtifactId: artifact.id, status: job.status },
    });
    return job;
  }

  /**
   * Drive a Job to a terminal state. Resolves with the final Job; a stage
   * failure leaves the Job `failed` rather than rejecting.
   */
  async run(jobId: string): Promise<Job> {
    if (this.running.has(jobId)) {
      throw new PipelineError(createTypedError({
        kind: 'DuplicateJob',
        code: 'JOB.ALREADY_RUNNING',
        message: `Job ${jobId} is already running`,
        jobId,
      }));
    }
    this.running.add(jobId);

    try {
      const limit = this.deps.config.section('pipeline').workerLimit;
      if (this.workers.getLimit() !== limit) this.workers.setLimit(limit);
      return await this.workers.run(() => this.execute(jobId));
    } finally {
      this.running.delete(jobId);
    }
  }

  /** Run in the background; the outcome is recorded on the Job. */
  start(jobId: string): void {
    this.run(jobId).catch((err: unknown) => {
      log.error('Background job run failed', {
        jobId,
        error: toTypedError(err, this.secrets()).message,
      });
    });
  }

  /** Capture an image and submit it as a new Job. */
  async captureAndProcess(request: CaptureAndProcessRequest = {}): Promise<CaptureAndProcessResult> {
    const artifact = await this.deps.capture.capture(request.deviceId, request.resolution, request.timeoutMs);
    const job = await this.submit(artifact.id, request.options);
    if (request.wait) {
      return { artifact, job: await this.run(job.id) };
    }
    this.start(job.id);
    return { artifact, job };
  }

  /**
   * Request cancellation. A Job nobody is running fails at once; a running
   * Job fails at its next stage boundary.
   */
  async cancel(jobId: string): Promise<Job> {
    const job = await this.get(jobId);
    if (isTerminalJobStatus(job.status)) return job;

    this.cancelRequests.add(jobId);
    job.cancelRequested = true;
    this.deps.bus.publish({
      type: 'job.cancel_requested',
      jobId,
      payload: { status: job.status },
    });
    log.info('Job cancellation requested', { jobId, status: job.status });

    if (!this.running.has(jobId)) {
      return this.failJob(job, new PipelineError(cancelledError(jobId, job.stage ?? undefined)));
    }
    return job;
  }

  async get(jobId: string): Promise<Job> {
    const job = await this.deps.store.jobs.getById(jobId);
    if (!job) throw new PipelineError(notFoundError('Job', jobId));
    if (this.cancelRequests.has(jobId)) job.cancelRequested = true;
    return job;
  }

  async list(filter: JobFilter = {}): Promise<ListResult<Job>> {
    return this.deps.store.jobs.list(filter);
  }

  status(): OrchestratorStatus {
    return {
      workerLimit: this.workers.getLimit(),
      runningJobs: this.workers.active,
      queuedJobs: this.workers.pending,
      activeJobs: this.activeByArtifact.size,
    };
  }

  private async execute(jobId: string): Promise<Job> {
    const job = await this.get(jobId);
    if (isTerminalJobStatus(job.status)) return job;

    // Jobs read back from the store are claimed again so dedup holds
    if (!this.activeByArtifact.has(job.captureArtifactId)) {
      this.activeByArtifact.set(job.captureArtifactId, job.id);
    }

    try {
      for (let stage = nextStage(job.status); stage; stage = nextStage(job.status)) {
        await this.runStage(job, stage);
      }
    } catch (err) {
      return this.failJob(job, err);
    }

    job.completedAt = this.clock().toISOString();
    await this.persist(job);
    this.release(job);
    await this.retireArtifact(job);
    log.info('Job completed', { jobId: job.id, externalId: job.record?.externalId, labelId: job.label?.id });
    this.deps.bus.publish({
      type: 'job.completed',
      jobId: job.id,
      payload: { externalId: job.record?.externalId ?? null, labelId: job.label?.id ?? null },
    });
    return job;
  }

  /**
   * One stage: cancellation check, transition into the working status,
   * the work itself, then the transition to the stage's done status. A Job
   * already in the working status (resumed) skips the first transition.
   */
  private async runStage(job: Job, stage: JobStage): Promise<void> {
    const { ready, working, done } = STAGE_STATUSES[stage];
    this.throwIfCancelled(job, stage);

    if (job.status === ready) {
      await this.transition(job, working, stage);
    } else if (job.status !== working) {
      throw new PipelineError(internalError(`Job ${job.id} cannot run ${stage} from ${job.status}`));
    }

    job.stage = stage;
    job.attemptCounts[stage] += 1;
    await this.persist(job);

    switch (stage) {
      case 'analysis': {
        const analysis = await this.analyze(job);
        this.throwIfCancelled(job, stage);
        job.analysis = analysis;
        break;
      }
      case 'registration': {
        const record = await this.register(job);
        this.throwIfCancelled(job, stage);
        job.record = record;
        break;
      }
      case 'labeling': {
        const label = await this.label(job);
        this.throwIfCancelled(job, stage);
        job.label = label;
        break;
      }
    }

    await this.transition(job, done, stage);
  }

  private async analyze(job: Job): Promise<AnalysisResult> {
    const artifact = await this.artifactOf(job);
    let templateText: string | undefined;
    if (job.options.templateId) {
      try {
        templateText = await this.deps.records.templateStructure(job.options.templateId);
      } catch (err) {
        log.warn('Record template unavailable, analysing without it', {
          jobId: job.id,
          templateId: job.options.templateId,
          error: toTypedError(err, this.secrets()).message,
        });
      }
    }

    return this.deps.analysis.analyze(artifact, job.options.promptTemplate, undefined, {
      templateText,
      additionalPrompt: job.options.additionalPrompt,
      onRetry: (info) => {
        log.info('Analysis attempt failed', { jobId: job.id, attempt: info.attempt, errorKind: info.error.kind });
      },
    });
  }

  /**
   * Create the record once (key `job:<id>`), persist its externalId, then
   * write the body under the version last seen. A Conflict re-reads the
   * record and retries, up to `recordSystem.maxConflictRetries` times.
   */
  private async register(job: Job): Promise<AssetRecord> {
    const analysis = job.analysis;
    if (!analysis) {
      throw new PipelineError(internalError(`Job ${job.id} reached registration without an analysis result`));
    }
    const settings = this.deps.config.section('recordSystem');
    const artifact = await this.artifactOf(job);
    const attributes = analysis.attributes;
    const title = recordTitle(attributes, `Asset ${artifact.id}`);
    const body = renderRecordBody(attributes);
    const tags = recordTags(attributes);

    let record: AssetRecord;
    if (job.record?.externalId) {
      record = job.record;
    } else {
      const draft: AssetRecord = {
        externalId: null,
        title,
        body,
        categoryId: job.options.categoryId ?? settings.defaultCategory,
        attributes,
        status: 'draft',
        recordVersion: 1,
        tags,
      };
      const externalId = await this.deps.records.create(draft, `job:${job.id}`);
      record = { ...draft, externalId };
      job.record = record;
      await this.persist(job);

      if (settings.attachImages) {
        try {
          await this.deps.records.attachImage(externalId, artifact.imagePath, `Captured by ${artifact.deviceId} at ${artifact.capturedAt}`);
        } catch (err) {
          log.warn('Image upload to record failed', {
            jobId: job.id,
            externalId,
            error: toTypedError(err, this.secrets()).message,
          });
        }
      }
    }

    const externalId = record.externalId;
    if (!externalId) {
      throw new PipelineError(internalError(`Job ${job.id} has a record without an externalId`));
    }
    const fields = { title, body, attributes, status: 'registered' as const, tags };
    let expectedVersion = record.recordVersion;
    for (let conflicts = 0; ; conflicts++) {
      try {
        const recordVersion = await this.deps.records.update(externalId, fields, expectedVersion);
        return { ...record, ...fields, recordVersion };
      } catch (err) {
        if (!isErrorKind(err, 'Conflict') || conflicts >= settings.maxConflictRetries) throw err;
        const current = await this.deps.records.get(externalId);
        log.warn('Record version conflict, retrying with current version', {
          jobId: job.id,
          externalId,
          expectedVersion,
          actualVersion: current.recordVersion,
        });
        expectedVersion = current.recordVersion;
      }
    }
  }

  private async label(job: Job): Promise<Label> {
    const record = job.record;
    if (!record?.externalId) {
      throw new PipelineError(validationError('externalId', `job ${job.id} has no registered record`));
    }
    return this.deps.labels.generate(record.externalId, job.options.labelProfile ?? {}, {
      title: record.title,
      jobId: job.id,
    });
  }

  private async transition(job: Job, target: JobStatus, stage: JobStage): Promise<void> {
    const result = transitionJobStatus(job.status, target);
    if (!result.success) {
      throw new PipelineError({ ...result.error, jobId: job.id, stage });
    }
    const from = job.status;
    const at = this.clock().toISOString();
    job.status = result.newStatus;
    job.history.push({ from, to: job.status, at });
    await this.persist(job);
    this.deps.bus.publish({
      type: 'job.transitioned',
      jobId: job.id,
      payload: { from, to: job.status, stage },
    });
  }

  /** Move a Job to `failed` with `lastError`; a terminal Job is returned unchanged. */
  private async failJob(job: Job, err: unknown): Promise<Job> {
    const cause = toTypedError(err, this.secrets());
    const stage = cause.stage ?? job.stage ?? undefined;
    const lastError: TypedError = { ...cause, jobId: job.id, stage };

    const result = transitionJobStatus(job.status, JobStatus.Failed);
    if (!result.success) {
      log.warn('Job already terminal, failure not recorded', { jobId: job.id, status: job.status, errorKind: cause.kind });
      return job;
    }

    const from = job.status;
    const at = this.clock().toISOString();
    job.status = JobStatus.Failed;
    job.history.push({ from, to: JobStatus.Failed, at });
    job.lastError = lastError;
    job.completedAt = at;

    try {
      await this.persist(job);
    } finally {
      this.release(job);
    }
    await this.retireArtifact(job);

    log.error('Job failed', { jobId: job.id, stage, errorKind: cause.kind, code: cause.code, message: cause.message });
    this.deps.bus.publish({
      type: 'job.transitioned',
      jobId: job.id,
      payload: { from, to: JobStatus.Failed, stage: stage ?? null },
    });
    this.deps.bus.publish({
      type: 'job.failed',
      jobId: job.id,
      payload: { stage: stage ?? null, errorKind: cause.kind, code: cause.code, message: cause.message },
    });
    return job;
  }

  private throwIfCancelled(job: Job, stage: JobStage): void {
    if (this.cancelRequests.has(job.id)) {
      throw new PipelineError(cancelledError(job.id, stage));
    }
  }

  private async persist(job: Job): Promise<void> {
    job.cancelRequested = job.cancelRequested || this.cancelRequests.has(job.id);
    job.updatedAt = this.clock().toISOString();
    const stored = await this.deps.store.jobs.update(job);
    if (!stored) throw new PipelineError(notFoundError('Job', job.id));
  }

  /** Drop the Job's dedup claims and pending cancellation. */
  private release(job: Job): void {
    if (this.activeByArtifact.get(job.captureArtifactId) === job.id) {
      this.activeByArtifact.delete(job.captureArtifactId);
    }
    if (job.contentHash && this.activeByHash.get(job.contentHash) === job.id) {
      this.activeByHash.delete(job.contentHash);
    }
    this.cancelRequests.delete(job.id);
  }

  /** The Job is already terminal, so a retention failure is logged rather than recorded on it. */
  private async retireArtifact(job: Job): Promise<void> {
    try {
      await this.deps.capture.retire(job.captureArtifactId);
    } catch (err) {
      log.warn('Capture image retention failed', {
        jobId: job.id,
        captureArtifactId: job.captureArtifactId,
        error: toTypedError(err, this.secrets()).message,
      });
    }
  }

  private async artifactOf(job: Job): Promise<CaptureArtifact> {
    const artifact = await this.deps.store.artifacts.getById(job.captureArtifactId);
    if (!artifact) throw new PipelineError(notFoundError('Capture artifact', job.captureArtifactId));
    return artifact;
  }

  private secrets(): string[] {
    return configSecrets(this.deps.config.snapshot().config);
  }
}
