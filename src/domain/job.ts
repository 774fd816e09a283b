/**
 * Job domain model.
 *
 * A Job tracks one captured asset from analysis through record registration
 * to label generation. Only the orchestrator mutates a Job; once it reaches
 * `completed` or `failed` it is never written again.
 */

import { AnalysisResult } from './analysis';
import { AssetRecord } from './record';
import { Label } from './label';
import { TypedError } from './errors';

/** Job lifecycle states. */
export enum JobStatus {
  Pending = 'pending',
  Analyzing = 'analyzing',
  Analyzed = 'analyzed',
  Registering = 'registering',
  Registered = 'registered',
  Labeling = 'labeling',
  Completed = 'completed',
  Failed = 'failed',
}

/** Stages a Job passes through, in order. */
export type JobStage = 'analysis' | 'registration' | 'labeling';

/** Valid state transitions for jobs. */
export const VALID_JOB_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  [JobStatus.Pending]: [JobStatus.Analyzing, JobStatus.Failed],
  [JobStatus.Analyzing]: [JobStatus.Analyzed, JobStatus.Failed],
  [JobStatus.Analyzed]: [JobStatus.Registering, JobStatus.Failed],
  [JobStatus.Registering]: [JobStatus.Registered, JobStatus.Failed],
  [JobStatus.Registered]: [JobStatus.Labeling, JobStatus.Failed],
  [JobStatus.Labeling]: [JobStatus.Completed, JobStatus.Failed],
  [JobStatus.Completed]: [],
  [JobStatus.Failed]: [],
};

/** One entry in a Job's transition history. */
export interface JobTransition {
  from: JobStatus;
  to: JobStatus;
  at: string;
}

/** Per-submit overrides carried by the Job. */
export interface JobOptions {
  /** Prompt template overriding `inference.promptTemplate`. */
  promptTemplate?: string;
  /** Record-system template whose body feeds the `{{template}}` prompt variable. */
  templateId?: string;
  /** Record category; defaults to `recordSystem.defaultCategory`. */
  categoryId?: string;
  /** Extra instructions appended to the rendered prompt. */
  additionalPrompt?: string;
  /** Label profile overrides. */
  labelProfile?: {
    errorCorrectionLevel?: 'L' | 'M' | 'Q' | 'H';
    maxVersion?: number;
  };
}

export interface AttemptCounts {
  analysis: number;
  registration: number;
  labeling: number;
}

/** The unit of work, idempotency and retry. */
export interface Job {
  id: string;
  captureArtifactId: string;
  /** Content hash of the artifact, used for content-based deduplication. */
  contentHash?: string;
  status: JobStatus;
  /** Stage currently executing or last executed; null before analysis starts. */
  stage: JobStage | null;
  attemptCounts: AttemptCounts;
  history: JobTransition[];
  lastError?: TypedError;
  analysis?: AnalysisResult;
  record?: AssetRecord;
  label?: Label;
  options: JobOptions;
  cancelRequested: boolean;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
}

/** Filter for listing jobs. */
export interface JobFilter {
  status?: JobStatus;
  captureArtifactId?: string;
  limit?: number;
  offset?: number;
}
