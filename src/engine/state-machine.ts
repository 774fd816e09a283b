/**
 * Job state machine.
 *
 * Enforces valid job state transitions, producing typed errors on
 * invalid transitions.
 */

import { JobStage, JobStatus, VALID_JOB_TRANSITIONS } from '../domain/job';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

/** Attempt a job state transition. */
export function transitionJobStatus(
  current: JobStatus,
  target: JobStatus,
): TransitionResult<JobStatus> {
  const validTargets = VALID_JOB_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        kind: 'Internal',
        code: 'JOB.INVALID_TRANSITION',
        message: `Invalid job state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a job status is terminal. */
export function isTerminalJobStatus(status: JobStatus): boolean {
  return status === JobStatus.Completed || status === JobStatus.Failed;
}

/** Status bracket each stage moves through: entry precondition, working, done. */
export const STAGE_STATUSES: Record<JobStage, { ready: JobStatus; working: JobStatus; done: JobStatus }> = {
  analysis: { ready: JobStatus.Pending, working: JobStatus.Analyzing, done: JobStatus.Analyzed },
  registration: { ready: JobStatus.Analyzed, working: JobStatus.Registering, done: JobStatus.Registered },
  labeling: { ready: JobStatus.Registered, working: JobStatus.Labeling, done: JobStatus.Completed },
};

/** The stage a non-terminal job will run next, or null when terminal. */
export function nextStage(status: JobStatus): JobStage | null {
  switch (status) {
    case JobStatus.Pending:
    case JobStatus.Analyzing:
      return 'analysis';
    case JobStatus.Analyzed:
    case JobStatus.Registering:
      return 'registration';
    case JobStatus.Registered:
    case JobStatus.Labeling:
      return 'labeling';
    default:
      return null;
  }
}
