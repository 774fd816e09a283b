/**
 * Pipeline event domain model.
 *
 * Events are emitted with a stable, versioned schema for viewers and other
 * downstream consumers.
 */

/** Event types published on the notification bus. */
export type PipelineEventType =
  | 'job.created'
  | 'job.transitioned'
  | 'job.completed'
  | 'job.failed'
  | 'job.cancel_requested'
  | 'capture.completed'
  | 'config.changed'
  | 'label.generated'
  | 'label.deleted';

export const PIPELINE_EVENT_TYPES: readonly PipelineEventType[] = [
  'job.created',
  'job.transitioned',
  'job.completed',
  'job.failed',
  'job.cancel_requested',
  'capture.completed',
  'config.changed',
  'label.generated',
  'label.deleted',
];

export const EVENT_SCHEMA_VERSION = '1.0.0';

/** Event as handed to the bus, before sequencing. */
export interface PipelineEventInput {
  type: PipelineEventType;
  jobId?: string;
  payload: Record<string, unknown>;
}

/** A published event. */
export interface PipelineEvent extends PipelineEventInput {
  id: string;
  /** Global publish order; gaps are visible to a subscriber that was dropped. */
  seq: number;
  /** Per-job publish order, present when `jobId` is set. */
  jobSeq?: number;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
}

export function isPipelineEventType(value: string): value is PipelineEventType {
  return PIPELINE_EVENT_TYPES.some((type) => type === value);
}
