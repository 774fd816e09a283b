/**
 * Asset record domain model.
 *
 * Mirrors an item in the external record-management system. `externalId`
 * is assigned by that system and set exactly once.
 */

import { Attributes } from './analysis';

export type RecordStatus = 'draft' | 'registered' | 'labeled';

export interface AssetRecord {
  externalId: string | null;
  title: string;
  /** HTML body rendered from the attributes. */
  body: string;
  categoryId: string;
  attributes: Attributes;
  status: RecordStatus;
  /** Optimistic concurrency version; starts at 1 on create. */
  recordVersion: number;
  tags: string[];
}

/** Fields an update may change. */
export interface RecordFields {
  title?: string;
  body?: string;
  attributes?: Attributes;
  status?: RecordStatus;
  tags?: string[];
}

export interface AssetRecordSummary {
  externalId: string;
  title: string;
  categoryId: string;
  status: RecordStatus;
  recordVersion: number;
}

export interface RecordFilter {
  query?: string;
  categoryId?: string;
  limit?: number;
  offset?: number;
}

/** An item type ("template") of the record system. */
export interface RecordTemplate {
  id: string;
  title: string;
  body: string;
}
