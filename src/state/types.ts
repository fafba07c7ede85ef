/**
 * State Types for guestsmith
 *
 * One record per resource, persisted as <stateDir>/<id>.json.
 */

import type { ResourceKind } from '../config/types.js';
import type { ErrorCode } from '../core/errors.js';
import type { LifecycleStage, ProgressStage } from '../core/types.js';

/**
 * Persisted convergence record of one resource
 */
export interface ResourceRecord {
  /** Schema version for migrations */
  version: 1;
  id: number;
  kind: ResourceKind;
  stage: LifecycleStage;
  /** Last stage reached before a failure; equals `stage` otherwise */
  resumeStage: ProgressStage;
  /** ISO timestamp of the last transition */
  updatedAt: string;
  /** Fingerprint of the resolved spec at the last transition */
  specHash: string;
  /** Cause of the last failure, cleared on the next successful transition */
  failure?: FailureRecord;
}

/**
 * Cause of a persisted failure
 */
export interface FailureRecord {
  /** Stage that was being attempted */
  stage: ProgressStage;
  code: ErrorCode | 'UNKNOWN';
  message: string;
  /** ISO timestamp of the failure */
  at: string;
}

/**
 * Storage backend for resource records
 */
export interface StateStore {
  /** Read a record, or null when the resource was never converged */
  get(id: number): Promise<ResourceRecord | null>;
  /** Write a record atomically */
  put(record: ResourceRecord): Promise<void>;
  /** Delete a record; missing records are ignored */
  remove(id: number): Promise<void>;
  /** All records, ascending by id */
  list(): Promise<ResourceRecord[]>;
}
