/**
 * Core Types for guestsmith
 *
 * Lifecycle stages, convergence results and progress events.
 */

/**
 * Lifecycle stages in their total order, excluding the terminal `failed`
 */
export const STAGE_ORDER = [
  'undefined',
  'defined',
  'configured',
  'idmap-verified',
  'volumes-applied',
  'running',
  'customizing',
  'completed',
] as const;

/**
 * A stage on the forward path
 */
export type ProgressStage = (typeof STAGE_ORDER)[number];

/**
 * A stage reachable by a forward transition
 */
export type TargetStage = Exclude<ProgressStage, 'undefined'>;

/**
 * Any recordable stage, including the terminal failure state
 */
export type LifecycleStage = ProgressStage | 'failed';

/**
 * Outcome of converging one resource
 */
export type ConvergeResult =
  | { id: number; status: 'completed'; stage: 'completed' }
  | { id: number; status: 'failed'; stage: ProgressStage; error: Error }
  | { id: number; status: 'blocked'; blockedBy: number[] }
  | { id: number; status: 'cancelled'; stage: ProgressStage };

/**
 * Outcome of converging a batch
 */
export interface BatchResult {
  /** Dependency order actually used */
  order: number[];
  /** One result per resource in `order` */
  results: ConvergeResult[];
  summary: {
    completed: number;
    failed: number;
    blocked: number;
    cancelled: number;
  };
}

/**
 * Progress events emitted by the convergence engine
 */
export type ConvergeEvent =
  | { type: 'resource-start'; id: number; name: string; stage: ProgressStage; resumedAfterFailure?: string }
  | { type: 'stage-skipped'; id: number; stage: ProgressStage }
  | { type: 'stage-start'; id: number; stage: ProgressStage }
  | { type: 'stage-complete'; id: number; stage: ProgressStage }
  | { type: 'resource-complete'; id: number }
  | { type: 'resource-failed'; id: number; stage: ProgressStage; error: Error }
  | { type: 'resource-blocked'; id: number; blockedBy: number[] }
  | { type: 'resource-cancelled'; id: number; stage: ProgressStage };

/**
 * Callback for reporting convergence progress
 */
export type ConvergeProgressCallback = (event: ConvergeEvent) => void;
