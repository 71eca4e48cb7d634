import type { OutcomeCounts, OutcomeTag, RunMode } from './outcome';

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Base interface for all copyhead events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted once configuration is resolved, before files are expanded.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    mode: RunMode;
    workspaceRoot: string;
    patterns: string[];
    year: number;
    detection: 'heuristic' | 'content';
  };
}

/** Emitted after expansion and the filter chain have produced the file list */
export interface FilesSelected extends BaseEvent {
  type: 'FilesSelected';
  payload: {
    /** Files found by expansion */
    expanded: number;
    /** Files that survived the filter chain */
    selected: number;
    /** Names of the filters in chain order */
    filters: string[];
  };
}

/** Emitted for every outcome */
export interface FileProcessed extends BaseEvent {
  type: 'FileProcessed';
  payload: {
    path: string;
    tag: OutcomeTag;
    reason?: string;
  };
}

export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    total: number;
    counts: OutcomeCounts;
    failed: boolean;
    durationMs: number;
  };
}

export type CopyheadEvent = RunStarted | FilesSelected | FileProcessed | RunFinished;

/**
 * Common metadata for a new event of the given run.
 */
export function eventMeta(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
