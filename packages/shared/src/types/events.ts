/**
 * Base interface for all pipeline events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Model the event concerns, when there is one */
  model?: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted before the model checker is invoked for a model */
export interface GenerationStarted extends BaseEvent {
  type: 'GenerationStarted';
  payload: {
    workDir: string;
    generator: string;
  };
}

/** Emitted once the trail files produced by the checker have been counted */
export interface TrailsCounted extends BaseEvent {
  type: 'TrailsCounted';
  payload: {
    count: number;
  };
}

/** Emitted when a spin summary file has been written for a trail */
export interface SummaryWritten extends BaseEvent {
  type: 'SummaryWritten';
  payload: {
    file: string;
    /** Checker trail selector, e.g. `-t2` */
    selector: string;
  };
}

/** Emitted after the test-source generator has run */
export interface GeneratorInvoked extends BaseEvent {
  type: 'GeneratorInvoked';
  payload: {
    args: string[];
    exitCode: number;
  };
}

export interface ArtifactsSynchronized extends BaseEvent {
  type: 'ArtifactsSynchronized';
  payload: {
    targetDir: string;
    removed: string[];
    copied: string[];
  };
}

export interface ManifestUpdated extends BaseEvent {
  type: 'ManifestUpdated';
  payload: {
    path: string;
    added: string[];
    total: number;
  };
}

export interface ManifestReset extends BaseEvent {
  type: 'ManifestReset';
  payload: {
    path: string;
    baseline: string;
    dropped: number;
  };
}

export interface CleanupCompleted extends BaseEvent {
  type: 'CleanupCompleted';
  payload: {
    removed: string[];
    /** Trail count observed at cleanup time */
    trailCount: number;
  };
}

export type PipelineEvent =
  | GenerationStarted
  | TrailsCounted
  | SummaryWritten
  | GeneratorInvoked
  | ArtifactsSynchronized
  | ManifestUpdated
  | ManifestReset
  | CleanupCompleted;

export type PipelineEventType = PipelineEvent['type'];

/**
 * Common metadata for a pipeline event, stamped with the current time.
 */
export function eventBase(model?: string): Pick<BaseEvent, 'schemaVersion' | 'timestamp' | 'model'> {
  return {
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    model,
  };
}
