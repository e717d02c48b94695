/**
 * Sync Events
 *
 * The orchestrator reports progress as a sequence of structured events. A
 * reporter decides how (or whether) to display them; the orchestrator never
 * reads them back.
 */

/** States of a sync run */
export type SyncStage =
  | 'check-marker'
  | 'compare-versions'
  | 'up-to-date'
  | 'download'
  | 'extract'
  | 'relocate'
  | 'install-spec'
  | 'record-version'
  | 'cleanup'
  | 'done'
  | 'failed';

export type SyncEventLevel = 'debug' | 'info' | 'success' | 'warn' | 'error';

export interface SyncEvent {
  stage: SyncStage;
  level: SyncEventLevel;
  message: string;
}

export interface SyncReporter {
  emit(event: SyncEvent): void;
}

/** Reporter that discards everything */
export const silentReporter: SyncReporter = {
  emit: () => {},
};

/**
 * Reporter that keeps every event in memory, in emission order
 */
export class RecordingReporter implements SyncReporter {
  readonly events: SyncEvent[] = [];

  emit(event: SyncEvent): void {
    this.events.push(event);
  }

  stages(): SyncStage[] {
    return this.events.map((e) => e.stage);
  }
}
