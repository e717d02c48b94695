/**
 * Terminal reporter for sync runs.
 *
 * Turns orchestrator events into status lines. The long stages (download,
 * extract) get a spinner that is settled by the next visible event. Output
 * is serialized through a queue because spinners start asynchronously;
 * callers await flush() before printing anything else.
 */

import type { SyncEvent, SyncReporter, SyncStage } from '../release/events';
import type { SpinnerController } from '../types/utils';
import { dim, fail, info, ok, spinner, warn } from '../utils/ui';

const SPINNER_STAGES: ReadonlySet<SyncStage> = new Set(['download', 'extract']);

export interface ConsoleReporterOptions {
  verbose: boolean;
}

/** Format one debug line for stderr */
export function formatDebugLine(event: SyncEvent): string {
  return `[uisync] ${event.stage}: ${event.message}`;
}

/** A reporter whose output may still be pending after emit() returns */
export interface FlushableReporter extends SyncReporter {
  flush(): Promise<void>;
}

export class ConsoleReporter implements FlushableReporter {
  private queue: Promise<void> = Promise.resolve();
  private active: SpinnerController | null = null;

  constructor(private readonly options: ConsoleReporterOptions) {}

  emit(event: SyncEvent): void {
    if (event.level === 'debug' && !this.options.verbose) return;
    this.queue = this.queue.then(() => this.render(event));
  }

  /** Resolves once every emitted event has been written */
  flush(): Promise<void> {
    return this.queue;
  }

  private async render(event: SyncEvent): Promise<void> {
    if (event.level === 'debug') {
      console.error(dim(formatDebugLine(event)));
      return;
    }

    if (this.active) {
      const current = this.active;
      this.active = null;
      if (event.level === 'error') {
        current.fail();
      } else {
        current.succeed();
      }
    }

    if (event.level === 'info' && SPINNER_STAGES.has(event.stage)) {
      this.active = await spinner(event.message);
      return;
    }

    switch (event.level) {
      case 'success':
        console.log(ok(event.message));
        break;
      case 'warn':
        console.log(warn(event.message));
        break;
      case 'info':
        if (this.options.verbose) console.log(info(event.message));
        break;
      case 'error':
        // The failure itself is rendered by the error handler
        if (this.options.verbose) console.error(fail(`${event.stage}: ${event.message}`));
        break;
    }
  }
}
