/**
 * controller/pipeline_watchdog.ts
 *
 * Tracks one target whose forwarded events are not being acknowledged. If the
 * same target stays pending past the threshold, its pipeline is reset.
 */

import { InjectionTarget } from '../core/types';
import { scopedLogger } from '../core/logger';
import { TargetHandle } from './target_registry';

const log = scopedLogger('controller/pipeline_watchdog');

export class PipelineWatchdog {
  private tracked: { handle: TargetHandle; since: number } | null = null;

  constructor(
    private readonly thresholdMs: number,
    private readonly now: () => number
  ) {}

  /**
   * Called right before an event is forwarded to `target`.
   * Returns true when the pipeline was reset.
   */
  check(handle: TargetHandle, target: InjectionTarget): boolean {
    if (!target.hasPendingEvents()) {
      if (this.tracked?.handle.equals(handle)) this.tracked = null;
      return false;
    }

    const now = this.now();
    if (!this.tracked || !this.tracked.handle.equals(handle)) {
      this.tracked = { handle, since: now };
      return false;
    }

    const stuckFor = now - this.tracked.since;
    if (stuckFor <= this.thresholdMs) return false;

    log.warn({ target: handle.toString(), stuckForMs: stuckFor }, 'Pipeline stuck, resetting');
    target.resetPipeline();
    this.tracked = null;
    return true;
  }

  /** Drops tracking for a target being unregistered. */
  forget(handle: TargetHandle): void {
    if (this.tracked?.handle.equals(handle)) this.tracked = null;
  }

  clear(): void {
    this.tracked = null;
  }
}
