import { performance } from 'node:perf_hooks';

export class CheckTimer {
  private startedAt = 0;

  begin(): void {
    this.startedAt = performance.now();
  }

  /** Whole milliseconds since the last `begin()`. */
  elapsed(): number {
    return Math.round(performance.now() - this.startedAt);
  }
}
