interface Sample {
  time: number;
  downloaded: number;
}

/**
 * Per-task rolling window of (time, downloaded) samples
 */
export class SpeedTracker {
  private readonly samples = new Map<string, Sample[]>();
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(windowMs: number, now: () => number = Date.now) {
    this.windowMs = windowMs;
    this.now = now;
  }

  record(id: string, downloaded: number): void {
    const time = this.now();
    let samples = this.samples.get(id);
    if (!samples) {
      samples = [];
      this.samples.set(id, samples);
    }
    samples.push({ time, downloaded });
    this.prune(samples, time);
  }

  /**
   * Bytes per second across the window; 0 with fewer than two samples
   * or no elapsed time
   */
  speed(id: string): number {
    const samples = this.samples.get(id);
    if (!samples) return 0;

    this.prune(samples, this.now());
    if (samples.length < 2) return 0;

    const first = samples[0];
    const last = samples[samples.length - 1];
    const elapsed = last.time - first.time;
    if (elapsed <= 0) return 0;

    return Math.max(0, ((last.downloaded - first.downloaded) / elapsed) * 1000);
  }

  reset(id: string): void {
    this.samples.delete(id);
  }

  private prune(samples: Sample[], now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < samples.length && samples[drop].time < cutoff) {
      drop++;
    }
    if (drop > 0) {
      samples.splice(0, drop);
    }
  }
}
