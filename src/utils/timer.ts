/**
 * Measures how long a step or publish action took
 */
export class Timer {
  private startTime: number;
  private endTime?: number;

  constructor() {
    this.startTime = performance.now();
  }

  /**
   * Stop the timer and return total elapsed time; later calls keep the first stop
   */
  stop(): number {
    this.endTime ??= performance.now();
    return this.elapsed;
  }

  get elapsed(): number {
    const end = this.endTime ?? performance.now();
    return end - this.startTime;
  }
}

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}
