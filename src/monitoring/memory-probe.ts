/**
 * Process Memory Probe
 *
 * Default MemoryProbe: resident set size from `process.memoryUsage()`, peak
 * from `process.resourceUsage().maxRSS`, collection through `gc()` when the
 * process runs with `--expose-gc`.
 */

import type { MemoryProbe, MemoryReading } from '../types/memory.js';

export class ProcessMemoryProbe implements MemoryProbe {
  private peakBytes = 0;

  public read(): MemoryReading {
    const currentBytes = process.memoryUsage().rss;
    // maxRSS is reported in kilobytes
    const reportedPeak = process.resourceUsage().maxRSS * 1024;
    this.peakBytes = Math.max(this.peakBytes, reportedPeak, currentBytes);

    return { currentBytes, peakBytes: this.peakBytes };
  }

  public collect(): boolean {
    const gc: unknown = Reflect.get(globalThis, 'gc');
    if (typeof gc !== 'function') {
      return false;
    }
    gc();
    return true;
  }
}
