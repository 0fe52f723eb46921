import { performance } from 'node:perf_hooks';

export function monotonicNow(): number {
  return performance.now();
}

export function isoNow(): string {
  return new Date().toISOString();
}

/** Wall-clock time of day as HH:MM:SS, as shown next to live tool calls. */
export function clockTime(iso: string): string {
  return new Date(iso).toTimeString().slice(0, 8);
}
