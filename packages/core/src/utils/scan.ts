/**
 * Scans over the parent-index column.
 *
 * Each query has a plain-loop form and a chunked form that hands fixed-size
 * windows to the typed array's native `indexOf`. Both forms return the same
 * answer for the same input; `FlatTree` picks one by node count.
 */

export interface ScanOptions {
  /** First position to consider */
  from?: number;
  /** Slots per window for the chunked forms */
  chunkSize?: number;
}

const DEFAULT_CHUNK_SIZE = 1024;

function windowBounds(view: Uint32Array, options: ScanOptions): { from: number; chunk: number } {
  const from = Math.max(0, options.from ?? 0);
  const chunk = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  return { from: Math.min(from, view.length), chunk };
}

export function countLinear(view: Uint32Array, target: number, options: ScanOptions = {}): number {
  const { from } = windowBounds(view, options);
  let count = 0;
  for (let i = from; i < view.length; i++) {
    if (view[i] === target) count++;
  }
  return count;
}

export function countChunked(view: Uint32Array, target: number, options: ScanOptions = {}): number {
  const { from, chunk } = windowBounds(view, options);
  let count = 0;

  for (let start = from; start < view.length; start += chunk) {
    const window = view.subarray(start, Math.min(start + chunk, view.length));
    let hit = window.indexOf(target);
    while (hit !== -1) {
      count++;
      hit = window.indexOf(target, hit + 1);
    }
  }

  return count;
}

export function containsLinear(view: Uint32Array, target: number, options: ScanOptions = {}): boolean {
  const { from } = windowBounds(view, options);
  for (let i = from; i < view.length; i++) {
    if (view[i] === target) return true;
  }
  return false;
}

export function containsChunked(view: Uint32Array, target: number, options: ScanOptions = {}): boolean {
  const { from, chunk } = windowBounds(view, options);

  for (let start = from; start < view.length; start += chunk) {
    const window = view.subarray(start, Math.min(start + chunk, view.length));
    if (window.indexOf(target) !== -1) return true;
  }

  return false;
}
