import type { TraceFrame } from './types';

// What collaborators (debugger, viewers) get to see
export interface ReadonlyTraceTimeline extends Iterable<TraceFrame> {
  readonly retain: number;
  readonly length: number;
  readonly total: number;
  at(index: number): TraceFrame | undefined;
  last(count: number): TraceFrame[];
  toArray(): TraceFrame[];
}

/**
 * Append-only frame log with a retention window.
 *
 * Once more than `retain` frames have been pushed the oldest ones are overwritten
 * in place, so memory stays bounded while `total` keeps counting every frame
 * appended since the last clear. With the default `Infinity` nothing is dropped.
 */
export class TraceTimeline implements ReadonlyTraceTimeline {
  private frames: TraceFrame[] = [];
  private head = 0; // slot of the oldest frame once the ring is full
  private appended = 0;

  constructor(readonly retain: number = Infinity) {
    if (retain !== Infinity && (!Number.isInteger(retain) || retain <= 0)) {
      throw new Error(`Invalid trace retention: ${retain}`);
    }
  }

  get length(): number { return this.frames.length; }
  get total(): number { return this.appended; }

  push(frame: TraceFrame): void {
    this.appended++;
    if (this.frames.length < this.retain) {
      this.frames.push(frame);
      return;
    }
    this.frames[this.head] = frame;
    this.head = (this.head + 1) % this.frames.length;
  }

  clear(): void {
    this.frames = [];
    this.head = 0;
    this.appended = 0;
  }

  // 0 is the oldest retained frame; negative indices count back from the newest
  at(index: number): TraceFrame | undefined {
    const n = this.frames.length;
    const i = index < 0 ? index + n : index;
    if (!Number.isInteger(i) || i < 0 || i >= n) return undefined;
    return this.frames[(this.head + i) % n];
  }

  last(count: number): TraceFrame[] {
    const n = this.frames.length;
    const k = Math.max(0, Math.min(Math.floor(count), n));
    const out: TraceFrame[] = [];
    for (let i = n - k; i < n; i++) out.push(this.frames[(this.head + i) % n]);
    return out;
  }

  toArray(): TraceFrame[] { return this.last(this.frames.length); }

  [Symbol.iterator](): Iterator<TraceFrame> { return this.toArray()[Symbol.iterator](); }
}
