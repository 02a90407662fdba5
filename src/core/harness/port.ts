import type { Byte, Word } from '@core/cpu/types';
import type { TraceFrame } from '@core/trace/types';
import { OUT0 } from '@core/program/demo';

// Output ports are a convention on top of the core: watch the trace for writes to one address
export function collectPortWrites(frames: Iterable<TraceFrame>, port: Word = OUT0): Byte[] {
  const out: Byte[] = [];
  for (const f of frames) {
    for (const e of f.events) {
      if (e.dir === 'Write' && e.address === port) out.push(e.data);
    }
  }
  return out;
}

export class OutputPort {
  private log: Byte[] = [];
  private lastCycle = -1;

  constructor(readonly port: Word = OUT0) {}

  get bytes(): readonly Byte[] { return this.log; }

  // Frames already seen (by cycle number) are skipped, so observing the same frames twice is harmless
  observe(frames: Iterable<TraceFrame>): void {
    for (const f of frames) {
      if (f.cycle <= this.lastCycle) continue;
      this.lastCycle = f.cycle;
      this.log.push(...collectPortWrites([f], this.port));
    }
  }

  clear(): void {
    this.log = [];
    this.lastCycle = -1;
  }
}
