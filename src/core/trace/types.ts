import type { Byte, Word, MicroState } from '@core/cpu/types';

export type BusDir = 'Read' | 'Write';

// Fixed annotations; display only, never consulted for control flow
export type BusNote =
  | 'opcode fetch'
  | 'operand lo'
  | 'operand hi'
  | 'LDA mem'
  | 'STA mem'
  | 'LDA [abs+X]'
  | 'STA [abs+X]';

export interface BusEvent {
  readonly cycle: number;
  readonly state: MicroState; // micro-state active when the access happened
  readonly dir: BusDir;
  readonly address: Word;
  readonly data: Byte;
  readonly note: BusNote;
}

// Snapshot taken after each micro-step
export interface TraceFrame {
  readonly cycle: number;
  readonly pc: Word;
  readonly a: Byte;
  readonly b: Byte;
  readonly x: Byte;
  readonly sp: Byte; // low byte only
  readonly flags: Byte;
  readonly opcode: Byte;
  readonly state: MicroState; // state after the step
  readonly events: readonly BusEvent[];
}
