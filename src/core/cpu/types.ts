export type Byte = number; // 0..255
export type Word = number; // 0..65535

export interface CPUState {
  a: Byte;
  b: Byte;
  x: Byte;
  pc: Word; // program counter
  sp: Word; // stack pointer (initialised, never dereferenced)
  flags: Byte; // ----VNZC
  cycles: number;
}

// Status flag bits
export const Flag = {
  C: 1 << 0,
  Z: 1 << 1,
  N: 1 << 2,
  V: 1 << 3,
} as const;

export enum MicroState {
  FetchOp = 'FetchOp',
  Decode = 'Decode',
  FetchOpLo = 'FetchOpLo',
  FetchOpHi = 'FetchOpHi',
  // Declared for completeness; this model folds memory access into Execute
  MemRead = 'MemRead',
  MemWrite = 'MemWrite',
  Execute = 'Execute',
  WriteBack = 'WriteBack',
  Halted = 'Halted',
}

export type HaltReason = 'hlt' | 'illegal-opcode';
