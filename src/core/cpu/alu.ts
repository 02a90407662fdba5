import { Flag, type Byte } from './types';

export interface AluResult {
  value: Byte;
  flags: Byte;
}

// Z and N from a result byte; C and V pass through untouched
export function setZN(flags: Byte, v: Byte): Byte {
  return (flags & ~(Flag.Z | Flag.N) & 0xFF) | (v === 0 ? Flag.Z : 0) | ((v & 0x80) !== 0 ? Flag.N : 0);
}

function withCV(flags: Byte, carry: boolean, overflow: boolean): Byte {
  return (flags & ~(Flag.C | Flag.V) & 0xFF) | (carry ? Flag.C : 0) | (overflow ? Flag.V : 0);
}

// 9-bit add: C from bit 8, V when both operands share a sign the result lacks
export function add8(a: Byte, b: Byte, flags: Byte): AluResult {
  const s = a + b;
  const r = s & 0xFF;
  const v = ((a ^ b) & 0x80) === 0 && ((a ^ r) & 0x80) !== 0;
  return { value: r, flags: withCV(setZN(flags, r), (s & 0x100) !== 0, v) };
}

// A + ~B + 1. C is "no borrow"; V uses the differing-sign test on A and B.
export function sub8(a: Byte, b: Byte, flags: Byte): AluResult {
  const s = a + (~b & 0xFF) + 1;
  const r = s & 0xFF;
  const v = ((a ^ b) & 0x80) !== 0 && ((a ^ r) & 0x80) !== 0;
  return { value: r, flags: withCV(setZN(flags, r), (s & 0x100) !== 0, v) };
}
