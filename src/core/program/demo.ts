import type { Byte } from '@core/cpu/types';

export const OUT0 = 0xFF00;

const lo = (v: number) => v & 0xFF;
const hi = (v: number) => (v >>> 8) & 0xFF;

// Counter loop that writes A to OUT0 each pass. Never halts; load at $0000.
export function demoProgram(): Byte[] {
  return [
    0x10, 0x00,                 // 0000 LDA #$00
    0x11, 0x01,                 // 0002 LDB #$01
    0x13, lo(OUT0), hi(OUT0),   // 0004 loop: STA OUT0
    0x20,                       // 0007 ADD B
    0x11, 0x0A,                 // 0008 LDB #$0A
    0x24,                       // 000A XOR B
    0x24,                       // 000B XOR B (undo)
    0x33, 0x0A,                 // 000C LDX #$0A
    0x21,                       // 000E SUB B
    0x30, 0x04, 0x00,           // 000F JMP loop
    0xFF,                       // 0012 HLT (unreachable)
  ];
}
