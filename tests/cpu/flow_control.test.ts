import { describe, it, expect } from 'vitest';
import { MicroState } from '@core/cpu/types';
import { cpuWithProgram } from '../helpers/cpuh';

describe('CPU: jumps', () => {
  it('JMP loads the absolute operand into PC', () => {
    const cpu = cpuWithProgram([0x30, 0x34, 0x12]);
    cpu.stepInstruction();
    expect(cpu.state.pc).toBe(0x1234);
    expect(cpu.cycles).toBe(6);
  });

  it('JMP fetches opcode then operand lo then operand hi', () => {
    const cpu = cpuWithProgram([0x30, 0x34, 0x12]);
    cpu.stepInstruction();
    const notes = cpu.timeline.toArray().flatMap((f) => f.events.map((e) => e.note));
    expect(notes).toEqual(['opcode fetch', 'operand lo', 'operand hi']);
    expect(cpu.timeline.toArray().map((f) => f.state)).toEqual([
      MicroState.Decode, MicroState.FetchOpLo, MicroState.FetchOpHi,
      MicroState.Execute, MicroState.WriteBack, MicroState.FetchOp,
    ]);
  });

  it('JZ is taken only when Z is set', () => {
    // LDA #n; JZ $0006; NOP at 5
    const taken = cpuWithProgram([0x10, 0x00, 0x31, 0x06, 0x00]);
    taken.stepInstruction(); taken.stepInstruction();
    expect(taken.state.pc).toBe(0x0006);

    const notTaken = cpuWithProgram([0x10, 0x01, 0x31, 0x06, 0x00]);
    notTaken.stepInstruction(); notTaken.stepInstruction();
    expect(notTaken.state.pc).toBe(0x0005);
  });

  it('JNZ is taken only when Z is clear', () => {
    const taken = cpuWithProgram([0x10, 0x01, 0x32, 0x40, 0x00]);
    taken.stepInstruction(); taken.stepInstruction();
    expect(taken.state.pc).toBe(0x0040);

    const notTaken = cpuWithProgram([0x10, 0x00, 0x32, 0x40, 0x00]);
    notTaken.stepInstruction(); notTaken.stepInstruction();
    expect(notTaken.state.pc).toBe(0x0005);
  });

  it('a not-taken branch costs the same cycles as a taken one', () => {
    const taken = cpuWithProgram([0x10, 0x00, 0x31, 0x06, 0x00]);
    const notTaken = cpuWithProgram([0x10, 0x01, 0x31, 0x06, 0x00]);
    for (const cpu of [taken, notTaken]) { cpu.stepInstruction(); cpu.stepInstruction(); }
    expect(taken.cycles).toBe(11);
    expect(notTaken.cycles).toBe(11);
  });

  it('countdown loop runs to HLT', () => {
    const cpu = cpuWithProgram([
      0x10, 0x03,       // 0000 LDA #3
      0x26,             // 0002 DEC A
      0x32, 0x02, 0x00, // 0003 JNZ $0002
      0xFF,             // 0006 HLT
    ]);
    let n = 0;
    while (!cpu.halted && n < 100) { cpu.stepInstruction(); n++; }
    expect(n).toBe(8);
    expect(cpu.haltReason).toBe('hlt');
    expect(cpu.state.a).toBe(0);
    expect(cpu.cycles).toBe(38);
    expect(cpu.state.pc).toBe(0x0007);
  });

  it('PC wraps past $FFFF during operand fetch', () => {
    const cpu = cpuWithProgram([0x10], 0xFFFF);
    cpu.memory.write(0x0000, 0x42);
    cpu.stepInstruction();
    expect(cpu.state.a).toBe(0x42);
    expect(cpu.state.pc).toBe(0x0001);
  });
});
