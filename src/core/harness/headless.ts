import { MicroCPU } from '@core/cpu/cpu';
import type { Byte, Word, CPUState } from '@core/cpu/types';
import { OUT0 } from '@core/program/demo';
import { OutputPort } from './port';

export interface RunResult {
  reason: 'halted' | 'illegal-opcode' | 'timeout';
  instructions: number;
  cycles: number;
  state: CPUState;
  output: Byte[];
}

export interface RunOptions {
  maxInstructions: number;
  origin?: Word;
  entry?: Word; // defaults to origin
  port?: Word;
  retain?: number;
}

// Load, reset and run until halt or the instruction ceiling
export function runProgram(bytes: ArrayLike<number>, opts: RunOptions): RunResult {
  const origin = opts.origin ?? 0x0000;
  const cpu = new MicroCPU(opts.retain !== undefined ? { traceRetain: opts.retain } : {});
  cpu.loadProgram(bytes, origin);
  cpu.reset(opts.entry ?? origin);

  const port = new OutputPort(opts.port ?? OUT0);
  let instructions = 0;
  while (!cpu.halted && instructions < opts.maxInstructions) {
    // cycle by cycle so the port sees every frame whatever the retention window
    do {
      cpu.stepCycle();
      port.observe(cpu.timeline.last(1));
    } while (!cpu.atInstructionBoundary() && !cpu.halted);
    instructions++;
  }

  const reason = cpu.haltReason === 'illegal-opcode' ? 'illegal-opcode' : cpu.halted ? 'halted' : 'timeout';
  return { reason, instructions, cycles: cpu.cycles, state: { ...cpu.state }, output: [...port.bytes] };
}
