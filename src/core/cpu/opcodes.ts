import type { Byte, Word, CPUState } from './types';
import type { BusNote } from '@core/trace/types';
import { Flag } from './types';
import { setZN, add8, sub8 } from './alu';

export type AddrMode =
  | 'implied'   // no operand bytes
  | 'immediate' // #$nn
  | 'absolute'  // $nnnn
  | 'indexed';  // [$nnnn+X]

// What an Execute handler may touch: registers, the decoded operand, and the bus
export interface ExecContext {
  readonly state: CPUState;
  readonly operand: Word;
  read(addr: Word, note: BusNote): Byte;
  write(addr: Word, value: Byte, note: BusNote): void;
}

export interface OpInfo {
  opcode: Byte;
  mnem: string;
  mode: AddrMode;
  len: 1 | 2 | 3;
  reg?: 'A' | 'B'; // register operand printed for implied ALU ops
  comment: string; // short effect summary for disassembly
  halts?: boolean;
  exec: (cpu: ExecContext) => void;
}

const T: (OpInfo | undefined)[] = new Array<OpInfo | undefined>(256).fill(undefined);
function def(info: OpInfo) { T[info.opcode] = info; }

const LEN: Record<AddrMode, 1 | 2 | 3> = { implied: 1, immediate: 2, absolute: 3, indexed: 3 };
function op(opcode: Byte, mnem: string, mode: AddrMode, comment: string, exec: OpInfo['exec'], extra: Pick<OpInfo, 'reg' | 'halts'> = {}) {
  def({ opcode, mnem, mode, len: LEN[mode], comment, exec, ...extra });
}

const imm = (cpu: ExecContext): Byte => cpu.operand & 0xFF;
const ea = (cpu: ExecContext): Word => (cpu.operand + cpu.state.x) & 0xFFFF;
const zero = (cpu: ExecContext): boolean => (cpu.state.flags & Flag.Z) !== 0;

function loadA(cpu: ExecContext, v: Byte) { cpu.state.a = v; cpu.state.flags = setZN(cpu.state.flags, v); }

op(0x00, 'NOP', 'implied', 'no operation', () => {});

// Loads
op(0x10, 'LDA', 'immediate', 'A <- imm', (cpu) => loadA(cpu, imm(cpu)));
op(0x11, 'LDB', 'immediate', 'B <- imm', (cpu) => {
  cpu.state.b = imm(cpu); cpu.state.flags = setZN(cpu.state.flags, cpu.state.b);
});
op(0x33, 'LDX', 'immediate', 'X <- imm', (cpu) => {
  cpu.state.x = imm(cpu); cpu.state.flags = setZN(cpu.state.flags, cpu.state.x);
});
op(0x12, 'LDA', 'absolute', 'A <- [abs]', (cpu) => loadA(cpu, cpu.read(cpu.operand, 'LDA mem')));
op(0x34, 'LDA', 'indexed', 'A <- [abs+X]', (cpu) => loadA(cpu, cpu.read(ea(cpu), 'LDA [abs+X]')));

// Stores
op(0x13, 'STA', 'absolute', '[abs] <- A', (cpu) => cpu.write(cpu.operand, cpu.state.a, 'STA mem'));
op(0x35, 'STA', 'indexed', '[abs+X] <- A', (cpu) => cpu.write(ea(cpu), cpu.state.a, 'STA [abs+X]'));

// Flow control
op(0x30, 'JMP', 'absolute', 'PC <- abs', (cpu) => { cpu.state.pc = cpu.operand; });
op(0x31, 'JZ', 'absolute', 'PC <- abs if Z', (cpu) => { if (zero(cpu)) cpu.state.pc = cpu.operand; });
op(0x32, 'JNZ', 'absolute', 'PC <- abs if !Z', (cpu) => { if (!zero(cpu)) cpu.state.pc = cpu.operand; });

// ALU, register operands
op(0x20, 'ADD', 'implied', 'A <- A + B', (cpu) => {
  const r = add8(cpu.state.a, cpu.state.b, cpu.state.flags);
  cpu.state.a = r.value; cpu.state.flags = r.flags;
}, { reg: 'B' });
op(0x21, 'SUB', 'implied', 'A <- A - B', (cpu) => {
  const r = sub8(cpu.state.a, cpu.state.b, cpu.state.flags);
  cpu.state.a = r.value; cpu.state.flags = r.flags;
}, { reg: 'B' });
op(0x22, 'AND', 'implied', 'A <- A & B', (cpu) => loadA(cpu, cpu.state.a & cpu.state.b), { reg: 'B' });
op(0x23, 'OR', 'implied', 'A <- A | B', (cpu) => loadA(cpu, cpu.state.a | cpu.state.b), { reg: 'B' });
op(0x24, 'XOR', 'implied', 'A <- A ^ B', (cpu) => loadA(cpu, cpu.state.a ^ cpu.state.b), { reg: 'B' });
op(0x25, 'INC', 'implied', 'A <- A + 1', (cpu) => loadA(cpu, (cpu.state.a + 1) & 0xFF), { reg: 'A' });
op(0x26, 'DEC', 'implied', 'A <- A - 1', (cpu) => loadA(cpu, (cpu.state.a - 1) & 0xFF), { reg: 'A' });

op(0xFF, 'HLT', 'implied', 'halt', () => {}, { halts: true });

export function lookupOpcode(opcode: Byte): OpInfo | undefined {
  return T[opcode & 0xFF];
}

export function definedOpcodes(): OpInfo[] {
  return T.filter((e): e is OpInfo => e !== undefined);
}
