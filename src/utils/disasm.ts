import type { Byte, Word } from "@core/cpu/types";
import { lookupOpcode, type AddrMode } from "@core/cpu/opcodes";
import { hex2, hex4, type ReadByteFn } from "./format";

export interface DisasmResult {
  pc: Word;
  opcode: Byte;
  bytes: number[];
  mnemonic: string;
  operand: string;
  mode: AddrMode | "unknown";
  comment: string;
  len: number;
}

// Decodes from the same opcode table the engine executes
export function disasmAt(read: ReadByteFn, pc: Word): DisasmResult {
  const op = read(pc & 0xFFFF) & 0xFF;
  const info = lookupOpcode(op);
  if (!info) {
    return { pc, opcode: op, bytes: [op], mnemonic: ".DB", operand: "$" + hex2(op), mode: "unknown", comment: "data (unknown opcode)", len: 1 };
  }
  const b1 = read((pc + 1) & 0xFFFF) & 0xFF;
  const b2 = read((pc + 2) & 0xFFFF) & 0xFF;
  const bytes = info.len === 1 ? [op] : info.len === 2 ? [op, b1] : [op, b1, b2];
  const operand = formatOperand(info.mode, b1, b2, info.reg);
  return { pc, opcode: op, bytes, mnemonic: info.mnem, operand, mode: info.mode, comment: info.comment, len: info.len };
}

function formatOperand(mode: AddrMode, b1: Byte, b2: Byte, reg: string | undefined): string {
  switch (mode) {
    case "implied": return reg ?? "";
    case "immediate": return "#$" + hex2(b1);
    case "absolute": return "$" + hex4(b1 | (b2 << 8));
    case "indexed": return "[$" + hex4(b1 | (b2 << 8)) + "+X]";
  }
}

export function disasmRange(read: ReadByteFn, start: Word, count: number): DisasmResult[] {
  const out: DisasmResult[] = [];
  let pc = start & 0xFFFF;
  for (let i = 0; i < count; i++) {
    const d = disasmAt(read, pc);
    out.push(d);
    pc = (pc + d.len) & 0xFFFF;
  }
  return out;
}

// "0004:  13 00 FF   STA $FF00       ; [abs] <- A"
export function formatDisasmLine(res: DisasmResult): string {
  const bytesStr = res.bytes.map((b) => hex2(b)).join(" ").padEnd(8, " ");
  const dis = (res.mnemonic + (res.operand ? " " + res.operand : "")).padEnd(16, " ");
  return `${hex4(res.pc)}:  ${bytesStr}   ${dis}; ${res.comment}`;
}
