import { MicroState, Flag, type Byte, type Word, type CPUState } from "@core/cpu/types";
import type { BusEvent, TraceFrame } from "@core/trace/types";

export type ReadByteFn = (addr: Word) => Byte;

export function hex2(v: number) { return (v & 0xFF).toString(16).toUpperCase().padStart(2, "0"); }
export function hex4(v: number) { return (v & 0xFFFF).toString(16).toUpperCase().padStart(4, "0"); }

const SHORT: Record<MicroState, string> = {
  [MicroState.FetchOp]: "FET",
  [MicroState.Decode]: "DEC",
  [MicroState.FetchOpLo]: "FLO",
  [MicroState.FetchOpHi]: "FHI",
  [MicroState.MemRead]: "MRD",
  [MicroState.MemWrite]: "MWR",
  [MicroState.Execute]: "EXE",
  [MicroState.WriteBack]: "WBK",
  [MicroState.Halted]: "HLT",
};

export function microStateName(s: MicroState, style: "short" | "long" = "long"): string {
  return style === "short" ? SHORT[s] : s;
}

// VNZC, '-' for clear bits
export function formatFlags(flags: Byte): string {
  return ((flags & Flag.V) ? "V" : "-")
    + ((flags & Flag.N) ? "N" : "-")
    + ((flags & Flag.Z) ? "Z" : "-")
    + ((flags & Flag.C) ? "C" : "-");
}

export interface RegisterView {
  readonly state: Readonly<CPUState>;
  readonly microState: MicroState;
}

export function formatRegisters(cpu: RegisterView): string {
  const s = cpu.state;
  return `PC=${hex4(s.pc)}  A=${hex2(s.a)}  B=${hex2(s.b)}  X=${hex2(s.x)}  SP=${hex4(s.sp)}  F=${hex2(s.flags)} [${formatFlags(s.flags)}]  ustate=${microStateName(cpu.microState, "short")}  cycles=${s.cycles}`;
}

export function formatMemoryRows(read: ReadByteFn, base: Word, rows = 8, cols = 16): string[] {
  const lines: string[] = [];
  for (let r = 0; r < rows; r++) {
    const addr = (base + r * cols) & 0xFFFF;
    const cells: string[] = [];
    for (let c = 0; c < cols; c++) cells.push(hex2(read((addr + c) & 0xFFFF)));
    lines.push(`${hex4(addr)}: ${cells.join(" ")}`);
  }
  return lines;
}

export function formatBusEvent(e: BusEvent): string {
  return `    ${e.dir === "Read" ? "RD" : "WR"} [${hex4(e.address)}] = ${hex2(e.data)}  ${e.note}`;
}

export function formatFrame(f: TraceFrame): string {
  return `${f.cycle}  ${hex4(f.pc)}  ${hex2(f.opcode)}  ${hex2(f.a)} ${hex2(f.b)} ${hex2(f.x)} ${hex2(f.flags)}  ${microStateName(f.state, "short")}  events:${f.events.length}`;
}

export function formatTrace(frames: readonly TraceFrame[]): string[] {
  if (frames.length === 0) return ["(no trace yet)"];
  const lines: string[] = [];
  for (const f of frames) {
    lines.push(formatFrame(f));
    for (const e of f.events) lines.push(formatBusEvent(e));
  }
  return lines;
}
