import { MicroCPU } from '@core/cpu/cpu';
import type { Word } from '@core/cpu/types';
import { OutputPort } from '@core/harness/port';
import { loadImage, loadHexText } from '@core/loader/program';
import { disasmRange, formatDisasmLine } from '@utils/disasm';
import { formatMemoryRows, formatRegisters, formatTrace, hex2, hex4 } from '@utils/format';

export const RESET_VECTOR = 0xFFFC;
export const DEFAULT_WATCHDOG = 10_000_000;

export interface CommandResult {
  lines: string[];
  quit: boolean;
}

export interface DebuggerOptions {
  cpu?: MicroCPU;
  // File access for loadbin/loadhex; injected so tests stay off the filesystem
  readFile: (path: string) => Uint8Array;
  watchdog?: number;
}

const HELP = [
  'Commands:',
  '  s                 step one instruction',
  '  c                 step one cycle (micro-step)',
  '  r N               run N instructions',
  '  g                 run until halt or breakpoint',
  '  p                 print registers',
  '  m ADDR [ROWS]     dump memory from hex ADDR (default 8 rows of 16)',
  '  w ADDR BYTE       write BYTE at ADDR (both hex)',
  '  b ADDR            add breakpoint at PC==ADDR (hex)',
  '  bl                list breakpoints',
  '  bc [ADDR]         clear breakpoint at ADDR or all if none',
  '  t [K]             show last K trace frames (default 20)',
  '  out               show bytes written to the output port',
  '  reset             reset CPU to the reset vector and clear trace',
  '  d ADDR [N]        disassemble N instructions from ADDR (default 16)',
  '  loadhex PATH ADDR load hex-byte text from PATH at ADDR',
  '  loadbin PATH ADDR load raw binary from PATH at ADDR',
  '  setrv ADDR        set reset vector ($FFFC/$FFFD)',
  '  help              this text',
  '  quit              exit',
];

// "1234", "0x1234" or "$1234"
export function parseHexArg(s: string | undefined, max = 0xFFFF): number | null {
  if (s === undefined) return null;
  const m = /^(?:0x|\$)?([0-9a-fA-F]{1,4})$/i.exec(s);
  if (!m) return null;
  const v = parseInt(m[1], 16);
  return v <= max ? v : null;
}

function parseCount(s: string | undefined, fallback: number): number {
  const n = s !== undefined && /^\d+$/.test(s) ? parseInt(s, 10) : 0;
  return n > 0 ? n : fallback;
}

/**
 * Line-oriented debugger over a {@link MicroCPU}. Each command returns the lines
 * it would print; the caller owns the terminal.
 */
export class Debugger {
  readonly cpu: MicroCPU;
  readonly breakpoints = new Set<Word>();
  readonly output = new OutputPort();
  private readonly readFile: (path: string) => Uint8Array;
  private readonly watchdog: number;

  constructor(opts: DebuggerOptions) {
    this.cpu = opts.cpu ?? new MicroCPU();
    this.readFile = opts.readFile;
    this.watchdog = opts.watchdog ?? DEFAULT_WATCHDOG;
  }

  execute(line: string): CommandResult {
    const [rawCmd, ...args] = line.trim().split(/\s+/);
    const cmd = (rawCmd ?? '').toLowerCase();
    if (cmd === '') return { lines: [], quit: false };
    if (cmd === 'q' || cmd === 'quit' || cmd === 'exit') return { lines: [], quit: true };
    try {
      return { lines: this.run(cmd, args), quit: false };
    } catch (e) {
      return { lines: [`error: ${e instanceof Error ? e.message : String(e)}`], quit: false };
    }
  }

  private regs(): string { return formatRegisters(this.cpu); }

  private hitBreakpoint(): string | null {
    const pc = this.cpu.state.pc;
    return this.breakpoints.has(pc) ? `* Breakpoint hit at PC=${hex4(pc)}` : null;
  }

  // One cycle, with its frame fed to the output port monitor before retention can drop it
  private cycle() {
    this.cpu.stepCycle();
    this.output.observe(this.cpu.timeline.last(1));
  }

  private runToBoundary() {
    do { this.cycle(); } while (!this.cpu.atInstructionBoundary() && !this.cpu.halted);
  }

  // Same drain-then-run rule as MicroCPU.stepInstruction, a cycle at a time
  private stepInstruction() {
    if (this.cpu.halted) return;
    if (!this.cpu.atInstructionBoundary()) this.runToBoundary();
    if (this.cpu.halted) return;
    this.runToBoundary();
  }

  private run(cmd: string, args: string[]): string[] {
    const cpu = this.cpu;
    switch (cmd) {
      case 'help': case 'h': case '?':
        return [...HELP];
      case 's':
        this.stepInstruction();
        return [this.regs()];
      case 'c':
        if (!cpu.halted) this.cycle();
        return [this.regs()];
      case 'r': {
        const n = parseCount(args[0], 1);
        const lines: string[] = [];
        for (let i = 0; i < n && !cpu.halted; i++) {
          const before = this.hitBreakpoint();
          if (before) { lines.push(before); break; }
          this.stepInstruction();
          const after = this.hitBreakpoint();
          if (after) { lines.push(after); break; }
        }
        return [...lines, this.regs()];
      }
      case 'g': {
        const lines: string[] = [];
        let budget = this.watchdog;
        while (!cpu.halted) {
          if (budget-- <= 0) { lines.push(`* Watchdog limit reached (${this.watchdog} instructions)`); break; }
          const hit = this.hitBreakpoint();
          if (hit) { lines.push(hit); break; }
          this.stepInstruction();
        }
        return [...lines, this.regs()];
      }
      case 'p':
        return [this.regs()];
      case 'm': {
        const addr = parseHexArg(args[0]);
        if (addr === null) return ['usage: m ADDR [ROWS]'];
        return formatMemoryRows((a) => cpu.memory.read(a), addr, parseCount(args[1], 8), 16);
      }
      case 'w': {
        const addr = parseHexArg(args[0]);
        const val = parseHexArg(args[1], 0xFF);
        if (addr === null || val === null) return ['usage: w ADDR BYTE'];
        // direct poke: bypasses the engine, no bus event
        cpu.memory.write(addr, val);
        return [`Wrote ${hex2(val)} to [${hex4(addr)}]`];
      }
      case 'b': {
        const addr = parseHexArg(args[0]);
        if (addr === null) return ['usage: b ADDR'];
        this.breakpoints.add(addr);
        return [`Breakpoint added at PC=${hex4(addr)}`];
      }
      case 'bl':
        if (this.breakpoints.size === 0) return ['(no breakpoints)'];
        return [...this.breakpoints].sort((a, b) => a - b).map((pc) => ` - ${hex4(pc)}`);
      case 'bc': {
        if (args[0] === undefined) { this.breakpoints.clear(); return ['Breakpoints cleared.']; }
        const addr = parseHexArg(args[0]);
        if (addr === null) return ['usage: bc [ADDR]'];
        this.breakpoints.delete(addr);
        return [`Cleared ${hex4(addr)}`];
      }
      case 't':
        return formatTrace(cpu.timeline.last(parseCount(args[0], 20)));
      case 'out': {
        const bytes = this.output.bytes;
        return bytes.length === 0 ? ['(no output)'] : [`OUT ${hex4(this.output.port)}: ${bytes.map((b) => hex2(b)).join(' ')}`];
      }
      case 'reset':
        cpu.reset(cpu.memory.read16(RESET_VECTOR));
        this.output.clear();
        return ['Reset done.', this.regs()];
      case 'd': case 'dis': case 'disasm': {
        const addr = parseHexArg(args[0]);
        if (addr === null) return ['usage: d ADDR [N]'];
        return disasmRange((a) => cpu.memory.read(a), addr, parseCount(args[1], 16)).map(formatDisasmLine);
      }
      case 'loadbin':
        return this.load('loadbin', args[0], parseHexArg(args[1]));
      case 'loadhex':
        return this.load('loadhex', args[0], parseHexArg(args[1]));
      case 'setrv': {
        const addr = parseHexArg(args[0]);
        if (addr === null) return ['usage: setrv ADDR'];
        cpu.write16(RESET_VECTOR, addr);
        return [`[setrv] reset vector set to ${hex4(addr)}`];
      }
      default:
        return ["Unknown command. Type 'help'."];
    }
  }

  private load(cmd: 'loadbin' | 'loadhex', path: string | undefined, addr: number | null): string[] {
    if (path === undefined || addr === null) return [`usage: ${cmd} PATH ADDR`];
    let data: Uint8Array;
    try {
      data = this.readFile(path);
    } catch (e) {
      return [`[${cmd}] failed to read '${path}': ${e instanceof Error ? e.message : String(e)}`];
    }
    const res = cmd === 'loadbin'
      ? loadImage(this.cpu, data, addr)
      : loadHexText(this.cpu, new TextDecoder().decode(data), addr);
    if (!res.ok) return [`[${cmd}] ${res.error}`];
    return [`[${cmd}] loaded ${res.length} bytes at ${hex4(res.origin)}`];
  }
}
