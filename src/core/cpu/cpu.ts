import { MicroState, type Byte, type Word, type CPUState, type HaltReason } from './types';
import { lookupOpcode, type ExecContext } from './opcodes';
import { Memory } from '@core/bus/memory';
import { TraceTimeline, type ReadonlyTraceTimeline } from '@core/trace/timeline';
import type { BusDir, BusEvent, BusNote, TraceFrame } from '@core/trace/types';
import { loadEngineConfig, type EngineConfig } from '@core/config';

export const INITIAL_SP = 0x01FF;

function initialState(pc: Word): CPUState {
  return { a: 0, b: 0, x: 0, pc: pc & 0xFFFF, sp: INITIAL_SP, flags: 0, cycles: 0 };
}

/**
 * Micro-stepped processor. Every call to {@link stepCycle} performs one bus cycle
 * of the fetch/decode/operand/execute/write-back sequence and appends one frame
 * to the trace timeline.
 */
export class MicroCPU {
  // mutated only by the engine and the opcode handlers through ctx
  private regs: CPUState = initialState(0);
  readonly memory: Memory;
  private readonly trace: TraceTimeline;
  private readonly logBus: boolean;
  private readonly ctx: ExecContext;

  private ustate: MicroState = MicroState.FetchOp;
  private opcodeLatch: Byte = 0;
  private operandLatch: Word = 0; // immediate byte or absolute address, little-endian
  private isHalted = false;
  private reason: HaltReason | null = null;
  // bus events of the micro-step in progress
  private events: BusEvent[] = [];

  constructor(options: Partial<EngineConfig> = {}) {
    const cfg: EngineConfig = { ...loadEngineConfig(), ...options };
    this.memory = new Memory(cfg.ramInit);
    this.trace = new TraceTimeline(cfg.traceRetain);
    this.logBus = cfg.logBus;
    const cpu = this;
    this.ctx = {
      get state() { return cpu.regs; },
      get operand() { return cpu.operandLatch; },
      read: (addr, note) => cpu.read(addr, note),
      write: (addr, value, note) => cpu.write(addr, value, note),
    };
  }

  get state(): Readonly<CPUState> { return this.regs; }
  get microState(): MicroState { return this.ustate; }
  get opcode(): Byte { return this.opcodeLatch; }
  get operand(): Word { return this.operandLatch; }
  get halted(): boolean { return this.isHalted; }
  get haltReason(): HaltReason | null { return this.reason; }
  get cycles(): number { return this.regs.cycles; }
  get timeline(): ReadonlyTraceTimeline { return this.trace; }

  atInstructionBoundary(): boolean { return this.ustate === MicroState.FetchOp; }

  reset(pc: Word) {
    this.regs = initialState(pc);
    this.isHalted = false;
    this.reason = null;
    this.ustate = MicroState.FetchOp;
    this.opcodeLatch = 0;
    this.operandLatch = 0;
    this.trace.clear();
  }

  // Throws AddressRangeError when the image does not fit and ByteValueError for a
  // non-byte entry; memory is untouched either way
  loadProgram(bytes: ArrayLike<number>, origin: Word) {
    this.memory.load(origin, bytes);
  }

  write16(addr: Word, value: Word) {
    this.memory.write16(addr, value);
  }

  // Memory helpers: every engine access is recorded as a bus event
  private read(addr: Word, note: BusNote): Byte {
    const a = addr & 0xFFFF;
    const v = this.memory.read(a);
    this.record('Read', a, v, note);
    return v;
  }
  private write(addr: Word, value: Byte, note: BusNote): void {
    const a = addr & 0xFFFF;
    const v = value & 0xFF;
    this.memory.write(a, v);
    this.record('Write', a, v, note);
  }
  private fetch8(note: BusNote): Byte {
    const v = this.read(this.regs.pc, note);
    this.regs.pc = (this.regs.pc + 1) & 0xFFFF;
    return v;
  }

  private record(dir: BusDir, address: Word, data: Byte, note: BusNote) {
    const ev: BusEvent = { cycle: this.regs.cycles, state: this.ustate, dir, address, data, note };
    this.events.push(ev);
    if (this.logBus) {
      // eslint-disable-next-line no-console
      console.log(`[bus] cyc=${ev.cycle} ${ev.state} ${dir === 'Read' ? 'RD' : 'WR'} $${address.toString(16).padStart(4, '0')} = $${data.toString(16).padStart(2, '0')} ${note}`);
    }
  }

  private halt(reason: HaltReason) {
    this.isHalted = true;
    this.reason = reason;
    this.ustate = MicroState.Halted;
  }

  private execute() {
    const info = lookupOpcode(this.opcodeLatch);
    if (!info) { this.halt('illegal-opcode'); return; }
    if (info.halts) { this.halt('hlt'); return; }
    info.exec(this.ctx);
    this.ustate = MicroState.WriteBack;
  }

  // One bus cycle. Halted: no transition, no frame, no cycle.
  stepCycle() {
    if (this.isHalted) return;
    this.events = [];

    switch (this.ustate) {
      case MicroState.FetchOp:
        this.operandLatch = 0;
        this.opcodeLatch = this.fetch8('opcode fetch');
        this.ustate = MicroState.Decode;
        break;
      case MicroState.Decode: {
        // unknown opcodes go straight to Execute, which halts
        const mode = lookupOpcode(this.opcodeLatch)?.mode ?? 'implied';
        this.ustate = mode === 'implied' ? MicroState.Execute : MicroState.FetchOpLo;
        break;
      }
      case MicroState.FetchOpLo:
        this.operandLatch = this.fetch8('operand lo');
        this.ustate = lookupOpcode(this.opcodeLatch)?.mode === 'immediate' ? MicroState.Execute : MicroState.FetchOpHi;
        break;
      case MicroState.FetchOpHi:
        this.operandLatch |= this.fetch8('operand hi') << 8;
        this.ustate = MicroState.Execute;
        break;
      case MicroState.Execute:
        this.execute();
        break;
      case MicroState.WriteBack:
        // boundary only; results were committed in Execute
        this.ustate = MicroState.FetchOp;
        break;
      case MicroState.MemRead:
      case MicroState.MemWrite:
      case MicroState.Halted:
        break;
    }

    const s = this.regs;
    const frame: TraceFrame = {
      cycle: s.cycles, pc: s.pc, a: s.a, b: s.b, x: s.x, sp: s.sp & 0xFF, flags: s.flags,
      opcode: this.opcodeLatch, state: this.ustate, events: this.events,
    };
    this.trace.push(frame);
    s.cycles++;
  }

  private runToBoundary() {
    do { this.stepCycle(); } while (!this.atInstructionBoundary() && !this.isHalted);
  }

  // Drain a partly executed instruction to the next boundary, then run one full instruction
  stepInstruction() {
    if (this.isHalted) return;
    if (!this.atInstructionBoundary()) this.runToBoundary();
    if (this.halted) return;
    this.runToBoundary();
  }
}
