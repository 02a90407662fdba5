import { describe, it, expect } from 'vitest';
import { Debugger, parseHexArg } from '@host/cli/debugger';
import { demoProgram } from '@core/program/demo';
import { cpuWithProgram } from '../helpers/cpuh';

const countdown = [0x10, 0x03, 0x26, 0x32, 0x02, 0x00, 0xFF];

function files(entries: Record<string, Uint8Array>) {
  return (path: string): Uint8Array => {
    const data = entries[path];
    if (data === undefined) throw new Error(`ENOENT: ${path}`);
    return data;
  };
}

function dbgFor(bytes: number[], watchdog?: number, readFile = files({})) {
  return new Debugger({ cpu: cpuWithProgram(bytes), readFile, watchdog });
}

const lines = (d: Debugger, cmd: string) => d.execute(cmd).lines;

describe('parseHexArg', () => {
  it('accepts bare, 0x and $ forms', () => {
    expect(parseHexArg('1234')).toBe(0x1234);
    expect(parseHexArg('0x12')).toBe(0x12);
    expect(parseHexArg('$ffff')).toBe(0xFFFF);
  });

  it('rejects junk and values over the limit', () => {
    expect(parseHexArg(undefined)).toBeNull();
    expect(parseHexArg('10000')).toBeNull();
    expect(parseHexArg('g1')).toBeNull();
    expect(parseHexArg('100', 0xFF)).toBeNull();
  });
});

describe('Debugger', () => {
  it('steps instructions and cycles', () => {
    const d = dbgFor([0x10, 0x05]);
    expect(lines(d, 'c')).toEqual(['PC=0001  A=00  B=00  X=00  SP=01FF  F=00 [----]  ustate=DEC  cycles=1']);
    expect(lines(d, 's')).toEqual(['PC=0002  A=05  B=00  X=00  SP=01FF  F=00 [----]  ustate=FET  cycles=5']);
  });

  it('shows the tail of the trace', () => {
    const d = dbgFor([0x10, 0x05]);
    expect(lines(d, 't')).toEqual(['(no trace yet)']);
    d.execute('s');
    expect(lines(d, 't 2')).toEqual([
      '3  0002  10  05 00 00 00  WBK  events:0',
      '4  0002  10  05 00 00 00  FET  events:0',
    ]);
  });

  it('g stops at a breakpoint and stays there until stepped past', () => {
    const d = dbgFor(countdown);
    expect(lines(d, 'b 3')).toEqual(['Breakpoint added at PC=0003']);
    const hit = [
      '* Breakpoint hit at PC=0003',
      'PC=0003  A=02  B=00  X=00  SP=01FF  F=00 [----]  ustate=FET  cycles=9',
    ];
    expect(lines(d, 'g')).toEqual(hit);
    expect(lines(d, 'g')).toEqual(hit);
    d.execute('s');
    expect(lines(d, 'g')[0]).toBe('* Breakpoint hit at PC=0003');
    expect(d.cpu.state.a).toBe(0x01);
  });

  it('g runs to halt without breakpoints', () => {
    const d = dbgFor(countdown);
    expect(lines(d, 'g')).toEqual(['PC=0007  A=00  B=00  X=00  SP=01FF  F=02 [--Z-]  ustate=HLT  cycles=38']);
  });

  it('g gives up at the watchdog limit', () => {
    const d = dbgFor([0x30, 0x00, 0x00], 5);
    expect(lines(d, 'g')).toEqual([
      '* Watchdog limit reached (5 instructions)',
      'PC=0000  A=00  B=00  X=00  SP=01FF  F=00 [----]  ustate=FET  cycles=30',
    ]);
  });

  it('r N runs up to N instructions and honours breakpoints', () => {
    const d = dbgFor(countdown);
    d.execute('b 6');
    const out = lines(d, 'r 100');
    expect(out[0]).toBe('* Breakpoint hit at PC=0006');
    expect(d.cpu.state.a).toBe(0);
    expect(d.cpu.halted).toBe(false);
  });

  it('lists and clears breakpoints', () => {
    const d = dbgFor(countdown);
    d.execute('b 20');
    d.execute('b $3');
    expect(lines(d, 'bl')).toEqual([' - 0003', ' - 0020']);
    expect(lines(d, 'bc 3')).toEqual(['Cleared 0003']);
    expect(lines(d, 'bl')).toEqual([' - 0020']);
    expect(lines(d, 'bc')).toEqual(['Breakpoints cleared.']);
    expect(lines(d, 'bl')).toEqual(['(no breakpoints)']);
  });

  it('dumps and pokes memory', () => {
    const d = dbgFor([0x10, 0x05]);
    expect(lines(d, 'w 10 ab')).toEqual(['Wrote AB to [0010]']);
    expect(lines(d, 'm 0 2')).toEqual([
      '0000: 10 05 00 00 00 00 00 00 00 00 00 00 00 00 00 00',
      '0010: AB 00 00 00 00 00 00 00 00 00 00 00 00 00 00 00',
    ]);
    expect(lines(d, 'w 10 100')).toEqual(['usage: w ADDR BYTE']);
    expect(lines(d, 'm')).toEqual(['usage: m ADDR [ROWS]']);
  });

  it('a direct poke leaves the trace alone', () => {
    const d = dbgFor([0x10, 0x05]);
    d.execute('w 10 ab');
    expect(d.cpu.timeline.length).toBe(0);
  });

  it('reports output port bytes', () => {
    const d = dbgFor(demoProgram());
    expect(lines(d, 'out')).toEqual(['(no output)']);
    d.execute('r 11');
    expect(lines(d, 'out')).toEqual(['OUT FF00: 00 F7']);
  });

  it('captures port writes with a one-frame trace window', () => {
    const d = new Debugger({ cpu: cpuWithProgram(demoProgram(), 0, { traceRetain: 1 }), readFile: files({}) });
    d.execute('r 11');
    expect(d.cpu.timeline.length).toBe(1);
    expect(lines(d, 'out')).toEqual(['OUT FF00: 00 F7']);
  });

  it('s after single cycles drains and still sees the store', () => {
    const d = new Debugger({ cpu: cpuWithProgram([0x10, 0x42, 0x13, 0x00, 0xFF], 0, { traceRetain: 1 }), readFile: files({}) });
    d.execute('c');
    d.execute('c');
    expect(lines(d, 's')).toEqual(['PC=0005  A=42  B=00  X=00  SP=01FF  F=00 [----]  ustate=FET  cycles=11']);
    expect(lines(d, 'out')).toEqual(['OUT FF00: 42']);
  });

  it('reset uses the reset vector and clears output', () => {
    const d = dbgFor(demoProgram());
    d.execute('r 3');
    expect(lines(d, 'setrv 0200')).toEqual(['[setrv] reset vector set to 0200']);
    expect(lines(d, 'reset')).toEqual([
      'Reset done.',
      'PC=0200  A=00  B=00  X=00  SP=01FF  F=00 [----]  ustate=FET  cycles=0',
    ]);
    expect(lines(d, 'out')).toEqual(['(no output)']);
  });

  it('disassembles from an address', () => {
    const d = dbgFor([0x10, 0x05]);
    expect(lines(d, 'd 0 2')).toEqual([
      '0000:  10 05      LDA #$05' + ' '.repeat(8) + '; A <- imm',
      '0002:  00' + ' '.repeat(9) + 'NOP' + ' '.repeat(13) + '; no operation',
    ]);
  });

  it('loads hex text and binaries through readFile', () => {
    const readFile = files({
      'prog.hex': new TextEncoder().encode('10 07 ; LDA #7\nFF\n'),
      'big.bin': Uint8Array.from([1, 2]),
      'bad.hex': new TextEncoder().encode('10 xx'),
    });
    const d = dbgFor([0x00], undefined, readFile);
    expect(lines(d, 'loadhex prog.hex 0300')).toEqual(['[loadhex] loaded 3 bytes at 0300']);
    expect(d.cpu.memory.read(0x0301)).toBe(0x07);
    expect(lines(d, 'loadbin big.bin FFFF')).toEqual(['[loadbin] image too large for memory at $FFFF']);
    expect(lines(d, 'loadhex bad.hex 0')).toEqual(["[loadhex] non-hex token 'xx' at line 1"]);
    expect(lines(d, 'loadbin missing.bin 0')).toEqual(["[loadbin] failed to read 'missing.bin': ENOENT: missing.bin"]);
    expect(lines(d, 'loadbin big.bin')).toEqual(['usage: loadbin PATH ADDR']);
  });

  it('handles help, unknown commands, blank lines and quit', () => {
    const d = dbgFor([0x00]);
    expect(lines(d, 'help')[0]).toBe('Commands:');
    expect(lines(d, 'zap')).toEqual(["Unknown command. Type 'help'."]);
    expect(d.execute('   ')).toEqual({ lines: [], quit: false });
    expect(d.execute('quit')).toEqual({ lines: [], quit: true });
  });

  it('stepping a halted CPU is a no-op', () => {
    const d = dbgFor([0xFF]);
    d.execute('s');
    expect(lines(d, 's')).toEqual(['PC=0001  A=00  B=00  X=00  SP=01FF  F=00 [----]  ustate=HLT  cycles=3']);
  });
});
