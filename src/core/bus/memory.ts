import type { Byte, Word } from '@core/cpu/types';

export const MEM_SIZE = 0x10000;

export class AddressRangeError extends Error {
  constructor(readonly start: number, readonly length: number) {
    super(`Address range exceeded: $${start.toString(16).toUpperCase()} + ${length} bytes does not fit in $0000-$FFFF`);
    this.name = 'AddressRangeError';
  }
}

export class ByteValueError extends Error {
  constructor(readonly offset: number, readonly value: number) {
    super(`Not a byte at offset ${offset}: ${value}`);
    this.name = 'ByteValueError';
  }
}

// Index of the first entry that is not an integer in 0..255, or -1
export function findNonByte(data: ArrayLike<number>): number {
  for (let i = 0; i < data.length; i++) {
    const v = data[i];
    if (!Number.isInteger(v) || v < 0 || v > 0xFF) return i;
  }
  return -1;
}

export function checkRange(start: number, length: number): void {
  if (!Number.isInteger(start) || start < 0 || start > 0xFFFF || length < 0 || start + length > MEM_SIZE) {
    throw new AddressRangeError(start, length);
  }
}

// Flat 64KB address space. read/write wrap and never fault; the bulk helpers
// check their range up front and leave memory untouched on failure.
export class Memory {
  private ram = new Uint8Array(MEM_SIZE);

  constructor(fill: Byte | null = null) {
    if (fill !== null) this.ram.fill(fill & 0xFF);
  }

  // Read-only view for collaborators (viewers, dumps)
  get bytes(): Readonly<Uint8Array> { return this.ram; }

  read(addr: Word): Byte {
    return this.ram[addr & 0xFFFF];
  }

  write(addr: Word, value: Byte): void {
    this.ram[addr & 0xFFFF] = value & 0xFF;
  }

  // Every entry must already be a byte; nothing is masked
  load(origin: Word, data: ArrayLike<number>): void {
    checkRange(origin, data.length);
    const bad = findNonByte(data);
    if (bad >= 0) throw new ByteValueError(bad, data[bad]);
    this.ram.set(Uint8Array.from(data), origin);
  }

  write16(addr: Word, value: Word): void {
    checkRange(addr, 2);
    this.ram[addr] = value & 0xFF;
    this.ram[addr + 1] = (value >>> 8) & 0xFF;
  }

  read16(addr: Word): Word {
    return this.read(addr) | (this.read((addr + 1) & 0xFFFF) << 8);
  }

  slice(start: Word, length: number): Uint8Array {
    checkRange(start, length);
    return this.ram.slice(start, start + length);
  }
}
