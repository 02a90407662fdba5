import type { Word } from '@core/cpu/types';
import type { MicroCPU } from '@core/cpu/cpu';
import { MEM_SIZE, findNonByte } from '@core/bus/memory';

export type HexParseResult =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; error: string; line: number; token?: string };

export type LoadResult =
  | { ok: true; origin: Word; length: number }
  | { ok: false; error: string };

const HEX_RE = /^[0-9a-fA-F]+$/;

function stripComment(line: string): string {
  const hash = line.search(/[#;]/);
  const cut = hash >= 0 ? line.slice(0, hash) : line;
  const slashes = cut.indexOf('//');
  return slashes >= 0 ? cut.slice(0, slashes) : cut;
}

/**
 * Parse hex-byte text such as `10 2A 13 00 FF 20`.
 *
 * Comments start at `#`, `;` or `//`. Within a token `,` and `_` are ignored and a
 * `0x`/`0X` prefix is dropped. Any bad token fails the whole parse.
 */
export function parseHexBytes(text: string): HexParseResult {
  const out: number[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    for (const raw of stripComment(lines[i]).split(/\s+/)) {
      let tok = raw.replace(/[,_]/g, '');
      if (tok.length > 2 && tok[0] === '0' && (tok[1] === 'x' || tok[1] === 'X')) tok = tok.slice(2);
      if (tok.length === 0) continue;
      if (!HEX_RE.test(tok)) return { ok: false, error: 'non-hex token', line: lineNo, token: tok };
      const v = parseInt(tok, 16);
      if (v > 0xFF) return { ok: false, error: 'byte out of range', line: lineNo, token: tok };
      out.push(v);
    }
  }
  if (out.length === 0) return { ok: false, error: 'no bytes', line: lines.length };
  return { ok: true, bytes: Uint8Array.from(out) };
}

// Range is checked before anything is written, so a failed load leaves memory as it was
export function loadImage(cpu: MicroCPU, bytes: ArrayLike<number>, origin: Word): LoadResult {
  if (!Number.isInteger(origin) || origin < 0 || origin > 0xFFFF) {
    return { ok: false, error: `origin out of range: ${origin}` };
  }
  if (origin + bytes.length > MEM_SIZE) {
    return { ok: false, error: `image too large for memory at $${origin.toString(16).toUpperCase().padStart(4, '0')}` };
  }
  const bad = findNonByte(bytes);
  if (bad >= 0) return { ok: false, error: `not a byte at offset ${bad}: ${bytes[bad]}` };
  cpu.loadProgram(bytes, origin);
  return { ok: true, origin, length: bytes.length };
}

export function loadHexText(cpu: MicroCPU, text: string, origin: Word): LoadResult {
  const parsed = parseHexBytes(text);
  if (!parsed.ok) {
    const at = parsed.token !== undefined ? ` '${parsed.token}'` : '';
    return { ok: false, error: `${parsed.error}${at} at line ${parsed.line}` };
  }
  return loadImage(cpu, parsed.bytes, origin);
}
