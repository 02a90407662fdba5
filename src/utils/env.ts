// Environment switches, read the same way everywhere (empty counts as unset)
export type Env = Record<string, string | undefined>;

export function processEnv(): Env {
  return typeof process !== 'undefined' ? process.env : {};
}

export function getEnv(name: string, env: Env = processEnv()): string | null {
  const v = env[name];
  return v && v.length > 0 ? v : null;
}

export function getEnvFlag(name: string, env: Env = processEnv()): boolean {
  return getEnv(name, env) === '1';
}

// Positive decimal integer, or null when unset/invalid
export function getEnvInt(name: string, env: Env = processEnv()): number | null {
  const v = getEnv(name, env);
  if (v === null || !/^\d+$/.test(v)) return null;
  const n = parseInt(v, 10);
  return n > 0 ? n : null;
}

// Hex byte such as "ff" or "0xFF"
export function getEnvHexByte(name: string, env: Env = processEnv()): number | null {
  const v = getEnv(name, env);
  if (v === null) return null;
  const m = /^(0x)?([0-9a-fA-F]{1,2})$/.exec(v);
  return m ? parseInt(m[2], 16) & 0xFF : null;
}
