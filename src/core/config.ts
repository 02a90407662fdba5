import { type Env, processEnv, getEnvFlag, getEnvInt, getEnvHexByte } from '@utils/env';

export interface EngineConfig {
  // Frames kept by the trace timeline (Infinity keeps everything)
  traceRetain: number;
  // Log every bus event as it happens
  logBus: boolean;
  // Fill byte for memory at construction
  ramInit: number | null;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  traceRetain: Infinity,
  logBus: false,
  ramInit: null,
};

export function loadEngineConfig(env: Env = processEnv()): EngineConfig {
  return {
    traceRetain: getEnvInt('MICROTRACE_RETAIN', env) ?? DEFAULT_ENGINE_CONFIG.traceRetain,
    logBus: getEnvFlag('MICROTRACE_LOG_BUS', env),
    ramInit: getEnvHexByte('MICROTRACE_RAM_INIT', env),
  };
}
