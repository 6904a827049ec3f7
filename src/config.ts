// src/config.ts

export type Env = Record<string, string | undefined>;

/**
 * Generation cap of the solve service when TILEWALK_WS_MAX_GENERATIONS is
 * unset. The search runs inside the socket handler and blocks every client
 * until it returns.
 */
export const DEFAULT_WS_MAX_GENERATIONS = 40;

export type SolverConfig = {
  wsPort: number;

  // solve service cap; 0 = unbounded
  wsMaxGenerations: number;

  // CLI default cap; 0 = unbounded
  maxGenerations: number;

  // log one line per search generation
  trace: boolean;
};

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

export function loadConfig(env: Env = process.env): SolverConfig {
  return {
    wsPort: envInt(env, "TILEWALK_WS_PORT", 8797),
    wsMaxGenerations: Math.max(0, envInt(env, "TILEWALK_WS_MAX_GENERATIONS", DEFAULT_WS_MAX_GENERATIONS)),
    maxGenerations: Math.max(0, envInt(env, "TILEWALK_MAX_GENERATIONS", 0)),
    trace: envFlag(env, "TILEWALK_TRACE", false),
  };
}
