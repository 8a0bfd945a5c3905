import { isBackendKind, type BackendKind } from "./core/impl/queryEngine.js";

export interface Config {
  port: number;
  metricsEnabled: boolean;
  /** Weighted word list loaded at startup; the engine starts empty without one. */
  dictionaryPath?: string;
  backend: BackendKind;
  /** Largest `k` accepted by the HTTP surface. */
  maxK: number;
  logRequests: boolean;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function intVar(env: Env, name: string, fallback: number, min: number, max: number, problems: string[]): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    problems.push(`${name} must be an integer between ${min} and ${max}`);
    return fallback;
  }
  return n;
}

export function loadConfig(env: Env = process.env): Config {
  const problems: string[] = [];

  const port = intVar(env, "PORT", 3000, 0, 65535, problems);
  const maxK = intVar(env, "MAX_K", 100, 1, 10000, problems);

  const backendRaw = env.AUTOCOMPLETE_BACKEND || "trie";
  let backend: BackendKind = "trie";
  if (isBackendKind(backendRaw)) backend = backendRaw;
  else problems.push("AUTOCOMPLETE_BACKEND must be one of: trie, sorted-array, brute-force");

  if (problems.length) throw new ConfigError(problems);

  return {
    port,
    metricsEnabled: env.METRICS_ENABLED === "1",
    dictionaryPath: env.DICTIONARY_PATH || undefined,
    backend,
    maxK,
    logRequests: env.LOG_REQUESTS !== "0",
  };
}
