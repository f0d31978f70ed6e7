import path from "path";
import { InvalidArgumentError } from "./errors";
import { DEFAULT_MAX_TURNS } from "./engine";

export interface AppConfig {
  port: number;
  maxTurns: number;
  defaultSeed?: number;
  customDexFile: string;
}

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, key: string, fallback: number, min: number): number {
  const value = Number(env[key] || fallback);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new InvalidArgumentError(`${key} must be an integer >= ${min}, got "${env[key]}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: intFromEnv(env, "PORT", 3000, 0),
    maxTurns: intFromEnv(env, "BATTLE_MAX_TURNS", DEFAULT_MAX_TURNS, 1),
    defaultSeed: env.BATTLE_SEED ? intFromEnv(env, "BATTLE_SEED", 0, 0) : undefined,
    customDexFile: path.resolve(process.cwd(), env.CUSTOM_DEX_FILE || path.join("data", "customdex.json")),
  };
}
