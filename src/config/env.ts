import { ConfigurationError } from "../errors/app.errors";

export type EnvSource = Record<string, string | undefined>;

/**
 * Read a variable by its canonical name or its lower-case form
 */
export function read(key: string, env: EnvSource = process.env): string | undefined {
  const raw = env[key] ?? env[key.toLowerCase()];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === "" ? undefined : trimmed;
}

export function envStr(key: string, defaultValue: string, env: EnvSource = process.env): string {
  return read(key, env) ?? defaultValue;
}

export function envOptional(key: string, env: EnvSource = process.env): string | undefined {
  return read(key, env);
}

export function envNum(key: string, defaultValue: number, env: EnvSource = process.env): number {
  const raw = read(key, env);
  if (raw === undefined) return defaultValue;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return parsed;
}

export function envBool(key: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const raw = read(key, env)?.toLowerCase();
  if (raw === undefined) return defaultValue;
  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  throw new ConfigurationError(`${key} must be a boolean, got "${raw}"`);
}

export function envEnum<T extends string>(
  key: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  const raw = read(key, env);
  if (raw === undefined) return defaultValue;
  const match = allowed.find(
    (value) => value === raw || value === raw.toLowerCase() || value === raw.toUpperCase(),
  );
  if (match === undefined) {
    throw new ConfigurationError(`${key} must be one of ${allowed.join(", ")}, got "${raw}"`);
  }
  return match;
}

/**
 * Comma-separated list, empty entries dropped
 */
export function envList(key: string, env: EnvSource = process.env): string[] {
  const raw = read(key, env);
  if (raw === undefined) return [];
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
