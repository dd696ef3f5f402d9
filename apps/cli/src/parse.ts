/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { ConfigError } from "@ocrsets/core";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new ConfigError({ message: `Missing required argument: --${key}${label ? ` (${label})` : ""}` });
  }
  return val;
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  return optIntArg(kv, key) ?? defaultVal;
}

export function optIntArg(kv: Record<string, string>, key: string): number | undefined {
  const val = kv[key];
  if (!val) return undefined;
  const n = parseInt(val, 10);
  if (Number.isNaN(n)) throw new ConfigError({ message: `--${key} must be an integer, got "${val}"` });
  return n;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function boolArg(kv: Record<string, string>, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

/** Load a JSON config file and merge with CLI overrides. */
export async function loadConfig(kv: Record<string, string>): Promise<Record<string, string>> {
  const configPath = kv["config"];
  if (!configPath) return kv;
  const fs = await import("node:fs/promises");
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(configPath, "utf-8"));
  } catch (cause) {
    throw new ConfigError({ message: `Failed to read config at ${configPath}`, cause });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError({ message: `Config at ${configPath} must be a JSON object` });
  }
  const config: Record<string, string> = {};
  for (const [k, v] of Object.entries(parsed)) config[k] = String(v);
  // CLI overrides take precedence
  return { ...config, ...kv };
}
