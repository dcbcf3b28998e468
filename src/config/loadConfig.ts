import { readFile } from "node:fs/promises";
import type { ZodError } from "zod";
import { defaultConfig } from "./defaultConfig.js";
import { ConfigSchema } from "./schema.js";
import type { Config } from "./schema.js";

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "config";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Overlays a partial config file on the defaults. Objects merge key by key;
 * arrays and scalars replace the default outright.
 */
export function mergeWithDefaults(overrides: unknown): unknown {
  if (!isPlainObject(overrides)) {
    return overrides;
  }

  function merge(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(patch)) {
      const current = merged[key];
      merged[key] = isPlainObject(current) && isPlainObject(value) ? merge(current, value) : value;
    }
    return merged;
  }

  return merge({ ...defaultConfig }, overrides);
}

export function parseConfig(candidate: unknown): Config {
  const result = ConfigSchema.safeParse(mergeWithDefaults(candidate));
  if (!result.success) {
    throw new Error(`Invalid config: ${formatZodError(result.error)}`);
  }
  return result.data;
}

export async function loadConfig(path: string): Promise<Config> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new Error(`Unable to read config file at ${path}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Invalid JSON in config file at ${path}`, { cause: error });
  }

  return parseConfig(parsed);
}
