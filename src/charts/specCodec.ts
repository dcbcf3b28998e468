/**
 * Codec for the chart specification a report embeds as
 * `const spec = JSON.parse("<escaped json>");`.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

const SPEC_LITERAL = /const spec = JSON\.parse\("([\s\S]*?)"\);/;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The escaped literal between the quotes, exactly as it appears in the block. */
export function findEmbeddedSpecLiteral(blockText: string): string | null {
  const match = SPEC_LITERAL.exec(blockText);
  return match?.[1] ?? null;
}

/** Reverses `\\`, `\"` and `\n` escapes, in that order, without validating. */
export function unescapeLoosely(escaped: string): string {
  return escaped.replaceAll("\\\\", "\\").replaceAll('\\"', '"').replaceAll("\\n", "\n");
}

function unescapeStrictly(escaped: string): string {
  const decoded: unknown = JSON.parse(`"${escaped}"`);
  if (typeof decoded !== "string") {
    throw new TypeError("Escaped literal did not decode to a string");
  }
  return decoded;
}

/**
 * Decodes the literal into the specification object. Falls back to the loose
 * unescape when the literal is not a valid string literal. Throws when the
 * result is not a JSON object.
 */
export function decodeEmbeddedSpec(escaped: string): JsonObject {
  let json: string;
  try {
    json = unescapeStrictly(escaped);
  } catch {
    json = unescapeLoosely(escaped);
  }

  const parsed: unknown = JSON.parse(json);
  if (!isJsonObject(parsed)) {
    throw new TypeError("Embedded chart specification is not a JSON object");
  }
  return parsed;
}

/** Compact JSON with `\`, `"` and newlines escaped, in that order. */
export function encodeEmbeddedSpec(spec: JsonObject): string {
  return JSON.stringify(spec).replaceAll("\\", "\\\\").replaceAll('"', '\\"').replaceAll("\n", "\\n");
}
