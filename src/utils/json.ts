// This utility module keeps JSON parse operations explicit about their failure mode.

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; message: string };

// This helper parses untrusted JSON text and reports the parser message instead of throwing.
export function tryParseJson(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

// This helper narrows parsed JSON to a plain object, rejecting arrays and null.
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// This helper returns a bounded JSON preview for diagnostics logs.
export function previewJson(value: unknown, maxLength = 300): string {
  let serialized: string;
  try {
    serialized = JSON.stringify(value) ?? String(value);
  } catch {
    serialized = String(value);
  }

  return serialized.slice(0, maxLength);
}
