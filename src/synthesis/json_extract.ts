export type JsonObject = Record<string, unknown>;

export type JsonExtractResult =
  | { ok: true; value: JsonObject }
  | { ok: false; error: "empty_output" | "invalid_json" };

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;
const TRAILING_COMMA = /,\s*([}\]])/g;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function cleanNoise(text: string): string {
  return text
    .replace(/^\uFEFF/, "")
    .trim()
    .replace(/^json\s*:/i, "")
    .trim();
}

function straightenQuotes(text: string): string {
  return text.replace(/[\u201C\u201D\u201E\u201F]/g, '"').replace(/[\u2018\u2019\u201A\u201B]/g, "'");
}

function candidates(text: string): string[] {
  const out = [text];
  const fenced = text.match(FENCED_BLOCK);
  if (fenced?.[1]) out.push(fenced[1].trim());
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start !== -1 && end > start) out.push(text.slice(start, end + 1));
  return out;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function coerceObject(value: unknown, depth = 0): JsonObject | undefined {
  if (isJsonObject(value)) return value;
  if (Array.isArray(value) && isJsonObject(value[0])) return value[0];
  if (typeof value === "string" && depth === 0) {
    return coerceObject(tryParse(value.trim()), depth + 1);
  }
  return undefined;
}

/**
 * Parse exactly one JSON object out of model text, tolerating code fences,
 * smart quotes, a `json:` prefix, surrounding prose and trailing commas.
 * Smart quotes are straightened only when no candidate parses as written,
 * so curly quotes inside valid string values survive.
 */
export function extractJsonObject(raw: string): JsonExtractResult {
  const text = cleanNoise(raw ?? "");
  if (!text) return { ok: false, error: "empty_output" };

  for (const source of [text, straightenQuotes(text)]) {
    for (const candidate of candidates(source)) {
      for (const variant of [candidate, candidate.replace(TRAILING_COMMA, "$1")]) {
        const value = coerceObject(tryParse(variant));
        if (value) return { ok: true, value };
      }
    }
  }
  return { ok: false, error: "invalid_json" };
}
