/**
 * Value coercion and display formatting shared by fact extraction and the
 * renderers. Every `value_text` a fact carries is produced here, so the
 * grounding validator and the renderers agree on the exact spelling of a
 * number.
 */

export function safeFloat(value: unknown): number | undefined {
  if (value === null || value === undefined || typeof value === "boolean") return undefined;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value !== "string") return undefined;
  const text = value.trim().replace(/,/g, "");
  if (!text) return undefined;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** First run of digits in a value such as `"180d"` or `"6 months"`. */
export function parseIntFromValue(raw: unknown, fallback: number): number {
  if (raw === null || raw === undefined || typeof raw === "boolean") return fallback;
  if (typeof raw === "number") return Number.isFinite(raw) ? Math.trunc(raw) : fallback;
  const match = String(raw).match(/\d+/);
  return match ? Number.parseInt(match[0], 10) : fallback;
}

export function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

export function sanitizeTimeframe(raw: unknown, fallback: string): string {
  const text = String(raw ?? "").trim().toLowerCase();
  const cleaned = text.replace(/[^a-z0-9_-]/g, "");
  return cleaned || fallback;
}

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

export function fmtMoney(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  const sign = rounded < 0 ? "-" : "";
  const abs = Math.abs(rounded);
  if (Math.abs(abs - Math.round(abs)) < 0.01) {
    return `${sign}${groupThousands(String(Math.round(abs)))}`;
  }
  const [whole, fraction] = abs.toFixed(2).split(".");
  return `${sign}${groupThousands(whole)}.${fraction}`;
}

export function fmtSignedMoney(value: number): string {
  return `${value < 0 ? "-" : "+"}${fmtMoney(Math.abs(value))}`;
}

/** Ratios (0.27) and already-scaled percentages (27.5) both render as `27.xx%`. */
export function fmtPct(value: number): string {
  if (Math.abs(value) > 1) return `${value.toFixed(2)}%`;
  return `${(value * 100).toFixed(2)}%`;
}

export function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, item) => sum + item, 0) / values.length;
}

export function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].filter(Boolean).sort();
}

/** Code-point ordering, independent of the host locale. */
export function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
