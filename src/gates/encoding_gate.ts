import { createHash } from "node:crypto";

import type { EncodingConfig, NormalizationForm } from "../control-plane/advisor_config";

export type EncodingDecisionName = "pass" | "repair" | "fail_fast";

export type RepairStrategy = "latin1_to_utf8" | "cp1252_to_utf8";

export type EncodingDecision = {
  schema_version: "encoding_decision_v1";
  decision: EncodingDecisionName;
  mojibake_score: number;
  repair_applied: boolean;
  encoding_guess: RepairStrategy | "";
  reason_codes: string[];
  input_fingerprint: string;
};

export type EncodingGateResult = {
  text: string;
  decision: EncodingDecision;
};

// Byte sequences that UTF-8 text turns into after a Latin-1/CP1252 round trip.
const MOJIBAKE_PATTERNS = ["Ã", "Â", "á»", "â€", "Æ"] as const;
const CONTROL_ALLOWLIST = new Set(["\n", "\r", "\t"]);
const OTHER_CATEGORY = /^\p{C}$/u;
const REPAIR_STRATEGIES: readonly RepairStrategy[] = ["latin1_to_utf8", "cp1252_to_utf8"];

const REPLACEMENT_WEIGHT = 0.65;
const PATTERN_WEIGHT = 2.5;
const CONTROL_WEIGHT = 1.8;

export const DEFAULT_ENCODING_CONFIG: EncodingConfig = {
  enabled: true,
  repairEnabled: true,
  repairScoreMin: 0.12,
  failfastScoreMin: 0.45,
  repairMinDelta: 0.1,
  normalizationForm: "NFC",
};

// CP1252 assigns printable characters to most of 0x80..0x9F.
const CP1252_HIGH: ReadonlyMap<number, number> = new Map([
  [0x20ac, 0x80], [0x201a, 0x82], [0x0192, 0x83], [0x201e, 0x84], [0x2026, 0x85],
  [0x2020, 0x86], [0x2021, 0x87], [0x02c6, 0x88], [0x2030, 0x89], [0x0160, 0x8a],
  [0x2039, 0x8b], [0x0152, 0x8c], [0x017d, 0x8e], [0x2018, 0x91], [0x2019, 0x92],
  [0x201c, 0x93], [0x201d, 0x94], [0x2022, 0x95], [0x2013, 0x96], [0x2014, 0x97],
  [0x02dc, 0x98], [0x2122, 0x99], [0x0161, 0x9a], [0x203a, 0x9b], [0x0153, 0x9c],
  [0x017e, 0x9e], [0x0178, 0x9f],
]);

const clamp01 = (value: number) => Math.max(0, Math.min(1, value));

function codePoints(text: string): string[] {
  return Array.from(text);
}

function countOccurrences(text: string, pattern: string): number {
  let count = 0;
  let index = text.indexOf(pattern);
  while (index !== -1) {
    count += 1;
    index = text.indexOf(pattern, index + pattern.length);
  }
  return count;
}

export function fingerprint(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex").slice(0, 16);
}

export function scoreMojibake(text: string): { score: number; reasons: string[] } {
  const chars = codePoints(text);
  const length = Math.max(1, chars.length);
  if (chars.length === 0) return { score: 0, reasons: ["clean_utf8"] };

  const replacementRatio = chars.filter((char) => char === "\uFFFD").length / length;
  const patternHits = MOJIBAKE_PATTERNS.reduce((sum, pattern) => sum + countOccurrences(text, pattern), 0);
  const patternRatio = patternHits / length;
  const controlRatio =
    chars.filter((char) => !CONTROL_ALLOWLIST.has(char) && OTHER_CATEGORY.test(char)).length / length;

  const reasons: string[] = [];
  if (replacementRatio > 0) reasons.push("replacement_char_detected");
  if (patternRatio > 0) reasons.push("mojibake_pattern_detected");
  if (controlRatio > 0) reasons.push("control_char_detected");
  if (reasons.length === 0) reasons.push("clean_utf8");

  const score =
    replacementRatio * REPLACEMENT_WEIGHT + patternRatio * PATTERN_WEIGHT + controlRatio * CONTROL_WEIGHT;
  return { score: clamp01(score), reasons };
}

function encodeSingleByte(text: string, strategy: RepairStrategy): Uint8Array | undefined {
  const bytes: number[] = [];
  for (const char of text) {
    const cp = char.codePointAt(0) ?? 0;
    if (strategy === "latin1_to_utf8") {
      if (cp > 0xff) return undefined;
      bytes.push(cp);
      continue;
    }
    if (cp < 0x80 || (cp >= 0xa0 && cp <= 0xff)) {
      bytes.push(cp);
      continue;
    }
    const mapped = CP1252_HIGH.get(cp);
    if (mapped === undefined) return undefined;
    bytes.push(mapped);
  }
  return Uint8Array.from(bytes);
}

/** Reinterpret text as single-byte encoded UTF-8. Undefined when the bytes do not round-trip. */
export function attemptRepair(text: string, strategy: RepairStrategy): string | undefined {
  const bytes = encodeSingleByte(text, strategy);
  if (!bytes) return undefined;
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) return undefined;
    throw err;
  }
}

function normalize(text: string, form: NormalizationForm): string {
  return text.normalize(form);
}

function finalizeReasons(reasons: string[], form: NormalizationForm): string[] {
  return [...new Set([...reasons, `normalized_${form.toLowerCase()}`])].sort();
}

/**
 * Admission gate: canonicalise the prompt, score it for mojibake, try the
 * reverse-encoding repairs, and decide pass / repair / fail_fast.
 */
export function applyEncodingGate(
  prompt: string,
  config: EncodingConfig = DEFAULT_ENCODING_CONFIG
): EncodingGateResult {
  const form = config.normalizationForm;
  const normalized = normalize(prompt, form);
  const inputFingerprint = fingerprint(prompt);
  const { score, reasons } = scoreMojibake(normalized);

  if (!config.enabled) {
    return {
      text: normalized,
      decision: {
        schema_version: "encoding_decision_v1",
        decision: "pass",
        mojibake_score: score,
        repair_applied: false,
        encoding_guess: "",
        reason_codes: finalizeReasons([...reasons, "encoding_gate_disabled"], form),
        input_fingerprint: inputFingerprint,
      },
    };
  }

  let selectedText = normalized;
  let selectedScore = score;
  let selectedGuess: RepairStrategy | "" = "";

  if (config.repairEnabled && score >= Math.max(0, config.repairScoreMin)) {
    const candidates: Array<{ score: number; strategy: RepairStrategy; text: string }> = [];
    for (const strategy of REPAIR_STRATEGIES) {
      const repaired = attemptRepair(normalized, strategy);
      if (repaired === undefined) continue;
      const repairedText = normalize(repaired, form);
      const repairedScore = scoreMojibake(repairedText).score;
      if (score - repairedScore >= config.repairMinDelta) {
        candidates.push({ score: repairedScore, strategy, text: repairedText });
      }
    }

    candidates.sort((a, b) => a.score - b.score || a.strategy.localeCompare(b.strategy));
    const best = candidates[0];
    if (best) {
      selectedText = best.text;
      selectedScore = best.score;
      selectedGuess = best.strategy;
      reasons.push(`repair_applied_${best.strategy}`);
    } else {
      reasons.push("repair_not_improved");
    }
  }

  let decision: EncodingDecisionName = selectedGuess ? "repair" : "pass";
  if (selectedScore >= config.failfastScoreMin) {
    decision = "fail_fast";
    reasons.push("encoding_fail_fast_threshold_exceeded");
  }

  return {
    text: selectedText,
    decision: {
      schema_version: "encoding_decision_v1",
      decision,
      mojibake_score: clamp01(selectedScore),
      repair_applied: selectedGuess !== "",
      encoding_guess: selectedGuess,
      reason_codes: finalizeReasons(reasons, form),
      input_fingerprint: inputFingerprint,
    },
  };
}
