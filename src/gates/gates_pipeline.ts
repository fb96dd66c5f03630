import type { EncodingConfig } from "../control-plane/advisor_config";
import { applyEncodingGate, type EncodingDecision } from "./encoding_gate";
import { GATE_ENCODING, GATE_PROMPT_SHAPE, type GateOutput } from "./gate_interfaces";

export type AdmissionFailReason = "admission_fail_fast" | "empty_prompt";

export type AdmissionOutput = {
  results: GateOutput[];
  text: string;
  encoding: EncodingDecision;
  failFast: boolean;
  failReason?: AdmissionFailReason;
};

/**
 * Run the admission gates
 *
 * Ordering:
 * 1. Encoding (normalize, score, repair)
 * 2. Prompt shape (non-blank after repair)
 */
export function runAdmissionGates(prompt: string, encodingConfig: EncodingConfig): AdmissionOutput {
  const { text, decision } = applyEncodingGate(prompt, encodingConfig);
  const blank = text.trim().length === 0;

  const results: GateOutput[] = [
    {
      gateName: GATE_ENCODING,
      status: decision.decision === "fail_fast" ? "fail" : decision.decision === "repair" ? "warn" : "pass",
      summary: `Encoding: ${decision.decision}, score=${decision.mojibake_score.toFixed(3)}`,
      metadata: {
        decision: decision.decision,
        mojibakeScore: decision.mojibake_score,
        encodingGuess: decision.encoding_guess,
        reasonCodes: decision.reason_codes,
        fingerprint: decision.input_fingerprint,
      },
    },
    {
      gateName: GATE_PROMPT_SHAPE,
      status: blank ? "fail" : "pass",
      summary: `Prompt chars: ${text.length}`,
      metadata: { charCount: text.length, blank },
    },
  ];

  const failReason: AdmissionFailReason | undefined =
    decision.decision === "fail_fast" ? "admission_fail_fast" : blank ? "empty_prompt" : undefined;

  return {
    results,
    text,
    encoding: decision,
    failFast: failReason !== undefined,
    ...(failReason ? { failReason } : {}),
  };
}
