export const GATE_ENCODING = "encoding" as const;
export const GATE_PROMPT_SHAPE = "prompt_shape" as const;

export interface GateOutput {
  gateName: string;
  status: "pass" | "fail" | "warn";
  summary: string;
  metadata?: Record<string, unknown>;
}
