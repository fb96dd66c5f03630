import type { AdvisoryContext } from "../src/contracts/evidence";
import type { ToolOutputs } from "../src/contracts/tool_outputs";
import type { ToolCallContext, ToolInvoker } from "../src/tools/tool_client";

export type ToolHandler = (args: Record<string, unknown>, ctx: ToolCallContext) => unknown;

export type RecordedToolCall = {
  name: string;
  args: Record<string, unknown>;
  ctx: ToolCallContext;
};

/** In-process stand-in for the tool gateway. A tool without a handler fails like an unknown RPC method. */
export class ScriptedToolInvoker implements ToolInvoker {
  readonly calls: RecordedToolCall[] = [];
  listCalls = 0;

  constructor(
    private readonly handlers: Record<string, ToolHandler> = {},
    private readonly toolNames: string[] = Object.keys(handlers)
  ) {}

  async call(name: string, args: Record<string, unknown>, ctx: ToolCallContext): Promise<unknown> {
    this.calls.push({ name, args, ctx });
    const handler = this.handlers[name];
    if (!handler) throw new Error(`no handler for ${name}`);
    return handler(args, ctx);
  }

  async listTools(): Promise<string[]> {
    this.listCalls += 1;
    return [...this.toolNames];
  }

  calledTools(): string[] {
    return this.calls.map((call) => call.name);
  }
}

export function returns(value: unknown): ToolHandler {
  return () => value;
}

export function fails(err: Error): ToolHandler {
  return () => {
    throw err;
  };
}

export const SPEND_30D: ToolOutputs["spend-analytics"] = {
  range: "30d",
  total_income: 20_000_000,
  total_spend: 24_500_000,
  net_cashflow: -4_500_000,
};

export const FORECAST_WEEKLY: ToolOutputs["cashflow-forecast"] = {
  points: [
    { income_estimate: 5_000_000, spend_estimate: 6_000_000, p50: -1_000_000 },
    { income_estimate: 5_000_000, spend_estimate: 5_000_000, p50: 0 },
  ],
};

export const JAR_ESSENTIALS: ToolOutputs["jar-allocation-suggest"] = {
  allocations: [{ jar_name: "Essentials", ratio: 0.55, amount: 11_000_000 }],
};

export const ANOMALY_90D: ToolOutputs["anomaly-signals"] = {
  flags: ["income_drop", "change_point"],
  lookback_days: 90,
  change_points: ["2026-09-14"],
  income_drop: { drop_pct: 0.2 },
};

export const RISK_PROFILE_180D: ToolOutputs["risk-profile-non-investment"] = {
  risk_band: "medium",
  emergency_runway_months: 2.5,
  cashflow_volatility: 0.4,
  overspend_propensity: 0.1,
  lookback_days: 180,
};

export function summaryHandlers(): Record<string, ToolHandler> {
  return {
    "spend-analytics": returns(SPEND_30D),
    "cashflow-forecast": returns(FORECAST_WEEKLY),
    "jar-allocation-suggest": returns(JAR_ESSENTIALS),
  };
}

/** A small, hand-built context with one fact, one insight and one action. */
export function cashflowContext(overrides: Partial<AdvisoryContext["policy_flags"]> = {}): AdvisoryContext {
  return {
    intent: "summary",
    facts: [
      {
        fact_id: "spend.net_cashflow.30d",
        label: "Net cashflow",
        value: -4_500_000,
        value_text: "-4,500,000",
        unit: "VND",
        timeframe: "30d",
        source_tool: "spend-analytics",
        source_path: "net_cashflow",
      },
    ],
    insights: [
      {
        insight_id: "insight.cashflow_negative",
        kind: "cashflow",
        severity: "high",
        message_seed: "Net cashflow is negative.",
        supporting_fact_ids: ["spend.net_cashflow.30d"],
      },
    ],
    actions: [
      {
        action_id: "stabilize_cashflow",
        priority: 10,
        action_type: "cashflow_control",
        title: "Stabilise cashflow over the next two weeks",
        params: { window_days: 14 },
        supporting_insight_ids: ["insight.cashflow_negative"],
      },
    ],
    citations: [],
    policy_flags: {
      policy_version: "advice_policy_v1",
      education_only: false,
      risk_appetite: "unknown",
      ...overrides,
    },
    reason_codes: [],
  };
}
