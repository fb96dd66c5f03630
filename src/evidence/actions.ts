import { z } from "zod";

import type { ActionCandidate, Insight } from "../contracts/evidence";
import { IntentName } from "../contracts/intent";
import { compareText } from "./format";
import type { RiskAppetite } from "./insights";
import rawActionRules from "./action_rules.json";

const ParamValue = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);
const PriorityKey = z.enum(["savings", "cards", "loan", "consult"]);
const Priority = z.number().int().min(1).max(99);

const ActionRule = z
  .object({
    action_id: z.string().min(1),
    action_type: z.string().min(1),
    title: z.string().min(1),
    priority: Priority.optional(),
    priority_key: PriorityKey.optional(),
    requires_any: z.array(z.string()),
    only_for_intents: z.array(IntentName).optional(),
    also_for_intents: z.array(IntentName).optional(),
    with_risk_appetite: z.boolean().optional(),
    params: z.record(ParamValue),
  })
  .strict()
  .refine((rule) => rule.priority !== undefined || rule.priority_key !== undefined, {
    message: "rule needs priority or priority_key",
  });
export type ActionRule = z.infer<typeof ActionRule>;

const ServicePriorities = z.record(PriorityKey, Priority);

const ActionRuleTable = z
  .object({
    service_priorities: z.object({
      conservative: ServicePriorities,
      moderate: ServicePriorities,
      aggressive: ServicePriorities,
      unknown: ServicePriorities,
    }),
    rules: z.array(ActionRule),
    fillers: z.array(ActionRule).length(2),
  })
  .strict();
export type ActionRuleTable = z.infer<typeof ActionRuleTable>;

export const ACTION_RULES: ActionRuleTable = ActionRuleTable.parse(rawActionRules);

function rulePriority(rule: ActionRule, table: ActionRuleTable, appetite: RiskAppetite): number {
  if (rule.priority_key) {
    const fromTable = table.service_priorities[appetite][rule.priority_key];
    if (fromTable !== undefined) return fromTable;
  }
  return rule.priority ?? 99;
}

function toCandidate(
  rule: ActionRule,
  table: ActionRuleTable,
  appetite: RiskAppetite,
  supporting: string[]
): ActionCandidate {
  return {
    action_id: rule.action_id,
    priority: rulePriority(rule, table, appetite),
    action_type: rule.action_type,
    title: rule.title,
    params: rule.with_risk_appetite ? { ...rule.params, risk_appetite: appetite } : { ...rule.params },
    supporting_insight_ids: supporting,
  };
}

/**
 * Insights → prioritised actions. Lower priority is more urgent; ties break
 * on action_id. When fewer than two actions fire, the two generic fillers are
 * appended so an answer always has at least two actions to offer.
 */
export function buildActionCandidates(
  intent: IntentName,
  insights: readonly Insight[],
  appetite: RiskAppetite,
  table: ActionRuleTable = ACTION_RULES
): ActionCandidate[] {
  const present = new Set(insights.map((item) => item.insight_id));
  const candidates: ActionCandidate[] = [];
  const seen = new Set<string>();

  const push = (rule: ActionRule, supporting: string[]) => {
    if (seen.has(rule.action_id)) return;
    seen.add(rule.action_id);
    candidates.push(toCandidate(rule, table, appetite, supporting));
  };

  for (const rule of table.rules) {
    const supporting = rule.requires_any.filter((insightId) => present.has(insightId));
    if (rule.only_for_intents && !rule.only_for_intents.includes(intent)) continue;
    const forcedByIntent = rule.also_for_intents?.includes(intent) ?? false;
    if (supporting.length === 0 && !forcedByIntent) continue;
    push(rule, supporting);
  }

  if (candidates.length < 2) {
    for (const filler of table.fillers) push(filler, []);
  }

  return candidates.sort((a, b) => a.priority - b.priority || compareText(a.action_id, b.action_id));
}
