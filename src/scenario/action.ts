import { z } from "zod";
import { ParseError } from "../lib/errors";

export const ACTION_TYPES = ["budget_increase", "budget_decrease", "scope_cut", "delay", "remove"] as const;
export type ActionType = (typeof ACTION_TYPES)[number];

const base = {
  project: z.string().trim().min(1),
  description: z.string().default(""),
};

export const budgetChangeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("percentage"), fraction: z.number().nonnegative() }),
  z.object({ kind: z.literal("absolute"), amount: z.number().nonnegative() }),
]);

export const scenarioActionSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("budget_increase"), ...base, change: budgetChangeSchema }),
  z.object({ action: z.literal("budget_decrease"), ...base, change: budgetChangeSchema }),
  z.object({ action: z.literal("scope_cut"), ...base, fraction: z.number().nonnegative().max(1) }),
  z.object({ action: z.literal("delay"), ...base, durationWeeks: z.number().int().nonnegative() }),
  z.object({ action: z.literal("remove"), ...base }),
]);

export type BudgetChange = z.infer<typeof budgetChangeSchema>;
export type ScenarioAction = z.infer<typeof scenarioActionSchema>;
export type BudgetAction = Extract<ScenarioAction, { action: "budget_increase" | "budget_decrease" }>;
export type ScopeCutAction = Extract<ScenarioAction, { action: "scope_cut" }>;
export type DelayAction = Extract<ScenarioAction, { action: "delay" }>;
export type RemoveAction = Extract<ScenarioAction, { action: "remove" }>;

export function isBudgetAction(action: ScenarioAction): action is BudgetAction {
  return action.action === "budget_increase" || action.action === "budget_decrease";
}

/** Validates an action that arrived as data (JSON, a form) rather than text. */
export function parseAction(input: unknown): ScenarioAction {
  const parsed = scenarioActionSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "action"}: ${i.message}`).join("; ");
    throw new ParseError(`Invalid scenario action: ${detail}`);
  }
  return parsed.data;
}
