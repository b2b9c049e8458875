import { budgetOf, type Project, spendOf } from "../data/models";
import { daysBetween, formatDate, type IsoDate, requireIsoDate, shiftDays, today } from "../lib/dates";
import { InvariantError } from "../lib/errors";
import { formatAmount, plural, round } from "../lib/format";
import { logger } from "../lib/logger";
import type { BudgetAction, DelayAction, RemoveAction, ScenarioAction, ScopeCutAction } from "./action";
import type { DependencyGraph } from "./graph";

export type ProjectSnapshot = {
  name: string;
  status: string;
  startDate: IsoDate | null;
  endDate: IsoDate | null;
  budget: number;
  actualSpend: number;
  scopePct: number;
  taskCount: number;
  runwayWeeks?: number | null;  // budget scenarios only
};

export type ImpactType = "direct" | "cascade";

export type ProjectImpact = {
  projectName: string;
  impactType: ImpactType;
  changes: Record<string, string>;  // field -> "before → after" or a note
};

export type PortfolioState = Record<string, ProjectSnapshot>;

export type ScenarioResult = {
  action: ScenarioAction;
  beforeState: PortfolioState;
  afterState: PortfolioState;
  impacts: ProjectImpact[];  // direct first
  warnings: string[];
};

// Everything a single-action simulation reads. Built once per call.
type SimulationContext = {
  target: Project;
  projects: ReadonlyMap<string, Project>;
  graph: DependencyGraph;
  before: PortfolioState;
  referenceDate: IsoDate;
};

type Outcome = Pick<ScenarioResult, "afterState" | "impacts" | "warnings">;

const arrow = (from: string | number, to: string | number) => `${from} → ${to}`;

export function snapshot(project: Project): ProjectSnapshot {
  return {
    name: project.name,
    status: project.status,
    startDate: project.startDate ?? null,
    endDate: project.endDate ?? null,
    budget: budgetOf(project),
    actualSpend: spendOf(project),
    scopePct: 100,
    taskCount: project.tasks.length,
  };
}

function cloneState(state: PortfolioState): PortfolioState {
  const copy: PortfolioState = {};
  for (const [name, snap] of Object.entries(state)) copy[name] = { ...snap };
  return copy;
}

/**
 * Weeks until `budget` runs out at the burn rate seen so far.
 * Null when there is no rate to extrapolate from; 0 when nothing is left.
 */
export function runwayWeeks(
  budget: number,
  actualSpend: number,
  startDate: IsoDate | null | undefined,
  referenceDate: IsoDate
): number | null {
  if (budget <= 0 || actualSpend <= 0 || !startDate) return null;
  const elapsedDays = daysBetween(startDate, referenceDate);
  if (elapsedDays <= 0) return null;

  const remaining = budget - actualSpend;
  if (remaining <= 0) return 0;

  const dailyBurn = actualSpend / elapsedDays;
  return Math.floor(remaining / dailyBurn / 7);
}

export function resolveProjectName(name: string, names: Iterable<string>): string | null {
  const candidates = [...names];
  if (candidates.includes(name)) return name;
  const lower = name.toLowerCase();
  return candidates.find((n) => n.toLowerCase() === lower) ?? null;
}

function simulateBudget(action: BudgetAction, ctx: SimulationContext): Outcome {
  const { target, before, referenceDate } = ctx;
  const oldBudget = budgetOf(target);
  const spend = spendOf(target);
  const delta = action.change.kind === "absolute" ? action.change.amount : oldBudget * action.change.fraction;
  const newBudget = action.action === "budget_increase" ? oldBudget + delta : Math.max(0, oldBudget - delta);

  const oldRunway = runwayWeeks(oldBudget, spend, target.startDate, referenceDate);
  const newRunway = runwayWeeks(newBudget, spend, target.startDate, referenceDate);

  const afterState = cloneState(before);
  afterState[target.name] = { ...afterState[target.name], budget: newBudget, runwayWeeks: newRunway };

  const warnings: string[] = [];
  if (newBudget < spend) {
    warnings.push(
      `New budget (${formatAmount(newBudget)}) is below actual spend (${formatAmount(spend)}): ` +
        "the project is already over budget."
    );
  }
  if (action.action === "budget_decrease" && oldRunway !== null && newRunway !== null && newRunway < oldRunway) {
    warnings.push(`Budget decrease reduces runway from ${oldRunway} to ${newRunway} weeks.`);
  }

  return {
    afterState,
    impacts: [
      {
        projectName: target.name,
        impactType: "direct",
        changes: {
          budget: arrow(formatAmount(oldBudget), formatAmount(newBudget)),
          runway_weeks: arrow(oldRunway ?? "N/A", newRunway ?? "N/A"),
        },
      },
    ],
    warnings,
  };
}

// Linear model: cutting N% of scope takes N% off the planned duration.
function simulateScopeCut(action: ScopeCutAction, ctx: SimulationContext): Outcome {
  const { target, graph, before } = ctx;
  const cut = action.fraction;

  let daysSaved = 0;
  let newEnd: IsoDate | null = null;
  if (target.startDate && target.endDate) {
    daysSaved = Math.floor(daysBetween(target.startDate, target.endDate) * cut);
    newEnd = shiftDays(target.endDate, -daysSaved);
  }

  const impacts: ProjectImpact[] = [
    {
      projectName: target.name,
      impactType: "direct",
      changes: {
        scope: arrow("100%", `${Math.round((1 - cut) * 100)}%`),
        end_date: arrow(formatDate(target.endDate), formatDate(newEnd)),
        days_saved: String(daysSaved),
      },
    },
  ];

  // Advisory only: an earlier upstream delivery does not move downstream dates.
  for (const name of graph.allDependents(target.name)) {
    impacts.push({
      projectName: name,
      impactType: "cascade",
      changes: { note: `Dependency on ${target.name} delivers ${daysSaved} days earlier.` },
    });
  }

  const afterState = cloneState(before);
  afterState[target.name] = {
    ...afterState[target.name],
    scopePct: round((1 - cut) * 100, 2),
    ...(newEnd ? { endDate: newEnd } : {}),
  };

  return { afterState, impacts, warnings: [] };
}

function simulateDelay(action: DelayAction, ctx: SimulationContext): Outcome {
  const { target, projects, graph, before } = ctx;
  const days = action.durationWeeks * 7;
  const weeks = String(action.durationWeeks);
  const newStart = target.startDate ? shiftDays(target.startDate, days) : null;
  const newEnd = target.endDate ? shiftDays(target.endDate, days) : null;

  const afterState = cloneState(before);
  afterState[target.name] = { ...afterState[target.name], startDate: newStart, endDate: newEnd };

  const impacts: ProjectImpact[] = [
    {
      projectName: target.name,
      impactType: "direct",
      changes: {
        start_date: arrow(formatDate(target.startDate), formatDate(newStart)),
        end_date: arrow(formatDate(target.endDate), formatDate(newEnd)),
        delay_weeks: weeks,
      },
    },
  ];

  const dependents = graph.allDependents(target.name).filter((name) => projects.has(name));
  for (const name of dependents) {
    const oldEnd = before[name].endDate;
    const shifted = oldEnd ? shiftDays(oldEnd, days) : null;
    if (shifted) afterState[name] = { ...afterState[name], endDate: shifted };
    impacts.push({
      projectName: name,
      impactType: "cascade",
      changes: {
        end_date: arrow(formatDate(oldEnd), formatDate(shifted)),
        delay_weeks: weeks,
        reason: `Cascade delay from ${target.name}`,
      },
    });
  }

  const warnings =
    dependents.length > 0
      ? [
          `Delay on ${target.name} cascades to ${dependents.length} dependent ` +
            `${plural(dependents.length, "project")}: ${dependents.join(", ")}.`,
        ]
      : [];

  return { afterState, impacts, warnings };
}

function simulateRemove(_action: RemoveAction, ctx: SimulationContext): Outcome {
  const { target, graph, before } = ctx;
  const budget = budgetOf(target);

  const impacts: ProjectImpact[] = [
    {
      projectName: target.name,
      impactType: "direct",
      changes: {
        status: arrow(target.status, "Removed"),
        budget_freed: formatAmount(budget),
        remaining_budget: formatAmount(Math.max(0, budget - spendOf(target))),
      },
    },
  ];

  // One hop only: projects further downstream still have their direct input.
  const dependents = graph.dependents(target.name);
  for (const name of dependents) {
    impacts.push({
      projectName: name,
      impactType: "cascade",
      changes: { note: `Dependency on ${target.name} is broken; project may need re-planning.` },
    });
  }

  const afterState = cloneState(before);
  afterState[target.name] = { ...afterState[target.name], status: "Removed" };

  const warnings =
    dependents.length > 0
      ? [
          `Removing ${target.name} breaks dependencies for: ${dependents.join(", ")}. ` +
            "These projects may need re-scoping or alternative delivery paths.",
        ]
      : [];

  return { afterState, impacts, warnings };
}

function apply(action: ScenarioAction, ctx: SimulationContext): Outcome {
  switch (action.action) {
    case "budget_increase":
    case "budget_decrease":
      return simulateBudget(action, ctx);
    case "scope_cut":
      return simulateScopeCut(action, ctx);
    case "delay":
      return simulateDelay(action, ctx);
    case "remove":
      return simulateRemove(action, ctx);
    default: {
      const unknown: never = action;
      throw new InvariantError(`Unsupported scenario action: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Applies `action` to a snapshot of the portfolio and follows its effects
 * through `graph`. Neither `projects` nor `graph` is modified.
 *
 * An unknown target is reported as a warning, not thrown; a malformed
 * `referenceDate` throws ValidationError.
 */
export function simulate(
  action: ScenarioAction,
  projects: readonly Project[],
  graph: DependencyGraph,
  referenceDate: IsoDate = today()
): ScenarioResult {
  requireIsoDate(referenceDate);
  const byName = new Map(projects.map((p) => [p.name, p] as const));
  const beforeState: PortfolioState = {};
  for (const project of projects) beforeState[project.name] = snapshot(project);

  const targetName = resolveProjectName(action.project, byName.keys());
  const target = targetName === null ? undefined : byName.get(targetName);

  if (!target) {
    const available = [...byName.keys()].sort().join(", ");
    logger.warn("simulate: target project not found", { project: action.project });
    return {
      action,
      beforeState,
      afterState: cloneState(beforeState),
      impacts: [],
      warnings: [`Project '${action.project}' not found in portfolio. Available projects: ${available}`],
    };
  }

  const outcome = apply(action, { target, projects: byName, graph, before: beforeState, referenceDate });
  logger.debug("simulate", {
    action: action.action,
    project: target.name,
    impacts: outcome.impacts.length,
    warnings: outcome.warnings.length,
  });

  return { action, beforeState, ...outcome };
}
