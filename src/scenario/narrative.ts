import { formatAmount, formatPct, plural } from "../lib/format";
import type { ScenarioAction } from "./action";
import { type ProjectImpact, type ProjectSnapshot, resolveProjectName, type ScenarioResult } from "./simulator";

export type ScenarioNarrative = {
  title: string;
  scenarioDescription: string;
  beforeSummary: string;
  afterSummary: string;
  impactAnalysis: string;
  cascadeAnalysis: string;
  recommendations: string[];
  warnings: string[];
  fullText: string;
};

const TITLES: Record<ScenarioAction["action"], string> = {
  budget_increase: "Budget Increase",
  budget_decrease: "Budget Decrease",
  scope_cut: "Scope Reduction",
  delay: "Schedule Delay",
  remove: "Project Removal",
};

export function describeAction(action: ScenarioAction): string {
  if (action.description) return action.description;
  switch (action.action) {
    case "budget_increase":
    case "budget_decrease": {
      const verb = action.action === "budget_increase" ? "Increase" : "Decrease";
      const by = action.change.kind === "percentage" ? formatPct(action.change.fraction) : formatAmount(action.change.amount);
      return `${verb} ${action.project} budget by ${by}`;
    }
    case "scope_cut":
      return `Cut ${action.project} scope by ${formatPct(action.fraction)}`;
    case "delay":
      return `Delay ${action.project} by ${action.durationWeeks} ${plural(action.durationWeeks, "week")}`;
    case "remove":
      return `Remove ${action.project} from portfolio`;
  }
}

function beforeSummary(project: string, state: ProjectSnapshot | undefined): string {
  if (!state) return `${project}: No data available.`;

  const parts = [`${state.name} is currently ${state.status}.`];
  if (state.budget > 0) {
    parts.push(
      `Budget: ${formatAmount(state.budget)} (${formatPct(state.actualSpend / state.budget)} consumed, ` +
        `${formatAmount(state.actualSpend)} spent).`
    );
  }
  if (state.startDate && state.endDate) {
    parts.push(`Timeline: ${state.startDate} to ${state.endDate}.`);
  }
  if (state.taskCount > 0) {
    parts.push(`${state.taskCount} ${plural(state.taskCount, "task")} in progress.`);
  }
  return parts.join(" ");
}

// "runway_weeks" -> "Runway Weeks"
function fieldLabel(field: string): string {
  return field
    .split("_")
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

function afterSummary(direct: ProjectImpact | undefined): string {
  if (!direct) return "No direct impact identified.";
  return Object.entries(direct.changes)
    .map(([field, change]) => `${fieldLabel(field)}: ${change}.`)
    .join(" ");
}

function impactAnalysis(action: ScenarioAction, direct: ProjectImpact | undefined): string {
  if (!direct) return "No measurable impact.";
  const project = direct.projectName;

  switch (action.action) {
    case "budget_increase":
      return (
        `Increasing the budget for ${project} extends the financial runway, reducing the risk of ` +
        "budget exhaustion before delivery. This may let the team address scope or resource " +
        "constraints that are currently limiting progress."
      );
    case "budget_decrease":
      return (
        `Decreasing the budget for ${project} shortens the financial runway. The team may need to ` +
        "reduce scope or find efficiencies to deliver within the revised budget. Review whether " +
        "current commitments are achievable with reduced funding."
      );
    case "scope_cut":
      return (
        `Reducing scope on ${project} by ${formatPct(action.fraction)} is estimated to save ` +
        `${direct.changes.days_saved ?? "0"} days on the delivery timeline. This trades feature ` +
        "completeness for earlier delivery. Review which deliverables are deferred."
      );
    case "delay":
      return (
        `Delaying ${project} by ${action.durationWeeks} ${plural(action.durationWeeks, "week")} shifts ` +
        "the delivery window out. This may affect dependent projects and downstream milestones."
      );
    case "remove":
      return (
        `Removing ${project} from the portfolio frees up budget and resources. Any projects ` +
        `that depend on ${project} will need re-planning or alternative delivery paths.`
      );
  }
}

function cascadeLine(impact: ProjectImpact): string {
  const { note, reason, delay_weeks: delay, end_date: end } = impact.changes;
  let line = `**${impact.projectName}**: `;
  if (delay) line += `Delayed by ${delay} weeks. `;
  if (end) line += `New end date: ${end.split(" → ").pop() ?? end}. `;
  if (reason) line += `${reason}. `;
  if (note) line += note;
  return line.trim();
}

function cascadeAnalysis(cascade: ProjectImpact[]): string {
  if (cascade.length === 0) return "";
  return [
    `${cascade.length} downstream ${plural(cascade.length, "project")} affected:`,
    ...cascade.map(cascadeLine),
  ].join("\n");
}

function recommendations(action: ScenarioAction, result: ScenarioResult, project: string): string[] {
  const count = result.impacts.filter((i) => i.impactType === "cascade").length;
  const dependents = `${count} dependent ${plural(count, "project")}`;
  const recs: string[] = [];

  switch (action.action) {
    case "budget_increase":
      recs.push(`Approve the budget increase for ${project} and communicate the revised allocation to the delivery team.`);
      recs.push("Set a checkpoint in 4 weeks to verify the additional funding is translating into accelerated delivery.");
      break;
    case "budget_decrease":
      recs.push(`Confirm the revised budget with the ${project} delivery team and agree scope trade-offs.`);
      recs.push("Identify which deliverables can be deferred to a later phase to fit within the reduced budget.");
      if (result.warnings.some((w) => w.toLowerCase().includes("over budget"))) {
        recs.push(`URGENT: ${project} is already over budget. Immediate intervention required.`);
      }
      break;
    case "scope_cut":
      recs.push(`Agree the deferred scope items with the ${project} sponsor.`);
      recs.push("Communicate the revised delivery date to stakeholders.");
      if (count > 0) recs.push(`Notify the ${dependents} of the earlier delivery window.`);
      break;
    case "delay":
      recs.push(`Communicate the revised timeline for ${project} to all stakeholders.`);
      if (count > 0) recs.push(`Assess the cascade impact on ${dependents} and update their timelines.`);
      recs.push("Review whether the delay changes the cost profile (extended team costs, contract implications).");
      break;
    case "remove":
      recs.push(`Formally close ${project} and release resources back to the portfolio.`);
      if (count > 0) recs.push(`Urgently re-plan the ${dependents} that rely on ${project}.`);
      break;
  }

  return recs;
}

export function renderNarrative(n: Omit<ScenarioNarrative, "fullText">): string {
  const sections = [
    "# Scenario Impact Summary\n",
    `## Scenario\n${n.scenarioDescription}\n`,
    `## Before\n${n.beforeSummary}\n`,
    `## After\n${n.afterSummary}\n`,
    `## Impact Analysis\n${n.impactAnalysis}\n`,
  ];
  if (n.cascadeAnalysis) sections.push(`## Cascade Effects\n${n.cascadeAnalysis}\n`);
  if (n.recommendations.length > 0) {
    sections.push(`## Recommended Actions\n${n.recommendations.map((r) => `- ${r}`).join("\n")}\n`);
  }
  if (n.warnings.length > 0) {
    sections.push(`## Warnings\n${n.warnings.map((w) => `- ${w}`).join("\n")}\n`);
  }
  return sections.join("\n");
}

/** One-page briefing for a simulation result. Pure template filling. */
export function generateNarrative(result: ScenarioResult): ScenarioNarrative {
  const { action } = result;
  const direct = result.impacts.find((i) => i.impactType === "direct");
  const cascade = result.impacts.filter((i) => i.impactType === "cascade");
  const resolved = resolveProjectName(action.project, Object.keys(result.beforeState));
  const project = direct?.projectName ?? resolved ?? action.project;

  const sections = {
    title: `${TITLES[action.action]}: ${project}`,
    scenarioDescription: describeAction(action),
    beforeSummary: beforeSummary(action.project, resolved ? result.beforeState[resolved] : undefined),
    afterSummary: afterSummary(direct),
    impactAnalysis: impactAnalysis(action, direct),
    cascadeAnalysis: cascadeAnalysis(cascade),
    recommendations: direct ? recommendations(action, result, project) : [],
    warnings: [...result.warnings],
  };

  return { ...sections, fullText: renderNarrative(sections) };
}
