import type { PortfolioRiskReport } from "../data/models";
import { type IsoDate, today } from "../lib/dates";
import { InvariantError } from "../lib/errors";
import { plural } from "../lib/format";
import { describeAction, generateNarrative } from "../scenario/narrative";
import type { ScenarioResult } from "../scenario/simulator";

export type DecisionStatus = "Pending" | "Approved" | "Rejected" | "Deferred";
export type DecisionSource = "scenario" | "risk_analysis";

export type DecisionOption = {
  label: string;
  description: string;
  impact: string;
};

export type Decision = {
  decisionId: string;
  date: IsoDate;
  title: string;
  context: string;
  projectsAffected: string[];
  options: DecisionOption[];
  recommendation: string;
  recommendationRationale: string;
  status: DecisionStatus;
  source: DecisionSource;
};

export type DecisionLogDict = {
  decisionCount: number;
  decisions: Decision[];
};

/** Audit trail of decisions raised during one portfolio review cycle. */
export class DecisionLog {
  private readonly entries: Decision[] = [];
  private counter = 0;

  get decisions(): readonly Decision[] {
    return this.entries;
  }

  /** DEC-001, DEC-002, ... */
  nextId(): string {
    this.counter += 1;
    return `DEC-${String(this.counter).padStart(3, "0")}`;
  }

  add(decision: Decision): void {
    this.entries.push(decision);
  }

  get(decisionId: string): Decision | undefined {
    return this.entries.find((d) => d.decisionId === decisionId);
  }

  setStatus(decisionId: string, status: DecisionStatus): Decision {
    const index = this.entries.findIndex((d) => d.decisionId === decisionId);
    if (index === -1) {
      throw new InvariantError(`No decision with id ${decisionId}`);
    }
    const updated = { ...this.entries[index], status };
    this.entries[index] = updated;
    return updated;
  }

  toDict(): DecisionLogDict {
    return { decisionCount: this.entries.length, decisions: [...this.entries] };
  }

  toJSON(): DecisionLogDict {
    return this.toDict();
  }
}

export function decisionFromScenario(result: ScenarioResult, log: DecisionLog, date: IsoDate = today()): Decision {
  const narrative = generateNarrative(result);
  const { action } = result;
  const summary = describeAction(action);
  const sentence = (items: readonly string[]) => `${items.map((s) => s.replace(/\.$/, "")).join("; ")}.`;

  const affected = [...new Set(result.impacts.map((i) => i.projectName))];

  let recommendation: string;
  let rationale: string;
  if (result.warnings.length > 0) {
    const count = result.warnings.length;
    recommendation = `Proceed with caution: ${summary}`;
    rationale =
      `Scenario modelled successfully but ${count} ${plural(count, "warning")} flagged: ` +
      sentence(result.warnings.slice(0, 2));
  } else {
    recommendation = `Recommend: ${summary}`;
    rationale =
      narrative.recommendations.length > 0 ? sentence(narrative.recommendations) : "Scenario impact is manageable.";
  }

  const decision: Decision = {
    decisionId: log.nextId(),
    date,
    title: `Scenario: ${summary}`,
    context: `Scenario simulation for ${action.project}.`,
    projectsAffected: affected.length > 0 ? affected : [action.project],
    options: [
      {
        label: `Apply: ${summary}`,
        description: narrative.impactAnalysis || narrative.afterSummary,
        impact: narrative.afterSummary,
      },
      {
        label: "Do nothing: maintain current plan",
        description: "Continue on current trajectory without change.",
        impact: narrative.beforeSummary || "No change to delivery dates, budget, or dependencies.",
      },
    ],
    recommendation,
    recommendationRationale: rationale,
    status: "Pending",
    source: "scenario",
  };

  log.add(decision);
  return decision;
}

/** Raises an escalation decision when any project is Red; otherwise none. */
export function decisionsFromRiskReport(
  report: PortfolioRiskReport,
  log: DecisionLog,
  date: IsoDate = today()
): Decision[] {
  const reds = report.projectSummaries.filter((s) => s.rag === "Red");
  if (reds.length === 0) return [];

  const count = reds.length;
  const risks = reds.reduce((sum, s) => sum + s.riskCount, 0);
  const decision: Decision = {
    decisionId: log.nextId(),
    date,
    title: `Escalate ${count} Red ${plural(count, "project")} to executive review`,
    context: `${count} ${plural(count, "project")} at Red status with combined ${risks} ${plural(risks, "risk")}.`,
    projectsAffected: reds.slice(0, 5).map((s) => s.projectName),
    options: [
      {
        label: "Escalate to executive review",
        description: "Schedule an emergency review within 5 days.",
        impact: "Leadership intervention, possible resource reallocation.",
      },
      {
        label: "Enhanced monitoring",
        description: "Increase reporting frequency to weekly.",
        impact: "Earlier detection but no direct intervention.",
      },
      {
        label: "Accept risk",
        description: "Continue with current oversight level.",
        impact: "No additional overhead but risk of further deterioration.",
      },
    ],
    recommendation: "Escalate to executive review",
    recommendationRationale: `${count} ${plural(count, "project")} at Red status needs leadership attention; monitoring alone is insufficient.`,
    status: "Pending",
    source: "risk_analysis",
  };

  log.add(decision);
  return [decision];
}
