import { type PortfolioRiskReport, type ProjectRiskSummary, RiskCategory } from "../data/models";
import { plural } from "../lib/format";
import type { DependencyGraph } from "../scenario/graph";

export type UrgentItem = {
  priority: number;  // 1 is most urgent
  projectName: string;
  text: string;
};

const REGULATORY_KEYWORDS = ["compliance", "regulatory", "audit", "cyber", "security"] as const;
const MAX_ITEMS = 3;

function budgetCritical(summaries: readonly ProjectRiskSummary[]): UrgentItem[] {
  return summaries
    .filter((s) => s.risks.some((r) => r.category === RiskCategory.BURN_RATE && r.severity === "Critical"))
    .map((s) => ({
      priority: 1,
      projectName: s.projectName,
      text: `${s.projectName} will exhaust its budget before delivery completes: approve a top-up or cut scope`,
    }));
}

function regulatoryAtRisk(summaries: readonly ProjectRiskSummary[]): UrgentItem[] {
  const items: UrgentItem[] = [];
  for (const s of summaries) {
    const name = s.projectName.toLowerCase();
    if (!REGULATORY_KEYWORDS.some((kw) => name.includes(kw))) continue;
    if (s.rag === "Green") continue;
    const critical = s.risks.filter((r) => r.severity === "Critical").length;
    if (critical === 0) continue;
    items.push({
      priority: 2,
      projectName: s.projectName,
      text: `${s.projectName} has ${critical} critical ${plural(critical, "issue")} and may miss its regulatory deadline`,
    });
  }
  return items;
}

/**
 * Projects with High or Critical blocked work that others depend on. With a
 * graph the dependents come from its edges; without one, from other projects'
 * dependency risks that mention the blocked project by name.
 */
function blockedCascades(summaries: readonly ProjectRiskSummary[], graph?: DependencyGraph): UrgentItem[] {
  const blocked = summaries
    .filter((s) =>
      s.risks.some(
        (r) => r.category === RiskCategory.BLOCKED_WORK && (r.severity === "Critical" || r.severity === "High")
      )
    )
    .map((s) => s.projectName);

  const cascades = blocked.filter((name) => {
    if (graph) return graph.dependents(name).length > 0;
    const needle = name.toLowerCase();
    return summaries.some(
      (s) =>
        s.projectName !== name &&
        s.risks.some((r) => r.category === RiskCategory.DEPENDENCY && r.explanation.toLowerCase().includes(needle))
    );
  });

  return cascades.map((name) => ({
    priority: 3,
    projectName: name,
    text: `blockers in ${name} are cascading into dependent projects`,
  }));
}

// On-hold projects not already named by a more urgent item, grouped into one.
function stalled(summaries: readonly ProjectRiskSummary[], named: ReadonlySet<string>): UrgentItem[] {
  const onHold = summaries.filter((s) => s.projectStatus.toLowerCase().includes("hold") && !named.has(s.projectName));
  if (onHold.length === 0) return [];
  const names = onHold.slice(0, 2).map((s) => s.projectName);
  return [
    {
      priority: 6,
      projectName: names[0],
      text: `${names.join(", ")} stalled: confirm go/no-go to release committed resources`,
    },
  ];
}

/** Most urgent first, one item per project, at most three. */
export function collectUrgentItems(report: PortfolioRiskReport, graph?: DependencyGraph): UrgentItem[] {
  const summaries = report.projectSummaries;
  const all = [
    ...budgetCritical(summaries),
    ...regulatoryAtRisk(summaries),
    ...blockedCascades(summaries, graph),
  ].sort((a, b) => a.priority - b.priority);

  const seen = new Set<string>();
  const picked: UrgentItem[] = [];
  for (const item of all) {
    if (picked.length === MAX_ITEMS) return picked;
    if (seen.has(item.projectName)) continue;
    seen.add(item.projectName);
    picked.push(item);
  }

  // Least urgent, so it only fills a slot that is left over.
  if (picked.length < MAX_ITEMS) picked.push(...stalled(summaries, seen));
  return picked;
}

/** The one paragraph that goes at the top of an executive briefing. */
export function generateExecutiveSummary(report: PortfolioRiskReport, graph?: DependencyGraph): string {
  const items = collectUrgentItems(report, graph);

  if (items.length === 0) {
    const total = report.projectSummaries.length;
    const reds = report.projectSummaries.filter((s) => s.rag === "Red").length;
    const ambers = report.projectSummaries.filter((s) => s.rag === "Amber").length;
    return (
      `The portfolio is tracking ${total} active ${plural(total, "project")} with ` +
      `${reds} at Red status and ${ambers} at Amber. ` +
      "No critical escalation needed this cycle; continue standard monitoring."
    );
  }

  const numbered = items.map((item, i) => `(${i + 1}) ${item.text}`).join("; ");
  const urgency = items.some((i) => i.priority <= 2)
    ? "Recommended: schedule emergency portfolio review within 5 working days."
    : items.some((i) => i.priority <= 4)
      ? "Recommended: address these items before the next steering cycle."
      : "Recommended: review at next scheduled steering committee.";

  return (
    `Your portfolio has ${items.length} urgent ${plural(items.length, "issue")} this cycle: ` +
    `${numbered}. ${urgency}`
  );
}
