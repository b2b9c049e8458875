import { assigneeOf, type Project, type Risk, RiskCategory, type RiskSeverity, type Task } from "../data/models";
import { plural } from "../lib/format";
import { elevateSeverity, severityFromPriority, sortBySeverity } from "./severity";
import { normalise, sentenceFrom } from "./text";

// Broader than the graph builder's list: within a project "needs ..." is worth
// flagging even when it names no other project.
export const DEPENDENCY_KEYWORDS = [
  "depends on",
  "dependent on",
  "blocked by",
  "waiting for",
  "waiting on",
  "prerequisite",
  "requires",
  "contingent on",
  "cannot proceed until",
  "needs",
] as const;

export const ACTIVE_STATUSES: ReadonlySet<string> = new Set([
  "to do",
  "todo",
  "in progress",
  "in-progress",
  "open",
  "new",
  "blocked",
  "waiting",
  "on hold",
  "on_hold",
  "on-hold",
]);

export type DependencyMatch = {
  keyword: (typeof DEPENDENCY_KEYWORDS)[number];
  position: number;
  context: string;
};

export function isActive(task: Task): boolean {
  return ACTIVE_STATUSES.has(normalise(task.status));
}

/** Text following the keyword at `position`, up to a sentence boundary or 80 characters. */
export function extractContext(text: string, position: number, keyword: string): string {
  return sentenceFrom(text, position + keyword.length);
}

/**
 * Every non-overlapping keyword occurrence in the task's comments, in the
 * order they appear. Earlier keywords in the list win overlaps.
 */
export function findDependencyMatches(task: Task): DependencyMatch[] {
  const comments = task.comments ?? "";
  const lower = comments.toLowerCase();
  const claimed: Array<[number, number]> = [];
  const matches: DependencyMatch[] = [];

  for (const keyword of DEPENDENCY_KEYWORDS) {
    let from = 0;
    for (;;) {
      const at = lower.indexOf(keyword, from);
      if (at === -1) break;
      const end = at + keyword.length;
      from = end;
      if (claimed.some(([s, e]) => at < e && end > s)) continue;
      claimed.push([at, end]);
      matches.push({ keyword, position: at, context: extractContext(comments, at, keyword) });
    }
  }

  return matches.sort((a, b) => a.position - b.position);
}

/**
 * Three or more dependencies push severity to at least High (Critical from a
 * High base); two raise it one step; one leaves the priority-based severity.
 */
export function dependencySeverity(base: RiskSeverity, count: number): RiskSeverity {
  if (count >= 3) return base === "High" || base === "Critical" ? "Critical" : "High";
  if (count === 2) return elevateSeverity(base);
  return base;
}

/**
 * Flags active tasks whose comments mention things they are waiting on.
 * Only this project's own tasks are inspected.
 */
export function detectDependencies(project: Project): Risk[] {
  const risks: Risk[] = [];

  for (const task of project.tasks) {
    if (!isActive(task)) continue;

    const matches = findDependencyMatches(task);
    if (matches.length === 0) continue;

    const count = matches.length;
    const severity = dependencySeverity(severityFromPriority(task.priority), count);
    const assignee = assigneeOf(task) || "nobody";
    const listed = matches
      .slice(0, 3)
      .map((m) => `"${m.context || m.keyword}"`)
      .join(", ");
    const more = count > 3 ? ` and ${count - 3} more` : "";

    let explanation =
      `'${task.name}' in ${project.name} (assigned to ${assignee}, status "${task.status.trim()}") ` +
      `is waiting on ${count} ${plural(count, "dependency", "dependencies")}: ${listed}${more}.`;
    if (count > 1) {
      explanation += " Each extra dependency compounds the chance that something upstream slips.";
    }

    risks.push({
      projectName: project.name,
      category: RiskCategory.DEPENDENCY,
      severity,
      title: `'${task.name}' has ${count} ${plural(count, "dependency", "dependencies")}`,
      explanation,
      suggestedMitigation: dependencyMitigation(task, count),
    });
  }

  return sortBySeverity(risks);
}

function dependencyMitigation(task: Task, count: number): string {
  const parts = [
    `Confirm an owner and a delivery date for each dependency of '${task.name}' and track them on the RAID log.`,
  ];
  if (count >= 3) {
    parts.push("With this many inputs, map the critical path and look for work that can start without them.");
  } else if (count === 2) {
    parts.push("Check whether either dependency can be worked around or sequenced earlier.");
  }
  return parts.join(" ");
}
