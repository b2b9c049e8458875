import { assigneeOf, priorityOf, type Project, type Risk, RiskCategory, type Task } from "../data/models";
import { elevateSeverity, severityFromPriority, sortBySeverity } from "./severity";
import { normalise } from "./text";

export const CARRYOVER_THRESHOLD = 3;

// Tasks carried this many times or more get one extra step of severity.
export const EXCESSIVE_CARRYOVER = 5;

export const COMPLETE_STATUSES: ReadonlySet<string> = new Set([
  "done",
  "complete",
  "completed",
  "closed",
  "resolved",
]);

export function isComplete(task: Task): boolean {
  return COMPLETE_STATUSES.has(normalise(task.status));
}

/** "Sprint 3 → Sprint 4 → Sprint 5" including the current sprint, if any. */
export function sprintChain(task: Task): string {
  const sprints = [...(task.previousSprints ?? [])];
  if (task.sprint?.trim()) sprints.push(task.sprint.trim());
  return sprints.join(" → ");
}

/**
 * Flags unfinished tasks that have already been through `threshold` or more
 * previous sprints.
 */
export function detectCarryover(project: Project, threshold: number = CARRYOVER_THRESHOLD): Risk[] {
  const risks: Risk[] = [];

  for (const task of project.tasks) {
    if (isComplete(task)) continue;

    const sprintCount = task.previousSprints?.length ?? 0;
    if (sprintCount < threshold) continue;

    const base = severityFromPriority(task.priority);
    const severity = sprintCount >= EXCESSIVE_CARRYOVER ? elevateSeverity(base) : base;
    const assignee = assigneeOf(task) || "nobody";

    risks.push({
      projectName: project.name,
      category: RiskCategory.CHRONIC_CARRYOVER,
      severity,
      title: `'${task.name}' stuck: carried over ${sprintCount} sprints`,
      explanation:
        `'${task.name}' in ${project.name} has moved through ${sprintCount} sprints ` +
        `(${sprintChain(task)}) without being finished. ` +
        `It is assigned to ${assignee} at ${priorityOf(task).toLowerCase()} priority. ` +
        `Repeated carry-over usually means the task is too large, quietly blocked, or keeps losing out to other work.`,
      suggestedMitigation: carryoverMitigation(task, sprintCount),
    });
  }

  return sortBySeverity(risks);
}

function carryoverMitigation(task: Task, sprintCount: number): string {
  const parts = [
    `Review why '${task.name}' is still open after ${sprintCount} sprints and decide whether to split it, re-scope it or escalate it.`,
  ];

  if (sprintCount >= EXCESSIVE_CARRYOVER) {
    parts.push("Run a short spike or add a second pair of hands to break the cycle.");
  }

  const priority = priorityOf(task);
  if (priority === "Critical" || priority === "High") {
    parts.push(`Further slippage on a ${priority.toLowerCase()}-priority task is likely to hit project milestones.`);
  }

  return parts.join(" ");
}
