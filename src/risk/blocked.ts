import { assigneeOf, priorityOf, type Project, type Risk, RiskCategory, type Task } from "../data/models";
import { elevateSeverity, severityFromPriority, sortBySeverity } from "./severity";
import { normalise, sentenceFrom } from "./text";

export const BLOCKED_STATUSES: ReadonlySet<string> = new Set([
  "blocked",
  "waiting",
  "on hold",
  "on_hold",
  "on-hold",
  "suspended",
]);

// Checked in order; the first phrase found supplies the context.
export const BLOCKER_PHRASES = [
  "blocked by",
  "waiting for",
  "waiting on",
  "on hold pending",
  "on hold until",
  "held up by",
  "stalled",
] as const;

export type BlockerMatch = {
  phrase: (typeof BLOCKER_PHRASES)[number];
  context: string;
};

export function isStatusBlocked(task: Task): boolean {
  return BLOCKED_STATUSES.has(normalise(task.status));
}

export function findBlockerKeyword(task: Task): BlockerMatch | null {
  const comments = task.comments ?? "";
  const lower = comments.toLowerCase();
  for (const phrase of BLOCKER_PHRASES) {
    const at = lower.indexOf(phrase);
    if (at !== -1) {
      return { phrase, context: sentenceFrom(comments, at) };
    }
  }
  return null;
}

/**
 * Flags tasks that are blocked by status, by blocker wording in comments, or
 * both. Both signals together raise severity one step above the priority.
 */
export function detectBlockedWork(project: Project): Risk[] {
  const risks: Risk[] = [];

  for (const task of project.tasks) {
    const statusBlocked = isStatusBlocked(task);
    const blocker = findBlockerKeyword(task);
    if (!statusBlocked && !blocker) continue;

    const base = severityFromPriority(task.priority);
    const severity = statusBlocked && blocker ? elevateSeverity(base) : base;
    const status = task.status.trim();

    const signals: string[] = [];
    if (statusBlocked) signals.push(`its status is "${status}"`);
    if (blocker) signals.push(`the comments say "${blocker.context}"`);

    const assignee = assigneeOf(task);
    const priority = priorityOf(task).toLowerCase();

    risks.push({
      projectName: project.name,
      category: RiskCategory.BLOCKED_WORK,
      severity,
      title: blockedTitle(task.name, statusBlocked ? status : null, blocker !== null),
      explanation:
        `'${task.name}' in ${project.name} is stuck: ${signals.join(" and ")}. ` +
        `It is a ${priority}-priority task ${assignee ? `assigned to ${assignee}` : "that is currently unassigned"}.`,
      suggestedMitigation: blockedMitigation(task, project, blocker),
    });
  }

  return sortBySeverity(risks);
}

function blockedTitle(taskName: string, status: string | null, inComments: boolean): string {
  if (status && inComments) return `'${taskName}' blocked: status "${status}" and blocker in comments`;
  if (status) return `'${taskName}' blocked: status "${status}"`;
  return `'${taskName}' blocked: blocker in comments`;
}

function blockedMitigation(task: Task, project: Project, blocker: BlockerMatch | null): string {
  const parts: string[] = [];
  const assignee = assigneeOf(task);

  parts.push(
    assignee
      ? `Escalate '${task.name}' to the ${project.name} lead and agree with ${assignee} a date for clearing the blocker.`
      : `Assign an owner to '${task.name}' and escalate it to the ${project.name} lead.`
  );

  if (blocker) {
    parts.push(`Chase the dependency named in the comments directly ("${blocker.context}") and record who owns it.`);
  }

  const priority = priorityOf(task);
  if (priority === "Critical" || priority === "High") {
    parts.push(`As a ${priority.toLowerCase()}-priority task, the blockage can move project milestones; raise it in the next status report.`);
  }

  return parts.join(" ");
}
