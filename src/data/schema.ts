import { z } from "zod";
import { isIsoDate } from "../lib/dates";
import { ValidationError } from "../lib/errors";
import type { Project, TaskPriority } from "./models";

export const TASK_PRIORITIES: readonly TaskPriority[] = ["Critical", "High", "Medium", "Low"];

export function normalisePriority(value?: string | null): TaskPriority {
  const key = (value ?? "").trim().toLowerCase();
  return TASK_PRIORITIES.find((p) => p.toLowerCase() === key) ?? "Medium";
}

const isoDate = z.string().trim().refine(isIsoDate, { message: "Expected a calendar date as YYYY-MM-DD" });
const amount = z.number().finite().nonnegative().default(0);

export const taskSchema = z.object({
  name: z.string().trim().min(1),
  status: z.string().default(""),
  priority: z.string().nullish().transform(normalisePriority),
  assignee: z.string().optional(),
  sprint: z.string().optional(),
  previousSprints: z.array(z.string()).default([]),
  comments: z.string().optional(),
});

export const projectSchema = z.object({
  name: z.string().trim().min(1),
  status: z.string().default(""),
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
  budget: amount,
  actualSpend: amount,
  tasks: z.array(taskSchema).default([]),
});

export const portfolioSchema = z.array(projectSchema).superRefine((projects, ctx) => {
  const seen = new Set<string>();
  projects.forEach((project, index) => {
    if (seen.has(project.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "name"],
        message: `Duplicate project name: ${project.name}`,
      });
    }
    seen.add(project.name);
  });
});

/**
 * Checks records from an ingestion layer against the portfolio contract and
 * fills defaults.
 *
 * @throws ValidationError listing every problem found
 */
export function parsePortfolio(input: unknown): Project[] {
  const parsed = portfolioSchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? ` at ${first.path.join(".")}: ${first.message}` : "";
    throw new ValidationError(`Invalid portfolio${where}`, parsed.error.issues);
  }
  return parsed.data;
}
