import type { Project, Task } from "../src/data/models";

export const REFERENCE_DATE = "2026-02-19";

export function task(overrides: Partial<Task> & { name: string }): Task {
  return { status: "To Do", ...overrides };
}

export function project(overrides: Partial<Project> & { name: string }): Project {
  return { status: "In Progress", tasks: [], ...overrides };
}

// Four projects with one clear worst severity each: Critical, High, Medium, none.
export function enginePortfolio(): Project[] {
  return [
    project({
      name: "Harbour",
      tasks: [
        task({ name: "Crane permits", status: "Blocked", priority: "High", assignee: "Mo" }),
        task({
          name: "Berth survey",
          status: "In Progress",
          priority: "Low",
          sprint: "S4",
          previousSprints: ["S1", "S2", "S3"],
        }),
      ],
    }),
    project({
      name: "Lighthouse",
      tasks: [task({ name: "Lens order", priority: "Medium", comments: "Depends on the data team." })],
    }),
    project({ name: "Quay" }),
    project({ name: "Pier", budget: 100000, actualSpend: 150000 }),
  ];
}

// Gamma <- Delta <- Epsilon, with Alpha on its own.
export function scenarioPortfolio(): Project[] {
  return [
    project({
      name: "Alpha",
      startDate: "2025-09-01",
      endDate: "2026-04-30",
      budget: 200000,
      actualSpend: 185000,
      tasks: [task({ name: "Vendor API integration" }), task({ name: "Data model review" })],
    }),
    project({
      name: "Gamma",
      startDate: "2025-11-03",
      endDate: "2026-04-30",
      budget: 150000,
      actualSpend: 60000,
      tasks: [task({ name: "Schema migration" })],
    }),
    project({
      name: "Delta",
      status: "On Hold",
      startDate: "2026-01-05",
      endDate: "2026-09-30",
      budget: 90000,
      actualSpend: 10000,
      tasks: [task({ name: "Onboarding flow", comments: "Waiting for Gamma to finish the migration." })],
    }),
    project({
      name: "Epsilon",
      startDate: "2026-02-02",
      endDate: "2026-12-18",
      budget: 60000,
      actualSpend: 5000,
      tasks: [task({ name: "Partner portal", comments: "Requires Delta onboarding flow." })],
    }),
  ];
}
