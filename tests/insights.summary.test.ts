import type { Project } from "../src/data/models";
import { collectUrgentItems, generateExecutiveSummary } from "../src/insights/summary";
import { analysePortfolio } from "../src/risk/engine";
import { buildDependencyGraph } from "../src/scenario/graph";
import { REFERENCE_DATE, enginePortfolio, project, task } from "./fixtures";

const analyse = (projects: Project[]) => analysePortfolio(projects, { referenceDate: REFERENCE_DATE });
const overspent = (name: string) => project({ name, budget: 100, actualSpend: 200 });

function cascadingPortfolio(): Project[] {
  return [
    project({ name: "Core", tasks: [task({ name: "Release", status: "Blocked", priority: "High" })] }),
    project({ name: "App", tasks: [task({ name: "Login", comments: "Depends on Core release." })] }),
  ];
}

describe("generateExecutiveSummary", () => {
  it("leads with budget exhaustion and asks for an emergency review", () => {
    expect(generateExecutiveSummary(analyse(enginePortfolio()))).toBe(
      "Your portfolio has 1 urgent issue this cycle: " +
        "(1) Pier will exhaust its budget before delivery completes: approve a top-up or cut scope. " +
        "Recommended: schedule emergency portfolio review within 5 working days."
    );
  });

  it("flags regulatory projects with critical issues", () => {
    const report = analyse([
      project({
        name: "Cyber Shield",
        tasks: [task({ name: "Patch", status: "Blocked", priority: "High", comments: "Blocked by firewall vendor." })],
      }),
    ]);

    expect(collectUrgentItems(report)).toEqual([
      {
        priority: 2,
        projectName: "Cyber Shield",
        text: "Cyber Shield has 1 critical issue and may miss its regulatory deadline",
      },
    ]);
  });

  it("finds blocked cascades through the graph", () => {
    const projects = cascadingPortfolio();
    const report = analyse(projects);

    expect(generateExecutiveSummary(report, buildDependencyGraph(projects))).toBe(
      "Your portfolio has 1 urgent issue this cycle: " +
        "(1) blockers in Core are cascading into dependent projects. " +
        "Recommended: address these items before the next steering cycle."
    );
  });

  it("falls back to dependency wording without a graph", () => {
    expect(collectUrgentItems(analyse(cascadingPortfolio())).map((i) => i.projectName)).toEqual(["Core"]);
  });

  it("groups stalled projects into one item", () => {
    const report = analyse([
      project({ name: "Dock", status: "On Hold" }),
      project({ name: "Yard", status: "on hold" }),
      project({ name: "Mill" }),
    ]);

    expect(generateExecutiveSummary(report)).toBe(
      "Your portfolio has 1 urgent issue this cycle: " +
        "(1) Dock, Yard stalled: confirm go/no-go to release committed resources. " +
        "Recommended: review at next scheduled steering committee."
    );
  });

  it("groups only stalled projects not already named", () => {
    const report = analyse([
      project({ name: "Pier", status: "On Hold", budget: 100, actualSpend: 200 }),
      project({ name: "Dock", status: "On Hold" }),
      project({ name: "Yard", status: "On Hold" }),
    ]);

    expect(collectUrgentItems(report).map((i) => i.text)).toEqual([
      "Pier will exhaust its budget before delivery completes: approve a top-up or cut scope",
      "Dock, Yard stalled: confirm go/no-go to release committed resources",
    ]);
  });

  it("keeps one item per project and at most three", () => {
    const report = analyse([overspent("Audit Portal"), overspent("B"), overspent("C"), overspent("D")]);

    expect(collectUrgentItems(report).map((i) => [i.priority, i.projectName])).toEqual([
      [1, "Audit Portal"],
      [1, "B"],
      [1, "C"],
    ]);
  });

  it("reports a calm portfolio", () => {
    const report = analyse([
      project({ name: "Calm" }),
      project({ name: "Quiet", tasks: [task({ name: "Data", priority: "Medium", comments: "Depends on the data team." })] }),
    ]);

    expect(generateExecutiveSummary(report)).toBe(
      "The portfolio is tracking 2 active projects with 0 at Red status and 1 at Amber. " +
        "No critical escalation needed this cycle; continue standard monitoring."
    );
  });
});
