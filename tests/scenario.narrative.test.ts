import { parseAction } from "../src/scenario/action";
import { buildDependencyGraph } from "../src/scenario/graph";
import { describeAction, generateNarrative } from "../src/scenario/narrative";
import { parseScenario } from "../src/scenario/parser";
import { simulate } from "../src/scenario/simulator";
import { REFERENCE_DATE, scenarioPortfolio } from "./fixtures";

function narrate(text: string) {
  const projects = scenarioPortfolio();
  return generateNarrative(simulate(parseScenario(text), projects, buildDependencyGraph(projects), REFERENCE_DATE));
}

describe("generateNarrative", () => {
  describe("for a cascading delay", () => {
    const narrative = narrate("delay Gamma by 1 quarter");

    it("summarises before and after", () => {
      expect(narrative.title).toBe("Schedule Delay: Gamma");
      expect(narrative.scenarioDescription).toBe("delay Gamma by 1 quarter");
      expect(narrative.beforeSummary).toBe(
        "Gamma is currently In Progress. Budget: 150,000 (40% consumed, 60,000 spent). " +
          "Timeline: 2025-11-03 to 2026-04-30. 1 task in progress."
      );
      expect(narrative.afterSummary).toBe(
        "Start Date: 2025-11-03 → 2026-02-02. End Date: 2026-04-30 → 2026-07-30. Delay Weeks: 13."
      );
    });

    it("lists every downstream project", () => {
      expect(narrative.cascadeAnalysis).toBe(
        [
          "2 downstream projects affected:",
          "**Delta**: Delayed by 13 weeks. New end date: 2026-12-30. Cascade delay from Gamma.",
          "**Epsilon**: Delayed by 13 weeks. New end date: 2027-03-19. Cascade delay from Gamma.",
        ].join("\n")
      );
    });

    it("recommends follow-up for stakeholders and dependents", () => {
      expect(narrative.recommendations).toEqual([
        "Communicate the revised timeline for Gamma to all stakeholders.",
        "Assess the cascade impact on 2 dependent projects and update their timelines.",
        "Review whether the delay changes the cost profile (extended team costs, contract implications).",
      ]);
    });

    it("renders markdown sections in order", () => {
      expect(narrative.fullText.startsWith("# Scenario Impact Summary\n\n## Scenario\ndelay Gamma by 1 quarter\n\n## Before\n")).toBe(
        true
      );
      expect(narrative.fullText.endsWith(
        "## Warnings\n- Delay on Gamma cascades to 2 dependent projects: Delta, Epsilon.\n"
      )).toBe(true);
      expect(narrative.fullText.indexOf("## Cascade Effects")).toBeLessThan(
        narrative.fullText.indexOf("## Recommended Actions")
      );
    });
  });

  it("describes a budget change field by field", () => {
    const narrative = narrate("increase Alpha budget by 20%");
    expect(narrative.title).toBe("Budget Increase: Alpha");
    expect(narrative.afterSummary).toBe("Budget: 200,000 → 240,000. Runway Weeks: 1 → 7.");
    expect(narrative.cascadeAnalysis).toBe("");
  });

  it("flags an over-budget decrease as urgent", () => {
    const narrative = narrate("decrease Alpha budget by 50,000");
    expect(narrative.recommendations).toContain("URGENT: Alpha is already over budget. Immediate intervention required.");
  });

  it("quotes the days saved by a scope cut", () => {
    const narrative = narrate("cut Gamma scope by 25%");
    expect(narrative.impactAnalysis).toBe(
      "Reducing scope on Gamma by 25% is estimated to save 44 days on the delivery timeline. " +
        "This trades feature completeness for earlier delivery. Review which deliverables are deferred."
    );
  });

  it("falls back to placeholders for an unknown project", () => {
    const narrative = narrate("remove Omega");

    expect(narrative.title).toBe("Project Removal: Omega");
    expect(narrative.beforeSummary).toBe("Omega: No data available.");
    expect(narrative.afterSummary).toBe("No direct impact identified.");
    expect(narrative.impactAnalysis).toBe("No measurable impact.");
    expect(narrative.recommendations).toEqual([]);
    expect(narrative.fullText).not.toContain("## Recommended Actions");
    expect(narrative.warnings).toEqual([
      "Project 'Omega' not found in portfolio. Available projects: Alpha, Delta, Epsilon, Gamma",
    ]);
  });
});

describe("describeAction", () => {
  it("uses the original text when there is one", () => {
    expect(describeAction(parseScenario("Delay Gamma by 2 weeks"))).toBe("Delay Gamma by 2 weeks");
  });

  it("builds a description from the action fields otherwise", () => {
    expect(describeAction(parseAction({ action: "scope_cut", project: "Beta", fraction: 0.3 }))).toBe(
      "Cut Beta scope by 30%"
    );
    expect(describeAction(parseAction({ action: "delay", project: "Beta", durationWeeks: 1 }))).toBe(
      "Delay Beta by 1 week"
    );
    expect(
      describeAction(
        parseAction({ action: "budget_increase", project: "Beta", change: { kind: "absolute", amount: 25000 } })
      )
    ).toBe("Increase Beta budget by 25,000");
    expect(describeAction(parseAction({ action: "remove", project: "Beta" }))).toBe("Remove Beta from portfolio");
  });
});
