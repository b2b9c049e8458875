import { analysePortfolio } from "../src/risk/engine";
import { buildDependencyGraph, DependencyGraph } from "../src/scenario/graph";
import { parseScenario } from "../src/scenario/parser";
import { simulate } from "../src/scenario/simulator";
import { buildPortfolioTabs } from "../src/ui/tabs";
import { buildPortfolioHomeView, readHomeState } from "../src/ui/views";
import { REFERENCE_DATE, enginePortfolio, project, scenarioPortfolio, task } from "./fixtures";

const engineReport = () => analysePortfolio(enginePortfolio(), { referenceDate: REFERENCE_DATE });

describe("buildPortfolioHomeView", () => {
  it("summarises every project on the risks tab", () => {
    const view = buildPortfolioHomeView({ report: engineReport() });

    expect(view.type).toBe("home");
    expect(view.private_metadata).toBe('{"activeTab":"risks"}');
    expect(view.blocks).toHaveLength(11);
    expect(view.blocks[6]).toEqual({
      type: "section",
      block_id: "hdr",
      text: {
        type: "mrkdwn",
        text: "*📊 Portfolio risk overview*\n_🔴 Red • 4 risks across 3 of 4 projects • as of 2026-02-19_",
      },
    });
    expect(view.blocks[10]).toEqual({
      type: "section",
      block_id: "summary",
      text: {
        type: "mrkdwn",
        text: [
          "• 🔴 *Pier*: 1 risk (worst: Critical)",
          "• 🔴 *Harbour*: 2 risks (worst: High)",
          "• 🟠 *Lighthouse*: 1 risk (worst: Medium)",
          "• 🟢 *Quay*: 0 risks",
        ].join("\n"),
      },
    });
  });

  it("shows one project's risk cards when selected", () => {
    const view = buildPortfolioHomeView({ report: engineReport(), selectedProject: "Harbour" });

    expect(view.private_metadata).toBe('{"selectedProject":"Harbour","activeTab":"risks"}');
    expect(view.blocks[2]).toMatchObject({
      block_id: "nav_1_harbour",
      text: { text: "• 🔴 *Harbour*  _2 risks_" },
      accessory: { action_id: "nav_open_1_harbour", text: { text: "Open" }, value: "Harbour" },
    });
    expect(view.blocks[6]).toMatchObject({ text: { text: "*🔴 Harbour*\n_In Progress • 2 risks_" } });
    // two risk cards of three blocks each
    expect(view.blocks.slice(10)).toHaveLength(6);
    expect(view.blocks[10]).toMatchObject({ block_id: "risk_0_harbour" });
  });

  it("shows an empty state for a selected project without risks", () => {
    const view = buildPortfolioHomeView({ report: engineReport(), selectedProject: "Quay" });
    expect(view.blocks[view.blocks.length - 1]).toMatchObject({
      block_id: "empty",
      text: { text: "*✅ No risks detected*\n_Nothing in this project needs attention._" },
    });
  });

  it("prompts for a scenario when none has been run", () => {
    const view = buildPortfolioHomeView({ report: engineReport(), activeTab: "scenario" });
    expect(view.blocks[view.blocks.length - 1]).toMatchObject({
      block_id: "empty",
      text: { text: '*🧪 No scenario run*\n_Try something like "delay Gamma by 1 quarter"._' },
    });
  });

  it("renders scenario impacts and warnings", () => {
    const projects = scenarioPortfolio();
    const graph = buildDependencyGraph(projects);
    const scenario = simulate(parseScenario("delay Gamma by 1 quarter"), projects, graph, REFERENCE_DATE);
    const report = analysePortfolio(projects, { referenceDate: REFERENCE_DATE });
    const view = buildPortfolioHomeView({ report, graph, activeTab: "scenario", scenario });

    const body = view.blocks.slice(view.blocks.length - 12);
    expect(body[0]).toEqual({ type: "section", text: { type: "mrkdwn", text: "*🧪 delay Gamma by 1 quarter*" } });
    expect(body[2]).toEqual({
      type: "section",
      block_id: "impact_0_direct_gamma",
      text: {
        type: "mrkdwn",
        text: "*Gamma*\n• *start date:* 2025-11-03 → 2026-02-02\n• *end date:* 2026-04-30 → 2026-07-30\n• *delay weeks:* 13",
      },
    });
    expect(body[11]).toEqual({
      type: "context",
      elements: [{ type: "mrkdwn", text: "⚠️ Delay on Gamma cascades to 2 dependent projects: Delta, Epsilon." }],
    });
  });

  it("lists dependency edges on the graph tab", () => {
    const projects = scenarioPortfolio();
    const report = analysePortfolio(projects, { referenceDate: REFERENCE_DATE });
    const graph = buildDependencyGraph(projects);

    const overview = buildPortfolioHomeView({ report, graph, activeTab: "graph" });
    expect(overview.blocks[overview.blocks.length - 1]).toEqual({
      type: "section",
      text: { type: "mrkdwn", text: "• *Delta* depends on Gamma\n• *Epsilon* depends on Delta" },
    });

    const delta = buildPortfolioHomeView({ report, graph, activeTab: "graph", selectedProject: "Delta" });
    expect(delta.blocks[delta.blocks.length - 1]).toEqual({
      type: "section",
      text: {
        type: "mrkdwn",
        text: "*Depends on:* Gamma\n*Needed by:* Epsilon\n*Downstream if it slips:* Epsilon",
      },
    });
  });

  it("calls out a circular dependency", () => {
    const report = analysePortfolio([project({ name: "A" }), project({ name: "B" })], { referenceDate: REFERENCE_DATE });
    const graph = DependencyGraph.fromDict({ projects: ["A", "B"], edges: { A: ["B"], B: ["A"] } });
    const view = buildPortfolioHomeView({ report, graph, activeTab: "graph" });

    expect(view.blocks[view.blocks.length - 1]).toEqual({
      type: "context",
      elements: [{ type: "mrkdwn", text: "🔁 Circular dependency: A → B → A" }],
    });
  });

  it("gives every block a distinct id when project names slug alike", () => {
    const blocked = task({ name: "Ingest", status: "Blocked", priority: "High" });
    const report = analysePortfolio(
      ["Data-Platform", "data platform", "Ωψ", "Δλ"].map((name) => project({ name, tasks: [blocked] })),
      { referenceDate: REFERENCE_DATE }
    );
    const view = buildPortfolioHomeView({ report, selectedProject: "data platform" });

    const ids = view.blocks.map((b) => b.block_id).filter((id) => id !== undefined);
    expect(ids.slice(0, 4)).toEqual(["nav_0_data_platform", "nav_1_data_platform", "nav_2__", "nav_3__"]);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it("stays within Slack's block limit for a large portfolio", () => {
    const projects = Array.from({ length: 120 }, (_, i) => project({ name: `Project ${i + 1}` }));
    const view = buildPortfolioHomeView({ report: analysePortfolio(projects, { referenceDate: REFERENCE_DATE }) });

    // 20 nav entries, the "more" line, then the usual chrome and one summary block
    expect(view.blocks).toHaveLength(28);
    expect(view.blocks[21]).toEqual({ type: "context", elements: [{ type: "mrkdwn", text: "…and 100 more projects" }] });
    expect(view.blocks[27]).toMatchObject({ block_id: "summary" });
    expect(JSON.stringify(view.blocks[27]).endsWith('…and 100 more projects"}}')).toBe(true);
  });

  it("truncates scenario impacts to fit the view", () => {
    const projects = [
      project({ name: "Hub", startDate: "2026-01-05", endDate: "2026-06-30" }),
      ...Array.from({ length: 40 }, (_, i) =>
        project({ name: `Team ${i + 1}`, tasks: [task({ name: "Build", comments: "Depends on Hub." })] })
      ),
    ];
    const graph = buildDependencyGraph(projects);
    const scenario = simulate(parseScenario("delay Hub by 2 weeks"), projects, graph, REFERENCE_DATE);
    const report = analysePortfolio(projects, { referenceDate: REFERENCE_DATE });
    const view = buildPortfolioHomeView({ report, graph, activeTab: "scenario", scenario });

    expect(scenario.impacts).toHaveLength(41);
    expect(view.blocks).toHaveLength(100);
    expect(view.blocks[98]).toEqual({ type: "context", elements: [{ type: "mrkdwn", text: "…and 18 more impacts" }] });
    expect(view.blocks[99]).toMatchObject({ type: "context" });
  });

  it("shows an empty state on the graph tab without a graph", () => {
    const view = buildPortfolioHomeView({ report: engineReport(), activeTab: "graph" });
    expect(view.blocks[view.blocks.length - 1]).toMatchObject({ block_id: "empty" });
  });
});

describe("buildPortfolioTabs", () => {
  it("highlights the active tab only", () => {
    expect(buildPortfolioTabs("scenario")).toEqual({
      type: "actions",
      block_id: "tabs",
      elements: [
        { type: "button", action_id: "tab_risks", text: { type: "plain_text", text: "⚠️ Risks" }, value: "risks" },
        {
          type: "button",
          action_id: "tab_scenario",
          text: { type: "plain_text", text: "🧪 Scenario" },
          value: "scenario",
          style: "primary",
        },
        { type: "button", action_id: "tab_graph", text: { type: "plain_text", text: "🔗 Dependencies" }, value: "graph" },
      ],
    });
  });
});

describe("readHomeState", () => {
  it("round-trips the state a view stores", () => {
    const view = buildPortfolioHomeView({ report: engineReport(), selectedProject: "Pier", activeTab: "graph" });
    expect(readHomeState(view.private_metadata)).toEqual({ selectedProject: "Pier", activeTab: "graph" });
  });

  it("ignores missing, malformed or unknown state", () => {
    expect(readHomeState()).toEqual({});
    expect(readHomeState("not json")).toEqual({});
    expect(readHomeState('{"activeTab":"calendar"}')).toEqual({});
  });
});
