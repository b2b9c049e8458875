import type { KnownBlock } from "@slack/bolt";
import { z } from "zod";
import type { PortfolioRiskReport, ProjectRiskSummary } from "../data/models";
import { plural } from "../lib/format";
import { logger } from "../lib/logger";
import type { DependencyGraph } from "../scenario/graph";
import type { ScenarioResult } from "../scenario/simulator";
import { buildEmptyState, buildImpactList, buildRiskList } from "./cards";
import { buildHeader } from "./header";
import { buildProjectNav } from "./nav";
import { buildPortfolioTabs, PORTFOLIO_TABS, type PortfolioTab } from "./tabs";
import { BLOCK_IDS, ICONS, MAX_LISTED_PROJECTS, MAX_VIEW_BLOCKS, RAG_ICONS } from "./tokens";

export type HomeState = {
  selectedProject?: string;
  activeTab?: PortfolioTab;
};

export type PortfolioHomeView = {
  type: "home";
  private_metadata: string;
  blocks: KnownBlock[];
};

const homeStateSchema = z.object({
  selectedProject: z.string().optional(),
  activeTab: z.enum(PORTFOLIO_TABS).optional(),
});

/** Recovers navigation state stored in a published view's private_metadata. */
export function readHomeState(privateMetadata?: string): HomeState {
  if (!privateMetadata) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(privateMetadata);
  } catch (err) {
    logger.debug("readHomeState: private_metadata is not JSON", err);
    return {};
  }
  const parsed = homeStateSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
}

function summaryLine(s: ProjectRiskSummary): string {
  const worst = s.worstSeverity ? ` (worst: ${s.worstSeverity})` : "";
  return `• ${RAG_ICONS[s.rag]} *${s.projectName}*: ${s.riskCount} ${plural(s.riskCount, "risk")}${worst}`;
}

// First `limit` lines, then one line counting the rest.
function listLines(lines: readonly string[], noun: string, limit = MAX_LISTED_PROJECTS): string[] {
  const hidden = lines.length - limit;
  return hidden > 0 ? [...lines.slice(0, limit), `…and ${hidden} more ${plural(hidden, noun)}`] : [...lines];
}

function risksBody(report: PortfolioRiskReport, room: number, selected?: ProjectRiskSummary): KnownBlock[] {
  if (selected) {
    if (selected.risks.length === 0) {
      return [buildEmptyState({ icon: ICONS.CHECK, title: "No risks detected", hint: "Nothing in this project needs attention." })];
    }
    return buildRiskList(selected.risks, room);
  }
  if (report.projectSummaries.length === 0) {
    return [buildEmptyState({ icon: ICONS.COMPASS, title: "No projects", hint: "Load a portfolio to see its risks." })];
  }
  return [
    {
      type: "section",
      block_id: BLOCK_IDS.SUMMARY,
      text: { type: "mrkdwn", text: listLines(report.projectSummaries.map(summaryLine), "project").join("\n") },
    },
  ];
}

function scenarioBody(room: number, scenario?: ScenarioResult): KnownBlock[] {
  if (!scenario) {
    return [
      buildEmptyState({
        icon: ICONS.SCENARIO,
        title: "No scenario run",
        hint: "Try something like \"delay Gamma by 1 quarter\".",
      }),
    ];
  }
  const framing = scenario.warnings.length > 0 ? 3 : 2;
  const blocks: KnownBlock[] = [
    { type: "section", text: { type: "mrkdwn", text: `*${ICONS.SCENARIO} ${scenario.action.description || scenario.action.action}*` } },
    { type: "divider" },
    ...buildImpactList(scenario.impacts, room - framing),
  ];
  if (scenario.warnings.length > 0) {
    blocks.push({
      type: "context",
      elements: scenario.warnings.map((w) => ({ type: "mrkdwn" as const, text: `${ICONS.WARNING} ${w}` })),
    });
  }
  return blocks;
}

function graphBody(graph?: DependencyGraph, selected?: string): KnownBlock[] {
  if (!graph) {
    return [buildEmptyState({ icon: ICONS.LINK, title: "No dependency graph", hint: "Build the graph to see links between projects." })];
  }

  const lines = selected
    ? [
        `*Depends on:* ${graph.dependencies(selected).join(", ") || "nothing"}`,
        `*Needed by:* ${graph.dependents(selected).join(", ") || "nothing"}`,
        `*Downstream if it slips:* ${graph.allDependents(selected).join(", ") || "nothing"}`,
      ]
    : listLines(
        Object.entries(graph.toDict().edges).map(([source, deps]) => `• *${source}* depends on ${deps.join(", ")}`),
        "project"
      );

  const blocks: KnownBlock[] = [
    { type: "section", text: { type: "mrkdwn", text: lines.join("\n") || "_No dependencies between projects._" } },
  ];
  const cycle = graph.detectCycle();
  if (cycle) {
    blocks.push({
      type: "context",
      elements: [{ type: "mrkdwn", text: `${ICONS.CYCLE} Circular dependency: ${cycle.join(" → ")}` }],
    });
  }
  return blocks;
}

function bodyFor(
  tab: PortfolioTab,
  room: number,
  ctx: { report: PortfolioRiskReport; graph?: DependencyGraph; scenario?: ScenarioResult; selected?: ProjectRiskSummary }
): KnownBlock[] {
  switch (tab) {
    case "risks":
      return risksBody(ctx.report, room, ctx.selected);
    case "scenario":
      return scenarioBody(room, ctx.scenario);
    case "graph":
      return graphBody(ctx.graph, ctx.selected?.projectName);
  }
}

export function buildPortfolioHomeView(params: {
  report: PortfolioRiskReport;
  graph?: DependencyGraph;
  selectedProject?: string;
  activeTab?: PortfolioTab;
  scenario?: ScenarioResult;
}): PortfolioHomeView {
  const { report, graph, activeTab = "risks", scenario } = params;
  const selected = report.projectSummaries.find((s) => s.projectName === params.selectedProject);

  const header = selected
    ? buildHeader({
        icon: RAG_ICONS[selected.rag],
        title: selected.projectName,
        subtitle: `${selected.projectStatus || "No status"} • ${selected.riskCount} ${plural(selected.riskCount, "risk")}`,
      })
    : buildHeader({
        title: "Portfolio risk overview",
        subtitle:
          `${RAG_ICONS[report.portfolioRag]} ${report.portfolioRag} • ${report.totalRisks} ${plural(report.totalRisks, "risk")} ` +
          `across ${report.projectsAtRisk} of ${report.projectSummaries.length} projects • as of ${report.referenceDate}`,
      });

  const chrome: KnownBlock[] = [
    ...buildProjectNav(report.projectSummaries, selected?.projectName),
    header,
    { type: "divider" },
    buildPortfolioTabs(activeTab),
    { type: "divider" },
  ];
  const body = bodyFor(activeTab, MAX_VIEW_BLOCKS - chrome.length, { report, graph, scenario, selected });

  const state: HomeState = { selectedProject: selected?.projectName, activeTab };

  return {
    type: "home",
    private_metadata: JSON.stringify(state),
    blocks: [...chrome, ...body],
  };
}
