import type { PortfolioRiskReport, Project, ProjectRiskSummary, Risk } from "../data/models";
import { type IsoDate, requireIsoDate, today } from "../lib/dates";
import { InvariantError } from "../lib/errors";
import { logger } from "../lib/logger";
import { detectBlockedWork } from "./blocked";
import { detectBurnRate } from "./burnrate";
import { CARRYOVER_THRESHOLD, detectCarryover } from "./carryover";
import { detectDependencies } from "./dependencies";
import {
  SEVERITY_RANK,
  ragFromSeverity,
  sortBySeverity,
  worstRag,
  worstSeverity,
} from "./severity";

export const DEFAULT_TOP_N = 5;

export type AnalyseOptions = {
  topN?: number;
  referenceDate?: IsoDate;
  carryoverThreshold?: number;
};

/** Every detector's findings for one project, worst first, untruncated. */
export function detectProjectRisks(
  project: Project,
  referenceDate: IsoDate,
  carryoverThreshold: number = CARRYOVER_THRESHOLD
): Risk[] {
  return sortBySeverity([
    ...detectBlockedWork(project),
    ...detectCarryover(project, carryoverThreshold),
    ...detectBurnRate(project, referenceDate),
    ...detectDependencies(project),
  ]);
}

export function summariseProject(project: Project, risks: Risk[], topN: number): ProjectRiskSummary {
  const retained = sortBySeverity(risks).slice(0, topN);
  // RAG reflects only what is retained after truncation
  const worst = worstSeverity(retained);
  return {
    projectName: project.name,
    projectStatus: project.status,
    risks: retained,
    riskCount: retained.length,
    worstSeverity: worst,
    rag: ragFromSeverity(worst),
  };
}

// Projects with no risks sort after those whose worst risk is Low.
const NO_RISK_RANK = SEVERITY_RANK.Low + 1;

function compareSummaries(a: ProjectRiskSummary, b: ProjectRiskSummary): number {
  const rankA = a.worstSeverity ? SEVERITY_RANK[a.worstSeverity] : NO_RISK_RANK;
  const rankB = b.worstSeverity ? SEVERITY_RANK[b.worstSeverity] : NO_RISK_RANK;
  return rankA - rankB || b.riskCount - a.riskCount;
}

/**
 * Runs all four detectors over every project, keeps the worst `topN` risks
 * per project and rolls the result up into project and portfolio RAGs.
 */
export function analysePortfolio(projects: readonly Project[], options: AnalyseOptions = {}): PortfolioRiskReport {
  const {
    topN = DEFAULT_TOP_N,
    referenceDate = today(),
    carryoverThreshold = CARRYOVER_THRESHOLD,
  } = options;

  if (!Number.isInteger(topN) || topN < 0) {
    throw new InvariantError(`topN must be a non-negative integer, got ${topN}`);
  }
  requireIsoDate(referenceDate);

  const projectSummaries = projects
    .map((project) => summariseProject(project, detectProjectRisks(project, referenceDate, carryoverThreshold), topN))
    .sort(compareSummaries);

  const totalRisks = projectSummaries.reduce((sum, s) => sum + s.riskCount, 0);
  const projectsAtRisk = projectSummaries.filter((s) => s.riskCount > 0).length;
  const portfolioRag = worstRag(projectSummaries.map((s) => s.rag));

  logger.debug("analysePortfolio", {
    projects: projects.length,
    totalRisks,
    projectsAtRisk,
    portfolioRag,
    referenceDate,
  });

  return {
    projectSummaries,
    totalRisks,
    projectsAtRisk,
    portfolioRag,
    referenceDate,
    topN,
  };
}
