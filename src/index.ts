export * from "./data/models";
export { parsePortfolio, portfolioSchema, projectSchema, taskSchema, normalisePriority } from "./data/schema";

export * from "./risk/severity";
export { detectBlockedWork, findBlockerKeyword, isStatusBlocked } from "./risk/blocked";
export { detectCarryover, isComplete, CARRYOVER_THRESHOLD } from "./risk/carryover";
export { detectBurnRate, burnRateSeverity } from "./risk/burnrate";
export { detectDependencies, findDependencyMatches, extractContext, isActive } from "./risk/dependencies";
export { analysePortfolio, detectProjectRisks, DEFAULT_TOP_N, type AnalyseOptions } from "./risk/engine";

export { DependencyGraph, buildDependencyGraph, type DependencyGraphDict } from "./scenario/graph";
export * from "./scenario/action";
export { parseScenario } from "./scenario/parser";
export {
  simulate,
  runwayWeeks,
  type ProjectImpact,
  type ProjectSnapshot,
  type PortfolioState,
  type ScenarioResult,
} from "./scenario/simulator";
export { describeAction, generateNarrative, renderNarrative, type ScenarioNarrative } from "./scenario/narrative";

export * from "./decisions/log";
export { generateExecutiveSummary, collectUrgentItems, type UrgentItem } from "./insights/summary";

export { buildPortfolioHomeView, readHomeState, type HomeState, type PortfolioHomeView } from "./ui/views";
export type { PortfolioTab } from "./ui/tabs";

export { loadConfig, type PortfolioConfig, type LogLevel } from "./lib/config";
export { logger, configureLogger, Logger } from "./lib/logger";
export { PortfolioError, ParseError, ValidationError, InvariantError } from "./lib/errors";
export { type IsoDate, today } from "./lib/dates";
