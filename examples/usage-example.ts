// Example: analyse the sample portfolio, run a what-if and build the Slack home view.
//
// A host app would publish `view` with its own Slack client, e.g.
//   await client.views.publish({ user_id, view });

import {
  DecisionLog,
  analysePortfolio,
  buildDependencyGraph,
  buildPortfolioHomeView,
  configureLogger,
  decisionFromScenario,
  decisionsFromRiskReport,
  generateExecutiveSummary,
  generateNarrative,
  loadConfig,
  logger,
  parseScenario,
  simulate,
} from "../src";
import { SAMPLE_REFERENCE_DATE, sampleProjects } from "../src/data/seed";

function main(instruction: string): void {
  const config = loadConfig();
  configureLogger(config);

  const referenceDate = SAMPLE_REFERENCE_DATE;
  const report = analysePortfolio(sampleProjects, {
    topN: config.topN,
    carryoverThreshold: config.carryoverThreshold,
    referenceDate,
  });
  const graph = buildDependencyGraph(sampleProjects);

  console.log(generateExecutiveSummary(report, graph));

  for (const summary of report.projectSummaries) {
    console.log(`${summary.rag.padEnd(5)} ${summary.projectName} (${summary.riskCount} risks)`);
    for (const risk of summary.risks) {
      console.log(`  [${risk.severity}] ${risk.title}`);
    }
  }

  const action = parseScenario(instruction);
  const result = simulate(action, sampleProjects, graph, referenceDate);
  console.log(generateNarrative(result).fullText);

  const log = new DecisionLog();
  decisionsFromRiskReport(report, log, referenceDate);
  decisionFromScenario(result, log, referenceDate);
  console.log(JSON.stringify(log, null, 2));

  const view = buildPortfolioHomeView({ report, graph, activeTab: "scenario", scenario: result });
  console.log(`Home view has ${view.blocks.length} blocks`);
}

try {
  main(process.argv.slice(2).join(" ") || "delay Gamma by 1 quarter");
} catch (err) {
  logger.error("usage example failed", err);
  process.exitCode = 1;
}
