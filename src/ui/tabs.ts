import type { ActionsBlock, Button } from "@slack/bolt";
import { ACTION_IDS, BLOCK_IDS, ICONS } from "./tokens";

export const PORTFOLIO_TABS = ["risks", "scenario", "graph"] as const;
export type PortfolioTab = (typeof PORTFOLIO_TABS)[number];

const LABELS: Record<PortfolioTab, string> = {
  risks: `${ICONS.WARNING} Risks`,
  scenario: `${ICONS.SCENARIO} Scenario`,
  graph: `${ICONS.LINK} Dependencies`,
};

export function isPortfolioTab(value: unknown): value is PortfolioTab {
  return PORTFOLIO_TABS.some((t) => t === value);
}

export function buildPortfolioTabs(active: PortfolioTab): ActionsBlock {
  return {
    type: "actions",
    block_id: BLOCK_IDS.TABS,
    elements: PORTFOLIO_TABS.map(
      (tab): Button => ({
        type: "button",
        action_id: `${ACTION_IDS.TAB_PREFIX}${tab}`,
        text: { type: "plain_text", text: LABELS[tab] },
        value: tab,
        ...(tab === active ? { style: "primary" as const } : {}),
      })
    ),
  };
}
