import type { Rag, RiskSeverity } from "../data/models";

export const ICONS = {
  PORTFOLIO: "📊",
  COMPASS: "🧭",
  WARNING: "⚠️",
  LINK: "🔗",
  CYCLE: "🔁",
  SCENARIO: "🧪",
  CHECK: "✅",
} as const;

export const RAG_ICONS: Readonly<Record<Rag, string>> = {
  Red: "🔴",
  Amber: "🟠",
  Green: "🟢",
};

export const SEVERITY_ICONS: Readonly<Record<RiskSeverity, string>> = {
  Critical: "🟥",
  High: "🟧",
  Medium: "🟨",
  Low: "🟩",
};

export const ACTION_IDS = {
  NAV_PREFIX: "nav_open_",
  TAB_PREFIX: "tab_",
  REFRESH: "refresh",
} as const;

export const BLOCK_IDS = {
  HEADER: "hdr",
  TABS: "tabs",
  SUMMARY: "summary",
  EMPTY: "empty",
  NAV_PREFIX: "nav_",
  RISK_PREFIX: "risk_",
  IMPACT_PREFIX: "impact_",
} as const;

// Slack rejects a view with more blocks than this.
export const MAX_VIEW_BLOCKS = 100;
// Projects listed in the nav and the summary before "...and N more".
export const MAX_LISTED_PROJECTS = 20;

// Block ids must be unique within a view and may not exceed 255 chars. The
// slug alone can collide ("Data-Platform" and "data platform"), the index cannot.
export function blockId(prefix: string, index: number, key: string): string {
  return `${prefix}${index}_${key.toLowerCase().replace(/[^a-z0-9]+/g, "_")}`.slice(0, 255);
}
