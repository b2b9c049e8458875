import type { ContextBlock, DividerBlock, KnownBlock, SectionBlock } from "@slack/bolt";
import type { Risk } from "../data/models";
import { plural } from "../lib/format";
import type { ProjectImpact } from "../scenario/simulator";
import { ACTION_IDS, BLOCK_IDS, SEVERITY_ICONS, blockId } from "./tokens";

type Card = [SectionBlock, ContextBlock, DividerBlock];
const CARD_SIZE = 3;

export function buildRiskCard(r: Risk, index: number): Card {
  return [
    {
      type: "section",
      block_id: blockId(BLOCK_IDS.RISK_PREFIX, index, r.projectName),
      text: {
        type: "mrkdwn",
        text: `*${SEVERITY_ICONS[r.severity]} ${r.title}*  _(${r.category} • ${r.severity})_\n${r.explanation}`,
      },
    },
    {
      type: "context",
      elements: [{ type: "mrkdwn", text: `*Mitigation:* ${r.suggestedMitigation}` }],
    },
    { type: "divider" },
  ];
}

export function buildImpactCard(impact: ProjectImpact, index: number): Card {
  const lines = Object.entries(impact.changes).map(([field, change]) => `• *${field.replace(/_/g, " ")}:* ${change}`);
  return [
    {
      type: "section",
      block_id: blockId(BLOCK_IDS.IMPACT_PREFIX, index, `${impact.impactType}_${impact.projectName}`),
      text: { type: "mrkdwn", text: `*${impact.projectName}*\n${lines.join("\n")}` },
    },
    {
      type: "context",
      elements: [{ type: "mrkdwn", text: impact.impactType === "direct" ? "Direct impact" : "Cascade impact" }],
    },
    { type: "divider" },
  ];
}

export function buildEmptyState({ icon, title, hint }: { icon: string; title: string; hint: string }): SectionBlock {
  return {
    type: "section",
    block_id: BLOCK_IDS.EMPTY,
    text: { type: "mrkdwn", text: `*${icon} ${title}*\n_${hint}_` },
    accessory: {
      type: "button",
      action_id: ACTION_IDS.REFRESH,
      text: { type: "plain_text", text: "Refresh" },
    },
  };
}

/** Cards for as many items as fit in `maxBlocks`, then a "...and N more" line. */
function buildCardList<T>(
  items: readonly T[],
  build: (item: T, index: number) => Card,
  noun: string,
  maxBlocks: number
): KnownBlock[] {
  const shown =
    items.length * CARD_SIZE <= maxBlocks ? items.length : Math.max(0, Math.floor((maxBlocks - 1) / CARD_SIZE));
  const blocks: KnownBlock[] = items.slice(0, shown).flatMap((item, index) => build(item, index));
  const hidden = items.length - shown;
  if (hidden > 0) {
    blocks.push({ type: "context", elements: [{ type: "mrkdwn", text: `…and ${hidden} more ${plural(hidden, noun)}` }] });
  }
  return blocks;
}

export const buildRiskList = (items: readonly Risk[], maxBlocks = Infinity): KnownBlock[] =>
  buildCardList(items, buildRiskCard, "risk", maxBlocks);

export const buildImpactList = (items: readonly ProjectImpact[], maxBlocks = Infinity): KnownBlock[] =>
  buildCardList(items, buildImpactCard, "impact", maxBlocks);
