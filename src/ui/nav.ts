import type { ContextBlock, DividerBlock, SectionBlock } from "@slack/bolt";
import type { ProjectRiskSummary } from "../data/models";
import { plural } from "../lib/format";
import { ACTION_IDS, BLOCK_IDS, MAX_LISTED_PROJECTS, RAG_ICONS, blockId } from "./tokens";

export function buildProjectNav(
  summaries: readonly ProjectRiskSummary[],
  selected?: string,
  limit = MAX_LISTED_PROJECTS
): Array<ContextBlock | SectionBlock | DividerBlock> {
  const blocks: Array<ContextBlock | SectionBlock | DividerBlock> = [
    { type: "context", elements: [{ type: "mrkdwn", text: "*Projects*" }] },
  ];
  summaries.slice(0, limit).forEach((s, index) => {
    const isSelected = s.projectName === selected;
    blocks.push({
      type: "section",
      block_id: blockId(BLOCK_IDS.NAV_PREFIX, index, s.projectName),
      text: {
        type: "mrkdwn",
        text: `${isSelected ? "•" : "◦"} ${RAG_ICONS[s.rag]} *${s.projectName}*  _${s.riskCount} ${plural(s.riskCount, "risk")}_`,
      },
      accessory: {
        type: "button",
        action_id: blockId(ACTION_IDS.NAV_PREFIX, index, s.projectName),
        text: { type: "plain_text", text: isSelected ? "Open" : "View" },
        value: s.projectName,
      },
    });
  });
  const hidden = summaries.length - limit;
  if (hidden > 0) {
    blocks.push({
      type: "context",
      elements: [{ type: "mrkdwn", text: `…and ${hidden} more ${plural(hidden, "project")}` }],
    });
  }
  blocks.push({ type: "divider" });
  return blocks;
}
