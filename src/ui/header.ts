import type { SectionBlock } from "@slack/bolt";
import { BLOCK_IDS, ICONS } from "./tokens";

export function buildHeader({ icon, title, subtitle }: { icon?: string; title: string; subtitle?: string }): SectionBlock {
  return {
    type: "section",
    block_id: BLOCK_IDS.HEADER,
    text: { type: "mrkdwn", text: `*${icon ?? ICONS.PORTFOLIO} ${title}*${subtitle ? `\n_${subtitle}_` : ""}` },
  };
}
