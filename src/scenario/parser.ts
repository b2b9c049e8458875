import { ParseError } from "../lib/errors";
import { logger } from "../lib/logger";
import { type ScenarioAction, parseAction } from "./action";

export const WEEKS_PER_UNIT: Readonly<Record<string, number>> = {
  week: 1,
  weeks: 1,
  fortnight: 2,
  fortnights: 2,
  month: 4,
  months: 4,
  quarter: 13,
  quarters: 13,
  year: 52,
  years: 52,
};

const UNIT = "(weeks?|fortnights?|months?|quarters?|years?)";
const NUMBER = "(\\d+(?:\\.\\d+)?)";
const BUDGET_VERB = "(increase|decrease|reduce|raise|boost|lower)";
const SHRINKING_VERBS = new Set(["decrease", "reduce", "lower"]);

const REMOVE_PATTERN = /^(?:remove|cancel|drop|kill|delete)\s+(?:project\s+)?(.+?)(?:\s+from\s+(?:the\s+)?portfolio)?$/;

// "<verb> X budget by ..." and "<verb> the budget for X by ..."
const BUDGET_PCT_PATTERNS = [
  new RegExp(`^${BUDGET_VERB}\\s+(?:project\\s+)?(.+?)\\s+budget\\s+by\\s+${NUMBER}\\s*%`),
  new RegExp(`^${BUDGET_VERB}\\s+(?:the\\s+)?budget\\s+(?:for|of|on)\\s+(?:project\\s+)?(.+?)\\s+by\\s+${NUMBER}\\s*%`),
];
const BUDGET_ABS_PATTERNS = [
  new RegExp(`^${BUDGET_VERB}\\s+(?:project\\s+)?(.+?)\\s+budget\\s+by\\s+[£$€]?\\s*(\\d[\\d,]*(?:\\.\\d+)?)`),
  new RegExp(`^${BUDGET_VERB}\\s+(?:the\\s+)?budget\\s+(?:for|of|on)\\s+(?:project\\s+)?(.+?)\\s+by\\s+[£$€]?\\s*(\\d[\\d,]*(?:\\.\\d+)?)`),
];

const SCOPE_PATTERNS = [
  new RegExp(`^(?:cut|reduce|trim|shrink)\\s+(?:project\\s+)?(.+?)\\s+scope\\s+by\\s+${NUMBER}\\s*%`),
  new RegExp(`^(?:cut|reduce|trim|shrink)\\s+(?:the\\s+)?scope\\s+(?:for|of|on)\\s+(?:project\\s+)?(.+?)\\s+by\\s+${NUMBER}\\s*%`),
];

const DELAY_PATTERNS = [
  new RegExp(`^(?:delay|push back|postpone|defer|extend)\\s+(?:project\\s+)?(.+?)\\s+by\\s+(\\d+)\\s+${UNIT}\\b`),
  new RegExp(`^(?:delay|push back|postpone|defer|extend)\\s+(?:project\\s+)?(.+?)\\s+(\\d+)\\s+${UNIT}\\b`),
];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type Draft = DistributiveOmit<ScenarioAction, "description">;
type Matcher = (lower: string, original: string) => Draft | null;

/**
 * Matching runs on a lowercased copy; the name is then sliced back out of
 * the original so "delay project GAMMA-2" yields "GAMMA-2". Lowercasing can
 * change a string's length ("İ" becomes two code units), so the span is found
 * in the original rather than by offset.
 */
export function restoreProjectName(matched: string, original: string): string {
  const name = matched.trim().replace(/^['"]+|['"]+$/g, "");
  for (let start = 0; start < original.length; start++) {
    if (!original.slice(start).toLowerCase().startsWith(name)) continue;
    for (let end = start + 1; end <= original.length; end++) {
      const span = original.slice(start, end);
      if (span.toLowerCase() === name) return span.trim();
    }
  }
  return name;
}

function firstMatch(patterns: readonly RegExp[], lower: string): RegExpMatchArray | null {
  for (const pattern of patterns) {
    const match = lower.match(pattern);
    if (match) return match;
  }
  return null;
}

const matchRemove: Matcher = (lower, original) => {
  const match = lower.match(REMOVE_PATTERN);
  if (!match) return null;
  return { action: "remove", project: restoreProjectName(match[1], original) };
};

const matchBudget: Matcher = (lower, original) => {
  const pct = firstMatch(BUDGET_PCT_PATTERNS, lower);
  const abs = pct ? null : firstMatch(BUDGET_ABS_PATTERNS, lower);
  const match = pct ?? abs;
  if (!match) return null;

  const action = SHRINKING_VERBS.has(match[1]) ? "budget_decrease" : "budget_increase";
  const project = restoreProjectName(match[2], original);
  return pct
    ? { action, project, change: { kind: "percentage", fraction: Number(match[3]) / 100 } }
    : { action, project, change: { kind: "absolute", amount: Number(match[3].replace(/,/g, "")) } };
};

const matchScopeCut: Matcher = (lower, original) => {
  const match = firstMatch(SCOPE_PATTERNS, lower);
  if (!match) return null;
  return {
    action: "scope_cut",
    project: restoreProjectName(match[1], original),
    fraction: Number(match[2]) / 100,
  };
};

const matchDelay: Matcher = (lower, original) => {
  const match = firstMatch(DELAY_PATTERNS, lower);
  if (!match) return null;
  const weeksPerUnit = WEEKS_PER_UNIT[match[3]] ?? 1;
  return {
    action: "delay",
    project: restoreProjectName(match[1], original),
    durationWeeks: Number(match[2]) * weeksPerUnit,
  };
};

// Order matters: "reduce X budget" must be read as a budget change before
// the scope matcher sees "reduce".
const MATCHERS: readonly Matcher[] = [matchRemove, matchBudget, matchScopeCut, matchDelay];

/**
 * Turns an instruction such as "delay Project Gamma by 1 quarter" into a
 * validated {@link ScenarioAction}.
 *
 * @throws ParseError when the text is empty or matches no known form
 */
export function parseScenario(text: string): ScenarioAction {
  const original = text.trim();
  if (!original) {
    throw new ParseError("Empty scenario input.");
  }

  const lower = original.toLowerCase();
  for (const matcher of MATCHERS) {
    const draft = matcher(lower, original);
    if (!draft) continue;
    const action = parseAction({ ...draft, description: original });
    logger.debug("parseScenario", { text: original, action });
    return action;
  }

  throw new ParseError(
    `Could not parse scenario: '${original}'. ` +
      "Supported patterns: budget increase/decrease, scope cut, delay, remove."
  );
}
