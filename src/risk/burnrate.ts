import { budgetOf, type Project, type Risk, RiskCategory, type RiskSeverity, spendOf } from "../data/models";
import { daysBetween, type IsoDate, requireIsoDate, today } from "../lib/dates";
import { clamp, formatAmount, formatPct } from "../lib/format";

export const SPEND_THRESHOLD = 0.9;
export const CRITICAL_SPEND = 0.95;
export const TIME_REMAINING_THRESHOLD = 0.1;
export const COMFORTABLE_TIME_REMAINING = 0.2;

/**
 * Severity ladder for a qualifying burn: Critical at 95% spend, Critical at
 * 90% spend with 20%+ of the timeline left, High at 90%, Medium below that.
 * detectBurnRate never calls this below 90% spend, so Medium is not produced
 * in practice; the rung is kept as is.
 */
export function burnRateSeverity(spendPct: number, timeRemainingPct: number): RiskSeverity {
  if (spendPct >= CRITICAL_SPEND) return "Critical";
  if (spendPct >= SPEND_THRESHOLD && timeRemainingPct >= COMFORTABLE_TIME_REMAINING) return "Critical";
  if (spendPct >= SPEND_THRESHOLD) return "High";
  return "Medium";
}

export type Timeline = {
  totalDays: number;
  elapsedPct: number;
  remainingPct: number;
};

/** Position of `referenceDate` within the project's dates, or null without a usable range. */
export function timelineOf(project: Project, referenceDate: IsoDate): Timeline | null {
  if (!project.startDate || !project.endDate) return null;
  const totalDays = daysBetween(project.startDate, project.endDate);
  if (totalDays <= 0) return null;
  const elapsedPct = clamp(daysBetween(project.startDate, referenceDate) / totalDays, 0, 1);
  return { totalDays, elapsedPct, remainingPct: 1 - elapsedPct };
}

/**
 * Compares budget consumed against time elapsed. Skips projects without a
 * budget; overspend is flagged whatever the dates say.
 *
 * @throws ValidationError when `referenceDate` is not a calendar date
 */
export function detectBurnRate(project: Project, referenceDate: IsoDate = today()): Risk[] {
  requireIsoDate(referenceDate);
  const budget = budgetOf(project);
  if (budget <= 0) return [];

  const spend = spendOf(project);
  const spendPct = spend / budget;
  const money = `${formatAmount(spend)} of ${formatAmount(budget)}`;

  if (spendPct > 1) {
    return [{
      projectName: project.name,
      category: RiskCategory.BURN_RATE,
      severity: "Critical",
      title: `${project.name} has exceeded budget (${formatPct(spendPct)} spent)`,
      explanation:
        `${project.name} has spent ${money} budgeted, an overspend of ` +
        `${formatAmount(spend - budget)}. Any further work is unfunded.`,
      suggestedMitigation:
        `Take ${project.name} to the steering committee now: approve a budget increase, ` +
        `cut remaining scope, or stop the project.`,
    }];
  }

  const hasDates = Boolean(project.startDate && project.endDate);
  if (!hasDates) {
    if (spendPct < SPEND_THRESHOLD) return [];
    return [{
      projectName: project.name,
      category: RiskCategory.BURN_RATE,
      severity: "High",
      title: `${project.name} has used ${formatPct(spendPct)} of budget (no timeline data)`,
      explanation:
        `${project.name} has spent ${money} budgeted. Start and end dates are unavailable, ` +
        `so it is unclear how much work remains for the last ${formatPct(1 - spendPct)}.`,
      suggestedMitigation:
        `Confirm the ${project.name} delivery dates and a cost-to-complete estimate, ` +
        `then review the forecast at the next steering committee.`,
    }];
  }

  const timeline = timelineOf(project, referenceDate);
  if (!timeline) return [];

  const { elapsedPct, remainingPct } = timeline;
  if (spendPct < SPEND_THRESHOLD || remainingPct <= TIME_REMAINING_THRESHOLD) return [];

  return [{
    projectName: project.name,
    category: RiskCategory.BURN_RATE,
    severity: burnRateSeverity(spendPct, remainingPct),
    title: `${project.name} has burned ${formatPct(spendPct)} of budget with ${formatPct(remainingPct)} of time left`,
    explanation:
      `${project.name} has spent ${money} budgeted (${formatPct(spendPct)}) but is only ` +
      `${formatPct(elapsedPct)} of the way from ${project.startDate} to ${project.endDate} ` +
      `as of ${referenceDate}. At this rate the money runs out before the work does.`,
    suggestedMitigation:
      `Ask the ${project.name} team for a cost-to-complete forecast and bring it to the ` +
      `steering committee with options: extra funding, reduced scope or a slower burn.`,
  }];
}
