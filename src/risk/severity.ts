import type { Rag, Risk, RiskSeverity } from "../data/models";
import { InvariantError } from "../lib/errors";

export const SEVERITIES: readonly RiskSeverity[] = ["Critical", "High", "Medium", "Low"];

// Lower rank is worse. Total over RiskSeverity, so lookups cannot miss.
export const SEVERITY_RANK: Readonly<Record<RiskSeverity, number>> = {
  Critical: 0,
  High: 1,
  Medium: 2,
  Low: 3,
};

const ELEVATED: Readonly<Record<RiskSeverity, RiskSeverity>> = {
  Low: "Medium",
  Medium: "High",
  High: "Critical",
  Critical: "Critical",
};

export function isSeverity(value: string): value is RiskSeverity {
  return SEVERITIES.some((s) => s === value);
}

/** Maps a task priority 1:1 onto a severity; anything unrecognised is Medium. */
export function severityFromPriority(priority?: string): RiskSeverity {
  const key = (priority ?? "").trim().toLowerCase();
  return SEVERITIES.find((s) => s.toLowerCase() === key) ?? "Medium";
}

export function elevateSeverity(severity: RiskSeverity, steps = 1): RiskSeverity {
  let result = severity;
  for (let i = 0; i < steps; i++) {
    result = ELEVATED[result];
  }
  return result;
}

export function compareSeverity(a: RiskSeverity, b: RiskSeverity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function worseOf(a: RiskSeverity, b: RiskSeverity): RiskSeverity {
  return compareSeverity(a, b) <= 0 ? a : b;
}

/** Stable worst-first sort; returns a new array. */
export function sortBySeverity(risks: readonly Risk[]): Risk[] {
  return [...risks].sort((a, b) => compareSeverity(a.severity, b.severity));
}

export function worstSeverity(risks: readonly Risk[]): RiskSeverity | null {
  if (risks.length === 0) return null;
  return risks.map((r) => r.severity).reduce(worseOf);
}

export function ragFromSeverity(severity: RiskSeverity | null): Rag {
  switch (severity) {
    case "Critical":
    case "High":
      return "Red";
    case "Medium":
      return "Amber";
    case "Low":
    case null:
      return "Green";
    default:
      throw new InvariantError(`Unknown severity: ${String(severity)}`);
  }
}

export const RAG_RANK: Readonly<Record<Rag, number>> = { Red: 0, Amber: 1, Green: 2 };

export function worstRag(rags: readonly Rag[]): Rag {
  return rags.reduce<Rag>((worst, rag) => (RAG_RANK[rag] < RAG_RANK[worst] ? rag : worst), "Green");
}
