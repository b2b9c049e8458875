import type { IsoDate } from "../lib/dates";

export type TaskPriority = "Critical" | "High" | "Medium" | "Low";

export type Task = {
  name: string;
  status: string;              // free text, matched case-insensitively
  priority?: TaskPriority;     // Medium when absent
  assignee?: string;
  sprint?: string;             // current sprint
  previousSprints?: string[];  // oldest first
  comments?: string;
};

export type Project = {
  name: string;                // unique within a portfolio
  status: string;
  startDate?: IsoDate;
  endDate?: IsoDate;
  budget?: number;
  actualSpend?: number;
  tasks: Task[];
};

export type RiskSeverity = "Critical" | "High" | "Medium" | "Low";

export const RiskCategory = {
  BLOCKED_WORK: "Blocked Work",
  CHRONIC_CARRYOVER: "Chronic Carry-Over",
  BURN_RATE: "Burn Rate",
  DEPENDENCY: "Dependency",
} as const;

export type RiskCategory = (typeof RiskCategory)[keyof typeof RiskCategory];

export type Risk = Readonly<{
  projectName: string;
  category: RiskCategory;
  severity: RiskSeverity;
  title: string;
  explanation: string;
  suggestedMitigation: string;
}>;

export type Rag = "Red" | "Amber" | "Green";

export type ProjectRiskSummary = {
  projectName: string;
  projectStatus: string;
  risks: Risk[];               // worst first, already truncated
  riskCount: number;
  worstSeverity: RiskSeverity | null;
  rag: Rag;
};

export type PortfolioRiskReport = {
  projectSummaries: ProjectRiskSummary[];  // worst project first
  totalRisks: number;
  projectsAtRisk: number;
  portfolioRag: Rag;
  referenceDate: IsoDate;
  topN: number;
};

export const budgetOf = (p: Project) => p.budget ?? 0;
export const spendOf = (p: Project) => p.actualSpend ?? 0;
export const priorityOf = (t: Task): TaskPriority => t.priority ?? "Medium";
export const assigneeOf = (t: Task) => t.assignee?.trim() ?? "";
