import type { ZodIssue } from "zod";

export class PortfolioError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Scenario text or action payload that cannot be turned into a ScenarioAction.
export class ParseError extends PortfolioError {}

// Portfolio input that breaks the ingestion contract.
export class ValidationError extends PortfolioError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.issues = issues;
  }
}

// A bug in the caller or in this library, never a data problem.
export class InvariantError extends PortfolioError {}
