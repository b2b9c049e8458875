import type { IsoDate } from "../lib/dates";
import type { Project } from "./models";
import samplePortfolio from "./sample-portfolio.json";
import { parsePortfolio } from "./schema";

// Six projects with a Gamma -> Delta -> Epsilon chain and Beta waiting on Alpha.
export const sampleProjects: Project[] = parsePortfolio(samplePortfolio);

// The date the sample numbers were drawn up against.
export const SAMPLE_REFERENCE_DATE: IsoDate = "2026-02-19";
