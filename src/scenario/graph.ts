import type { Project } from "../data/models";
import { logger } from "../lib/logger";

// Narrower than the per-task detector's list: "needs" and "cannot proceed
// until" too often precede something other than a project name.
export const CROSS_PROJECT_KEYWORDS = [
  "depends on",
  "dependent on",
  "blocked by",
  "waiting for",
  "waiting on",
  "requires",
  "contingent on",
  "prerequisite",
] as const;

// How far past a keyword a project name may start and still count.
export const MENTION_WINDOW = 80;

export type DependencyGraphDict = {
  projects: string[];
  edges: Record<string, string[]>;
};

const sorted = (names: Iterable<string>) => [...names].sort();

/**
 * Directed graph between projects, keyed by name. An edge A -> B means
 * "A depends on B", so a slip in B reaches A.
 */
export class DependencyGraph {
  private readonly edges = new Map<string, Set<string>>();
  private readonly projects = new Set<string>();

  constructor(projectNames: Iterable<string> = []) {
    for (const name of projectNames) this.projects.add(name);
  }

  get projectNames(): string[] {
    return sorted(this.projects);
  }

  hasProject(name: string): boolean {
    return this.projects.has(name);
  }

  addDependency(project: string, dependsOn: string): void {
    this.projects.add(project);
    this.projects.add(dependsOn);
    const deps = this.edges.get(project) ?? new Set<string>();
    deps.add(dependsOn);
    this.edges.set(project, deps);
  }

  /** Projects `project` depends on directly. */
  dependencies(project: string): string[] {
    return sorted(this.edges.get(project) ?? []);
  }

  /** Projects that depend directly on `project`. */
  dependents(project: string): string[] {
    const result: string[] = [];
    for (const [source, deps] of this.edges) {
      if (deps.has(project)) result.push(source);
    }
    return sorted(result);
  }

  /** Everything downstream of `project`: who is hit if it slips. */
  allDependents(project: string): string[] {
    return this.closure(project, (name) => this.dependents(name));
  }

  /** Everything upstream of `project`. */
  allDependencies(project: string): string[] {
    return this.closure(project, (name) => this.dependencies(name));
  }

  // BFS; the origin is never part of its own closure, even inside a cycle.
  private closure(origin: string, next: (name: string) => string[]): string[] {
    const visited = new Set<string>([origin]);
    const queue = [origin];
    const found: string[] = [];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const neighbour of next(current)) {
        if (visited.has(neighbour)) continue;
        visited.add(neighbour);
        found.push(neighbour);
        queue.push(neighbour);
      }
    }

    return sorted(found);
  }

  /**
   * Three-colour DFS over all projects in name order. Returns the first cycle
   * found as a closed path (`["A", "B", "C", "A"]`), or null for a DAG.
   */
  detectCycle(): string[] | null {
    const colour = new Map<string, "white" | "grey" | "black">();
    for (const name of this.projects) colour.set(name, "white");
    const path: string[] = [];

    const visit = (node: string): string[] | null => {
      colour.set(node, "grey");
      path.push(node);

      for (const dep of this.dependencies(node)) {
        const state = colour.get(dep);
        if (state === "grey") {
          return [...path.slice(path.indexOf(dep)), dep];
        }
        if (state === "white") {
          const cycle = visit(dep);
          if (cycle) return cycle;
        }
      }

      path.pop();
      colour.set(node, "black");
      return null;
    };

    for (const name of this.projectNames) {
      if (colour.get(name) !== "white") continue;
      const cycle = visit(name);
      if (cycle) return cycle;
    }
    return null;
  }

  toDict(): DependencyGraphDict {
    const edges: Record<string, string[]> = {};
    for (const source of sorted(this.edges.keys())) {
      edges[source] = this.dependencies(source);
    }
    return { projects: this.projectNames, edges };
  }

  toJSON(): DependencyGraphDict {
    return this.toDict();
  }

  static fromDict(dict: DependencyGraphDict): DependencyGraph {
    const graph = new DependencyGraph(dict.projects);
    for (const [source, deps] of Object.entries(dict.edges)) {
      for (const dep of deps) graph.addDependency(source, dep);
    }
    return graph;
  }
}

/**
 * Other projects named shortly after a dependency keyword in `comments`.
 * Matching is case-insensitive; `self` is never returned.
 */
export function findProjectMentions(comments: string, projectNames: readonly string[], self: string): Set<string> {
  const mentioned = new Set<string>();
  const lower = comments.toLowerCase();

  for (const keyword of CROSS_PROJECT_KEYWORDS) {
    let from = 0;
    for (;;) {
      const at = lower.indexOf(keyword, from);
      if (at === -1) break;
      from = at + keyword.length;

      const after = lower.slice(from).replace(/^[\s:\-]+/, "");
      for (const name of projectNames) {
        if (name === self) continue;
        const pos = after.indexOf(name.toLowerCase());
        if (pos !== -1 && pos < MENTION_WINDOW) mentioned.add(name);
      }
    }
  }

  return mentioned;
}

export function buildDependencyGraph(projects: readonly Project[]): DependencyGraph {
  const names = projects.map((p) => p.name);
  const graph = new DependencyGraph(names);

  for (const project of projects) {
    for (const task of project.tasks) {
      if (!task.comments) continue;
      for (const dep of findProjectMentions(task.comments, names, project.name)) {
        graph.addDependency(project.name, dep);
      }
    }
  }

  const cycle = graph.detectCycle();
  if (cycle) {
    logger.warn("Circular dependency between projects", { cycle: cycle.join(" -> ") });
  }
  logger.debug("buildDependencyGraph", { projects: names.length, edges: graph.toDict().edges });

  return graph;
}
