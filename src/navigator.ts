/**
 * Navigation through the dependencies of projects, independent of how they are
 * stored.
 *
 * Analyzer results keep dependencies in an optimized form that is awkward to
 * access directly. DependencyNavigator offers the queries needed by consumers
 * such as evaluators and reporters on top of it.
 */

import { Identifier, sortIdentifiers } from "./identifier";
import { collectDependencies as collectNodes, collectIssues, shortestPaths, treeDepth } from "./traverse";
import { DependencyNode, Issue, Project, PROJECT_LINKAGE } from "./types";

/**
 * Decides whether a dependency is matched while navigating. It does not
 * influence which dependencies are visited.
 */
export type DependencyMatcher = (node: DependencyNode) => boolean;

/** Matches all dependencies. */
export const MATCH_ALL: DependencyMatcher = () => true;

/** Matches dependencies whose linkage indicates a sub-project. */
export const MATCH_SUB_PROJECTS: DependencyMatcher = (node) => PROJECT_LINKAGE.has(node.linkage);

export interface DependencyNavigator {
  /** Names of all scopes defined for the project. */
  scopeNames(project: Project): Set<string>;

  /**
   * Direct dependencies of a scope of the project, in declaration order. The
   * whole dependency tree of the scope can be traversed from them.
   */
  directDependencies(project: Project, scopeName: string): Iterable<DependencyNode>;

  /**
   * Identifiers of the dependencies of each scope of the project. maxDepth
   * restricts the levels to traverse (1 = direct dependencies only, negative =
   * unlimited); matcher filters the dependencies to include.
   */
  scopeDependencies(project: Project, maxDepth?: number, matcher?: DependencyMatcher): Map<string, Set<Identifier>>;

  /** Like scopeDependencies(), but for a single scope. */
  dependenciesForScope(
    project: Project,
    scopeName: string,
    maxDepth?: number,
    matcher?: DependencyMatcher,
  ): Set<Identifier>;

  /**
   * Identifiers of the dependencies of packageId within the project, combined
   * over all places in all scopes the package occurs at.
   */
  packageDependencies(
    project: Project,
    packageId: Identifier,
    maxDepth?: number,
    matcher?: DependencyMatcher,
  ): Set<Identifier>;

  /** Dependencies of all scopes of the project. */
  projectDependencies(project: Project, maxDepth?: number, matcher?: DependencyMatcher): Set<Identifier>;

  /**
   * For each scope, the shortest chain of parents leading from the scope to each
   * of its dependencies. Direct dependencies have an empty chain.
   */
  getShortestPaths(project: Project): Map<string, Map<Identifier, Identifier[]>>;

  /** Identifiers of dependencies that refer to sub-projects of the project. */
  collectSubProjects(project: Project): Set<Identifier>;

  /** Number of levels of the dependency tree of a scope. */
  dependencyTreeDepth(project: Project, scopeName: string): number;

  /** Issues found for the dependencies of the project, by identifier. */
  projectIssues(project: Project): Map<Identifier, Set<Issue>>;
}

/**
 * Combine the identifiers of all scopes into one set, sorted by identifier.
 */
export function collectDependencies(scopeDependencies: Map<string, Set<Identifier>>): Set<Identifier> {
  const all = new Set<Identifier>();
  for (const ids of scopeDependencies.values()) {
    ids.forEach((id) => all.add(id));
  }
  return new Set(sortIdentifiers(all));
}

/**
 * Base class implementing all queries on top of scopeNames() and
 * directDependencies(), which a concrete storage model has to provide.
 */
export abstract class AbstractDependencyNavigator implements DependencyNavigator {
  abstract scopeNames(project: Project): Set<string>;

  abstract directDependencies(project: Project, scopeName: string): Iterable<DependencyNode>;

  scopeDependencies(project: Project, maxDepth = -1, matcher: DependencyMatcher = MATCH_ALL): Map<string, Set<Identifier>> {
    const dependencies = new Map<string, Set<Identifier>>();

    for (const scope of this.scopeNames(project)) {
      dependencies.set(scope, this.dependenciesForScope(project, scope, maxDepth, matcher));
    }

    return dependencies;
  }

  dependenciesForScope(
    project: Project,
    scopeName: string,
    maxDepth = -1,
    matcher: DependencyMatcher = MATCH_ALL,
  ): Set<Identifier> {
    const ids = new Set<Identifier>();
    collectNodes(this.directDependencies(project, scopeName), maxDepth, matcher, ids);
    return ids;
  }

  packageDependencies(
    project: Project,
    packageId: Identifier,
    maxDepth = -1,
    matcher: DependencyMatcher = MATCH_ALL,
  ): Set<Identifier> {
    const ids = new Set<Identifier>();

    // Occurrences can differ in their dependencies, so all of them are visited.
    const traverse = (node: DependencyNode) => {
      if (node.id === packageId) {
        node.visitDependencies((dependencies) => collectNodes(dependencies, maxDepth, matcher, ids));
      }

      node.visitDependencies((dependencies) => {
        for (const dependency of dependencies) {
          traverse(dependency);
        }
      });
    };

    for (const scope of this.scopeNames(project)) {
      for (const node of this.directDependencies(project, scope)) {
        traverse(node);
      }
    }

    return ids;
  }

  projectDependencies(project: Project, maxDepth = -1, matcher: DependencyMatcher = MATCH_ALL): Set<Identifier> {
    return collectDependencies(this.scopeDependencies(project, maxDepth, matcher));
  }

  getShortestPaths(project: Project): Map<string, Map<Identifier, Identifier[]>> {
    const paths = new Map<string, Map<Identifier, Identifier[]>>();

    for (const scope of this.scopeNames(project)) {
      const targetIds = this.dependenciesForScope(project, scope);
      paths.set(scope, shortestPaths(this.directDependencies(project, scope), targetIds));
    }

    return paths;
  }

  collectSubProjects(project: Project): Set<Identifier> {
    return collectDependencies(this.scopeDependencies(project, -1, MATCH_SUB_PROJECTS));
  }

  dependencyTreeDepth(project: Project, scopeName: string): number {
    return treeDepth(this.directDependencies(project, scopeName));
  }

  projectIssues(project: Project): Map<Identifier, Set<Issue>> {
    const issues = new Map<Identifier, Set<Issue>>();

    for (const scope of this.scopeNames(project)) {
      collectIssues(this.directDependencies(project, scope), issues);
    }

    return issues;
  }
}
