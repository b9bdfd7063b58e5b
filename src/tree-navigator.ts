/**
 * Classic tree model of project dependencies: every scope holds its own tree of
 * PackageReferences, without sharing subtrees. Kept for results that were not
 * produced in the graph format.
 */

import type { Identifier } from "./identifier";
import { AbstractDependencyNavigator } from "./navigator";
import type { DependencyNode, Issue, PackageLinkage, Project } from "./types";

export interface Scope {
  name: string;
  dependencies: readonly PackageReference[];
}

/**
 * A node of the dependency tree. Tree nodes are real objects, so they are their
 * own stable reference.
 */
export class PackageReference implements DependencyNode {
  constructor(
    readonly id: Identifier,
    readonly dependencies: readonly PackageReference[] = [],
    readonly linkage: PackageLinkage = "DYNAMIC",
    readonly issues: readonly Issue[] = [],
  ) {}

  visitDependencies<T>(block: (dependencies: Iterable<DependencyNode>) => T): T {
    return block(this.dependencies);
  }

  getStableReference(): DependencyNode {
    return this;
  }
}

export class DependencyTreeNavigator extends AbstractDependencyNavigator {
  scopeNames(project: Project): Set<string> {
    return new Set((project.scopes ?? []).map((scope) => scope.name));
  }

  directDependencies(project: Project, scopeName: string): Iterable<DependencyNode> {
    return project.scopes?.find((scope) => scope.name === scopeName)?.dependencies ?? [];
  }
}
