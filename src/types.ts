/**
 * Shared types for dependency navigation.
 */

import type { Identifier } from "./identifier";
import type { Scope } from "./tree-navigator";

export type PackageLinkage = "DYNAMIC" | "STATIC" | "PROJECT_DYNAMIC" | "PROJECT_STATIC";
export type Severity = "ERROR" | "WARNING" | "HINT";

// Linkages of dependencies that are sub-projects rather than external packages.
export const PROJECT_LINKAGE: ReadonlySet<PackageLinkage> = new Set<PackageLinkage>([
  "PROJECT_DYNAMIC",
  "PROJECT_STATIC",
]);

export interface Issue {
  timestamp: string;
  source: string;
  message: string;
  severity: Severity;
}

export interface Project {
  id: Identifier;
  definitionFilePath?: string;
  /** Scope names, set when the dependencies live in a shared dependency graph. */
  scopeNames?: ReadonlySet<string>;
  /** Scopes with their dependency trees, set for the classic tree model. */
  scopes?: readonly Scope[];
}

/**
 * A single dependency as seen by a navigator, independent of how it is stored.
 *
 * Nodes handed out while iterating a sequence may be reused for the next
 * element; use getStableReference() for a node that must be kept.
 */
export interface DependencyNode {
  readonly id: Identifier;
  readonly linkage: PackageLinkage;
  readonly issues: readonly Issue[];

  /**
   * Invoke block with the direct dependencies of this node. The sequence is
   * only valid during the call.
   */
  visitDependencies<T>(block: (dependencies: Iterable<DependencyNode>) => T): T;

  getStableReference(): DependencyNode;
}
