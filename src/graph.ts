/**
 * Compact dependency graph of one package manager.
 *
 * Packages are stored once in a catalog and referenced by index. A package can
 * occur in several fragments when its transitive dependencies differ between
 * occurrences; each (index, fragment) pair exists as exactly one
 * DependencyReference, which may be shared by many parents and scopes.
 */

import { DependencyGraphError } from "./errors";
import type { Identifier } from "./identifier";
import type { Issue, PackageLinkage } from "./types";

export interface DependencyReference {
  /** Index of the package in the graph's catalog. */
  readonly pkg: number;
  readonly fragment: number;
  readonly linkage: PackageLinkage;
  readonly issues: readonly Issue[];
  readonly dependencies: readonly DependencyReference[];
}

export interface RootDependencyIndex {
  readonly root: number;
  readonly fragment: number;
}

export interface DependencyGraph {
  readonly packages: readonly Identifier[];
  /** References that are a direct dependency of at least one scope. */
  readonly scopeRoots: readonly DependencyReference[];
  /** Qualified scope name to the roots of that scope, in declaration order. */
  readonly scopes: ReadonlyMap<string, readonly RootDependencyIndex[]>;
}

/** For each catalog index, the references of that package across fragments. */
export type ReferenceIndex = ReadonlyArray<readonly DependencyReference[]>;

const SCOPE_SEPARATOR = ":";

/**
 * Scope names are qualified with the project, since one graph can hold the
 * scopes of several projects of the same package manager.
 */
export function qualifyScope(projectId: Identifier, scopeName: string): string {
  return [projectId.namespace, projectId.name, projectId.version, scopeName].join(SCOPE_SEPARATOR);
}

export function unqualifyScope(qualifiedName: string): string {
  return qualifiedName.substring(qualifiedName.lastIndexOf(SCOPE_SEPARATOR) + 1);
}

/**
 * Walk all references reachable from the scope roots and group them by package
 * index. A reference reached through several parents is added once per parent;
 * lookups select by fragment, so duplicates are harmless.
 */
export function buildReferenceIndex(graph: DependencyGraph): ReferenceIndex {
  const index: DependencyReference[][] = graph.packages.map(() => []);

  function addReference(ref: DependencyReference) {
    const bucket = index[ref.pkg];
    if (!bucket) {
      throw new DependencyGraphError(
        `DependencyReference points to index ${ref.pkg} outside of the catalog (${graph.packages.length} packages).`,
        { pkgIndex: ref.pkg, fragment: ref.fragment },
      );
    }

    bucket.push(ref);
    for (const child of ref.dependencies) {
      addReference(child);
    }
  }

  for (const root of graph.scopeRoots) {
    addReference(root);
  }

  return index;
}

export function resolveReference(index: ReferenceIndex, pkgIndex: number, fragment: number): DependencyReference {
  const ref = index[pkgIndex]?.find((r) => r.fragment === fragment);
  if (!ref) {
    throw new DependencyGraphError(
      `Could not resolve a DependencyReference for index = ${pkgIndex} and fragment ${fragment}.`,
      { pkgIndex, fragment },
    );
  }
  return ref;
}
