/**
 * Fixture graphs shared by the navigator tests.
 */

import { Identifier } from "../src/identifier";
import { DependencyGraph, DependencyReference, qualifyScope, RootDependencyIndex } from "../src/graph";
import { Issue, PackageLinkage, Project } from "../src/types";

export const MANAGER = "Maven";

export function id(name: string, version = "1.0"): Identifier {
  return Identifier.of(MANAGER, "org.example", name, version);
}

export const PROJECT_ID = Identifier.of(MANAGER, "org.example", "app", "1.0.0");

export function project(scopeNames: string[], projectId: Identifier = PROJECT_ID): Project {
  return { id: projectId, scopeNames: new Set(scopeNames) };
}

export function ref(
  pkg: number,
  dependencies: DependencyReference[] = [],
  options: { fragment?: number; linkage?: PackageLinkage; issues?: Issue[] } = {},
): DependencyReference {
  return {
    pkg,
    fragment: options.fragment ?? 0,
    linkage: options.linkage ?? "DYNAMIC",
    issues: options.issues ?? [],
    dependencies,
  };
}

export function root(reference: DependencyReference): RootDependencyIndex {
  return { root: reference.pkg, fragment: reference.fragment };
}

/**
 * Create a graph for PROJECT_ID (or projectId) whose scopes have the given root
 * references. scopeRoots are derived from the scopes.
 */
export function graph(
  packages: Identifier[],
  scopes: Record<string, DependencyReference[]>,
  projectId: Identifier = PROJECT_ID,
): DependencyGraph {
  const scopeRoots = new Set<DependencyReference>();
  const scopeMap = new Map<string, RootDependencyIndex[]>();

  for (const [name, roots] of Object.entries(scopes)) {
    roots.forEach((r) => scopeRoots.add(r));
    scopeMap.set(qualifyScope(projectId, name), roots.map(root));
  }

  return { packages, scopeRoots: [...scopeRoots], scopes: scopeMap };
}

/**
 * A -> B -> C, single scope "compile" with root A.
 */
export function chainGraph(): DependencyGraph {
  const c = ref(2);
  const b = ref(1, [c]);
  const a = ref(0, [b]);
  return graph([id("A"), id("B"), id("C")], { compile: [a] });
}

/**
 * Diamond: E is reached via A -> B -> C -> E and via D -> E in "compile";
 * "test" starts at the shared B.
 */
export function diamondGraph(): DependencyGraph {
  const e = ref(4);
  const c = ref(2, [e]);
  const b = ref(1, [c]);
  const a = ref(0, [b]);
  const d = ref(3, [e]);
  return graph([id("A"), id("B"), id("C"), id("D"), id("E")], { compile: [a, d], test: [b] });
}

/**
 * X occurs in two fragments with different dependencies: X(0) -> Y below P in
 * "compile", X(1) -> Z below Q in "runtime".
 */
export function fragmentGraph(): DependencyGraph {
  const y = ref(3);
  const z = ref(4);
  const x0 = ref(2, [y]);
  const x1 = ref(2, [z], { fragment: 1 });
  const p = ref(0, [x0]);
  const q = ref(1, [x1]);
  return graph([id("P"), id("Q"), id("X"), id("Y"), id("Z")], { compile: [p], runtime: [q] });
}
