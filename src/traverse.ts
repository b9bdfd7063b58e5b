/**
 * Traversal algorithms over sequences of DependencyNodes. They only use the
 * DependencyNode interface and work for every navigator implementation.
 */

import { DependencyGraphError } from "./errors";
import type { Identifier } from "./identifier";
import type { DependencyMatcher } from "./navigator";
import type { DependencyNode, Issue } from "./types";

/**
 * Traverse nodes recursively up to maxDepth levels and add the identifiers of
 * all nodes accepted by matcher to ids. A node that is not matched still has its
 * dependencies visited. A negative maxDepth means no limit.
 */
export function collectDependencies(
  nodes: Iterable<DependencyNode>,
  maxDepth: number,
  matcher: DependencyMatcher,
  ids: Set<Identifier>,
): void {
  if (maxDepth === 0) return;

  for (const node of nodes) {
    if (matcher(node)) {
      ids.add(node.id);
    }

    node.visitDependencies((dependencies) => collectDependencies(dependencies, maxDepth - 1, matcher, ids));
  }
}

interface QueueItem {
  node: DependencyNode;
  parents: Identifier[];
}

/**
 * Breadth-first search from the given direct dependencies, recording for each of
 * targetIds the chain of parents on the first (and therefore shortest) path it is
 * reached on. Every target must be reached.
 */
export function shortestPaths(
  directDependencies: Iterable<DependencyNode>,
  targetIds: ReadonlySet<Identifier>,
): Map<Identifier, Identifier[]> {
  const remaining = new Set(targetIds);
  const result = new Map<Identifier, Identifier[]>();

  // Nodes are queued across steps, so only stable references go in.
  const queue: QueueItem[] = [];
  for (const node of directDependencies) {
    queue.push({ node: node.getStableReference(), parents: [] });
  }

  for (let head = 0; head < queue.length; head++) {
    const { node, parents } = queue[head];

    if (remaining.has(node.id)) {
      result.set(node.id, parents);
      remaining.delete(node.id);
    }

    const childParents = [...parents, node.id];
    node.visitDependencies((dependencies) => {
      for (const dependency of dependencies) {
        queue.push({ node: dependency.getStableReference(), parents: childParents });
      }
    });
  }

  if (remaining.size > 0) {
    const missing = [...remaining].map((id) => id.toCoordinates());
    throw new DependencyGraphError(
      `Could not find the shortest path for these dependencies: ${missing.join(", ")}`,
      { ids: missing },
    );
  }

  return result;
}

/**
 * Length of the longest path starting at the given nodes; 0 if there are none.
 */
export function treeDepth(nodes: Iterable<DependencyNode>): number {
  let depth = 0;

  for (const node of nodes) {
    depth = Math.max(depth, 1 + node.visitDependencies(treeDepth));
  }

  return depth;
}

/**
 * Add the issues of all nodes reachable from nodes to issues, grouped by the
 * identifier of the node they were reported for.
 */
export function collectIssues(
  nodes: Iterable<DependencyNode>,
  issues: Map<Identifier, Set<Issue>>,
): Map<Identifier, Set<Issue>> {
  for (const node of nodes) {
    if (node.issues.length > 0) {
      const known = issues.get(node.id) ?? new Set<Issue>();
      node.issues.forEach((issue) => known.add(issue));
      issues.set(node.id, known);
    }

    node.visitDependencies((dependencies) => collectIssues(dependencies, issues));
  }

  return issues;
}
