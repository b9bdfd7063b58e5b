/**
 * Traversal of DependencyReferences through the DependencyNode interface.
 *
 * Only a single cursor is created for iterating over a list of sibling
 * references. Like a database cursor it moves on to the next reference on each
 * step and delegates its properties to the current one, so the references do
 * not have to be wrapped into one adapter object each. As a consequence, all
 * elements produced by one iteration are the same object; callers that keep a
 * node beyond the current step must call getStableReference().
 */

import { DependencyGraphError } from "./errors";
import type { DependencyGraph, DependencyReference } from "./graph";
import type { Identifier } from "./identifier";
import type { DependencyNode, Issue, PackageLinkage } from "./types";

export class DependencyRefCursor implements DependencyNode {
  private current: DependencyReference;

  constructor(
    private readonly graph: DependencyGraph,
    private readonly references: readonly DependencyReference[] = [],
    /** Fixes the cursor to a single reference when no siblings are traversed. */
    initCurrent?: DependencyReference,
  ) {
    const first = initCurrent ?? references[0];
    if (!first) {
      throw new DependencyGraphError("A DependencyRefCursor requires at least one reference.");
    }
    this.current = first;
  }

  get id(): Identifier {
    const id = this.graph.packages[this.current.pkg];
    if (!id) {
      throw new DependencyGraphError(
        `No package at index ${this.current.pkg} in the dependency graph.`,
        { pkgIndex: this.current.pkg, fragment: this.current.fragment },
      );
    }
    return id;
  }

  get linkage(): PackageLinkage {
    return this.current.linkage;
  }

  get issues(): readonly Issue[] {
    return this.current.issues;
  }

  visitDependencies<T>(block: (dependencies: Iterable<DependencyNode>) => T): T {
    return block(dependenciesSequence(this.graph, this.current.dependencies));
  }

  getStableReference(): DependencyNode {
    return referenceNode(this.graph, this.current);
  }

  /**
   * Move over the references passed to this cursor, yielding the cursor itself
   * positioned on each of them.
   */
  *asSequence(): Generator<DependencyNode, void, undefined> {
    for (const ref of this.references) {
      this.current = ref;
      yield this;
    }
  }
}

/**
 * A sequence over the given references of the graph. Each iteration uses its
 * own cursor, so the sequence can be iterated more than once.
 */
export function dependenciesSequence(
  graph: DependencyGraph,
  references: readonly DependencyReference[],
): Iterable<DependencyNode> {
  if (references.length === 0) return [];

  return {
    [Symbol.iterator]: () => new DependencyRefCursor(graph, references).asSequence(),
  };
}

/**
 * A node fixed to a single reference; it never moves and can be retained.
 */
export function referenceNode(graph: DependencyGraph, reference: DependencyReference): DependencyNode {
  return new DependencyRefCursor(graph, [], reference);
}
