/**
 * DependencyNavigator on top of the shared dependency graphs of an analyzer
 * result, one graph per package manager.
 *
 * The navigator only borrows the graphs; the reference index it needs to find
 * the roots of a scope is derived from each graph once, on first use (or when
 * the navigator is created, with eagerIndex).
 */

import { loadConfig, NavigatorConfig } from "./config";
import { dependenciesSequence } from "./cursor";
import { DependencyGraphError } from "./errors";
import {
  buildReferenceIndex,
  DependencyGraph,
  DependencyReference,
  qualifyScope,
  ReferenceIndex,
  resolveReference,
  RootDependencyIndex,
} from "./graph";
import { Lazy } from "./lazy";
import { createLogger, Logger } from "./logger";
import { AbstractDependencyNavigator } from "./navigator";
import type { DependencyNode, Project } from "./types";

export interface GraphNavigatorOptions extends Partial<NavigatorConfig> {
  logger?: Logger;
}

/**
 * The package manager that produced a project, which is the key of its graph.
 */
export function managerName(project: Project): string {
  return project.id.type;
}

export class DependencyGraphNavigator extends AbstractDependencyNavigator {
  private readonly referenceIndexes = new Map<string, Lazy<ReferenceIndex>>();
  private readonly logger: Logger;

  constructor(
    private readonly graphs: ReadonlyMap<string, DependencyGraph>,
    options: GraphNavigatorOptions = {},
  ) {
    super();

    if (graphs.size === 0) {
      throw new DependencyGraphError("No dependency graph available to initialize DependencyGraphNavigator.");
    }

    const config = loadConfig(process.env, options);
    this.logger = options.logger ?? createLogger(config.debug);

    for (const [manager, graph] of graphs) {
      this.referenceIndexes.set(manager, new Lazy(() => {
        const index = buildReferenceIndex(graph);
        const count = index.reduce((sum, bucket) => sum + bucket.length, 0);
        this.logger.debug(`Indexed ${count} references of ${graph.packages.length} packages for '${manager}'.`);
        return index;
      }));
    }

    if (config.eagerIndex) {
      this.logger.debug(`Building reference indexes for ${graphs.size} package manager(s).`);
      for (const lazyIndex of this.referenceIndexes.values()) {
        void lazyIndex.value;
      }
    }
  }

  scopeNames(project: Project): Set<string> {
    return new Set(project.scopeNames ?? []);
  }

  directDependencies(project: Project, scopeName: string): Iterable<DependencyNode> {
    const manager = managerName(project);
    const graph = this.graphForManager(manager);
    const roots = graph.scopes.get(qualifyScope(project.id, scopeName));

    if (!roots) {
      if (project.scopeNames?.has(scopeName)) {
        this.logger.warn(
          `Scope '${scopeName}' of ${project.id.toCoordinates()} has no roots in the '${manager}' dependency graph.`,
        );
      } else {
        this.logger.debug(`No roots for scope '${scopeName}' of ${project.id.toCoordinates()}.`);
      }
      return [];
    }

    const rootReferences = roots.map((root) => this.referenceFor(manager, root));
    return dependenciesSequence(graph, rootReferences);
  }

  /**
   * Whether the reference index of the given package manager has been built.
   */
  isIndexed(manager: string): boolean {
    return this.referenceIndexes.get(manager)?.isInitialized ?? false;
  }

  private graphForManager(manager: string): DependencyGraph {
    const graph = this.graphs.get(manager);
    // A graph without packages cannot resolve anything; treat it as missing.
    if (!graph || graph.packages.length === 0) {
      throw new DependencyGraphError(
        `No DependencyGraph for package manager '${manager}' available.`,
        { manager },
      );
    }
    return graph;
  }

  private referenceFor(manager: string, rootIndex: RootDependencyIndex): DependencyReference {
    const lazyIndex = this.referenceIndexes.get(manager);
    if (!lazyIndex) {
      throw new DependencyGraphError(`No reference index for package manager '${manager}'.`, { manager });
    }

    try {
      return resolveReference(lazyIndex.value, rootIndex.root, rootIndex.fragment);
    } catch (err) {
      if (err instanceof DependencyGraphError) {
        throw new DependencyGraphError(`${err.message} (package manager '${manager}')`, { ...err.context, manager });
      }
      throw err;
    }
  }
}
