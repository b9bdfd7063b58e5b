/**
 * Error raised for an inconsistent dependency graph or a navigator that is
 * asked about a package manager it has no graph for.
 */

export interface DependencyGraphErrorContext {
  manager?: string;
  pkgIndex?: number;
  fragment?: number;
  ids?: string[];
}

export class DependencyGraphError extends Error {
  constructor(message: string, public readonly context: DependencyGraphErrorContext = {}) {
    super(message);
    this.name = "DependencyGraphError";
  }
}
