/**
 * Navigation through the resolved dependencies of analyzed projects.
 *
 * Storage models:
 * - Dependency graph: one compact graph per package manager, shared by all
 *   projects and scopes of that manager (DependencyGraphNavigator)
 * - Dependency tree: one tree per scope (DependencyTreeNavigator)
 */

export { Identifier, sortIdentifiers } from "./identifier";
export { PROJECT_LINKAGE } from "./types";
export type { DependencyNode, Issue, PackageLinkage, Project, Severity } from "./types";
export {
  buildReferenceIndex,
  qualifyScope,
  resolveReference,
  unqualifyScope,
} from "./graph";
export type { DependencyGraph, DependencyReference, ReferenceIndex, RootDependencyIndex } from "./graph";
export { AbstractDependencyNavigator, collectDependencies, MATCH_ALL, MATCH_SUB_PROJECTS } from "./navigator";
export type { DependencyMatcher, DependencyNavigator } from "./navigator";
export { DependencyGraphNavigator, managerName } from "./graph-navigator";
export type { GraphNavigatorOptions } from "./graph-navigator";
export { DependencyTreeNavigator, PackageReference } from "./tree-navigator";
export type { Scope } from "./tree-navigator";
export { allOf, anyOf, isVersionInRange, matchLinkage, matchType, matchVersionRange, normalizeRange, not } from "./matchers";
export { DependencyGraphError } from "./errors";
export type { DependencyGraphErrorContext } from "./errors";
export { loadConfig } from "./config";
export type { Env, NavigatorConfig } from "./config";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
