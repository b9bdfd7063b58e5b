/**
 * Ready-made DependencyMatchers for use with the navigator queries.
 */

import * as semver from "semver";
import type { DependencyMatcher } from "./navigator";
import type { PackageLinkage } from "./types";

export function matchLinkage(...linkages: PackageLinkage[]): DependencyMatcher {
  const accepted = new Set(linkages);
  return (node) => accepted.has(node.linkage);
}

/**
 * Match dependencies created by one of the given package manager types
 * (the "type" component of the identifier).
 */
export function matchType(...types: string[]): DependencyMatcher {
  const accepted = new Set(types);
  return (node) => accepted.has(node.id.type);
}

/**
 * Match dependencies named name whose version lies in range, e.g.
 * matchVersionRange("lodash", "<4.17.21").
 */
export function matchVersionRange(name: string, range: string): DependencyMatcher {
  return (node) => node.id.name === name && isVersionInRange(node.id.version, range);
}

export function not(matcher: DependencyMatcher): DependencyMatcher {
  return (node) => !matcher(node);
}

export function allOf(...matchers: DependencyMatcher[]): DependencyMatcher {
  return (node) => matchers.every((matcher) => matcher(node));
}

export function anyOf(...matchers: DependencyMatcher[]): DependencyMatcher {
  return (node) => matchers.some((matcher) => matcher(node));
}

/**
 * Normalize a range as found in advisories and build files, where the
 * comparators are separated by commas (">= 1.0.0, < 2.0.0"), into the
 * space-separated form semver parses. Returns null for anything semver cannot
 * read as a range.
 */
export function normalizeRange(range: string): string | null {
  const comparators = range
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => part.replace(/^([<>=~^]+)\s+/, "$1"));

  return semver.validRange(comparators.join(" "));
}

/**
 * Whether version lies in range. Versions semver cannot read never match. A
 * range semver cannot read is treated as a free-form description and matches
 * if it mentions the version literally.
 */
export function isVersionInRange(version: string, range: string): boolean {
  if (!range.trim()) return false;

  const cleanVersion = semver.clean(version);
  if (!cleanVersion) return false;

  const semverRange = normalizeRange(range);
  if (semverRange === null) {
    return range.includes(version);
  }

  return semver.satisfies(cleanVersion, semverRange);
}
