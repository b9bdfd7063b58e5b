/**
 * Tests for DependencyTreeNavigator and its agreement with the graph navigator.
 *
 * Usage: npm run test
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { DependencyTreeNavigator, PackageReference } from "../src/tree-navigator";
import { DependencyGraphNavigator } from "../src/graph-navigator";
import { DependencyNavigator } from "../src/navigator";
import { Project } from "../src/types";
import { diamondGraph, id, MANAGER, PROJECT_ID, project } from "./helpers";

// Same dependencies as diamondGraph(), as separate trees per scope.
function diamondTreeProject(): Project {
  const e = new PackageReference(id("E"));
  const c = new PackageReference(id("C"), [e]);
  const b = new PackageReference(id("B"), [c]);
  const a = new PackageReference(id("A"), [b]);
  const d = new PackageReference(id("D"), [e]);

  return {
    id: PROJECT_ID,
    scopes: [
      { name: "compile", dependencies: [a, d] },
      { name: "test", dependencies: [new PackageReference(id("B"), [new PackageReference(id("C"), [e])])] },
    ],
  };
}

describe("DependencyTreeNavigator", () => {
  test("lists the scopes of the project", () => {
    const navigator = new DependencyTreeNavigator();
    assert.deepStrictEqual([...navigator.scopeNames(diamondTreeProject())], ["compile", "test"]);
  });

  test("returns the direct dependencies of a scope", () => {
    const navigator = new DependencyTreeNavigator();
    const direct = [...navigator.directDependencies(diamondTreeProject(), "compile")];

    assert.deepStrictEqual(direct.map((n) => n.id.name), ["A", "D"]);
    assert.strictEqual(direct[0].getStableReference(), direct[0]);
  });

  test("is empty for unknown scopes and projects without scopes", () => {
    const navigator = new DependencyTreeNavigator();

    assert.deepStrictEqual([...navigator.directDependencies(diamondTreeProject(), "provided")], []);
    assert.strictEqual(navigator.scopeNames({ id: PROJECT_ID }).size, 0);
  });

  test("finds sub-projects by linkage", () => {
    const navigator = new DependencyTreeNavigator();
    const sub = new PackageReference(id("module"), [], "PROJECT_DYNAMIC");
    const withSub: Project = {
      id: PROJECT_ID,
      scopes: [{ name: "compile", dependencies: [new PackageReference(id("ext"), [sub])] }],
    };

    assert.deepStrictEqual([...navigator.collectSubProjects(withSub)], [id("module")]);
  });
});

describe("navigator implementations", () => {
  const treeNavigator: DependencyNavigator = new DependencyTreeNavigator();
  const graphNavigator: DependencyNavigator = new DependencyGraphNavigator(new Map([[MANAGER, diamondGraph()]]));
  const treeProject = diamondTreeProject();
  const graphProject = project(["compile", "test"]);

  test("agree on scope dependencies", () => {
    for (const depth of [-1, 0, 1, 2, 3]) {
      assert.deepStrictEqual(
        treeNavigator.scopeDependencies(treeProject, depth),
        graphNavigator.scopeDependencies(graphProject, depth),
      );
    }
  });

  test("agree on shortest paths", () => {
    assert.deepStrictEqual(treeNavigator.getShortestPaths(treeProject), graphNavigator.getShortestPaths(graphProject));
  });

  test("agree on package dependencies and tree depth", () => {
    assert.deepStrictEqual(
      treeNavigator.packageDependencies(treeProject, id("B")),
      graphNavigator.packageDependencies(graphProject, id("B")),
    );
    assert.strictEqual(
      treeNavigator.dependencyTreeDepth(treeProject, "compile"),
      graphNavigator.dependencyTreeDepth(graphProject, "compile"),
    );
  });
});
