import { describe, expect, it } from "vitest";
import {
  collectFileAuthors,
  simulateContributorRemoval,
  simulateFolderDeprecation,
  simulateKeyScenarios,
} from "./what-if.js";
import { commitAt, matrixOf } from "./test-fixtures.js";

const matrix = matrixOf([
  ["alice", "src/core", 800],
  ["bob", "src/core", 50],
  ["carol", "docs", 40],
]);

describe("simulateContributorRemoval", () => {
  it("hands a folder to the remaining owner without renormalizing weight", () => {
    const scenario = simulateContributorRemoval(matrix, ["alice"], { coverageThreshold: 0.5 });

    expect(scenario.after.folders).toContainEqual({
      folder: "src/core",
      status: "defined",
      busFactor: 1,
      totalWeight: 50,
      riskSet: [{ contributorId: "bob", weight: 50, share: 1 }],
      owners: [{ contributorId: "bob", weight: 50, share: 1 }],
    });
    expect(scenario.orphanedFolders).toEqual([]);
    expect(scenario.changedFolders).toEqual([
      {
        folder: "src/core",
        busFactorBefore: 1,
        busFactorAfter: 1,
        ownersBefore: ["alice", "bob"],
        ownersAfter: ["bob"],
      },
    ]);
  });

  it("reports folders left without any owner", () => {
    const scenario = simulateContributorRemoval(matrix, ["carol", "carol"], { coverageThreshold: 0.5 });

    expect(scenario.removed).toEqual(["carol"]);
    expect(scenario.orphanedFolders).toEqual(["docs"]);
    expect(scenario.after.folders).toContainEqual({ folder: "docs", status: "undefined", reason: "zero_total_weight" });
    expect(scenario.after.ranking).toEqual(["src/core"]);
  });

  it("changes nothing when the removed contributor owns nothing", () => {
    const scenario = simulateContributorRemoval(matrix, ["zed"], { coverageThreshold: 0.5 });

    expect(scenario.matrix).toEqual(matrix);
    expect(scenario.after).toEqual(scenario.before);
    expect(scenario.changedFolders).toEqual([]);
    expect(scenario.orphanedFiles).toEqual([]);
  });

  it("lists in-window files only the removed contributors touched", () => {
    const fileAuthors = collectFileAuthors(
      [
        commitAt("c1", "alice", 10, [
          ["src/core/engine.ts", 40, 0],
          ["src/core/shared.ts", 5, 0],
          ["README.md", 0, 0],
        ]),
        commitAt("c2", "bob", 20, [["src/core/shared.ts", 1, 1]]),
        commitAt("c3", "carol", 30, [["docs/guide.md", 12, 0]]),
        commitAt("c4", "bob", 500, [["src/core/engine.ts", 3, 0]]),
      ],
      { startUnix: 0, endUnix: 100 },
    );

    const scenario = simulateContributorRemoval(matrix, ["alice", "carol"], { coverageThreshold: 0.5, fileAuthors });

    expect(scenario.orphanedFiles).toEqual(["docs/guide.md", "README.md", "src/core/engine.ts"]);
    expect(scenario.affectedAreas).toEqual([".", "docs", "src/core"]);
  });
});

describe("simulateKeyScenarios", () => {
  it("removes each of the heaviest owners alone and deprecates the heaviest folders", () => {
    const scenarios = simulateKeyScenarios(
      matrixOf([
        ["alice", "src/core", 800],
        ["bob", "src/core", 50],
        ["bob", "src/util", 300],
        ["carol", "docs", 40],
        ["dave", "docs", 40],
        ["erin", "scripts", 5],
      ]),
      { coverageThreshold: 0.5 },
    );

    expect(scenarios.removals.map((scenario) => scenario.removed)).toEqual([["alice"], ["bob"], ["carol"]]);
    expect(scenarios.deprecations.map((scenario) => scenario.folder)).toEqual(["src/core", "src/util", "docs"]);
    expect(scenarios.deprecations[2]?.affectedContributors.map((entry) => entry.contributorId)).toEqual([
      "carol",
      "dave",
    ]);
  });

  it("returns nothing for an empty matrix", () => {
    expect(simulateKeyScenarios(matrixOf([]), { coverageThreshold: 0.5 }, 2)).toEqual({
      removals: [],
      deprecations: [],
    });
  });
});

describe("simulateFolderDeprecation", () => {
  it("measures how much of each contributor's footprint sits under the folder", () => {
    const scenario = simulateFolderDeprecation(
      matrixOf([
        ["alice", "src/core", 800],
        ["alice", "src/util", 200],
        ["bob", "src/core", 50],
        ["bob", "docs", 150],
        ["carol", "srcgen", 10],
      ]),
      "src",
    );

    expect(scenario).toEqual({
      folder: "src",
      folderWeight: 1050,
      affectedContributors: [
        { contributorId: "alice", weightInFolder: 1000, shareOfOwnWeight: 1 },
        { contributorId: "bob", weightInFolder: 50, shareOfOwnWeight: 0.25 },
      ],
    });
  });
});
