import { describe, expect, it } from "vitest";
import { computeBusFactor } from "./bus-factor.js";
import { matrixOf } from "./test-fixtures.js";

describe("computeBusFactor", () => {
  it("finds the smallest group covering the threshold share of a folder", () => {
    const summary = computeBusFactor(
      matrixOf([
        ["alice", "src/core", 800],
        ["bob", "src/core", 50],
      ]),
      { coverageThreshold: 0.5 },
    );

    expect(summary.folders).toEqual([
      {
        folder: "src/core",
        status: "defined",
        busFactor: 1,
        totalWeight: 850,
        riskSet: [{ contributorId: "alice", weight: 800, share: 0.9412 }],
        owners: [
          { contributorId: "alice", weight: 800, share: 0.9412 },
          { contributorId: "bob", weight: 50, share: 0.0588 },
        ],
      },
    ]);
    expect(summary.primaryRisk).toEqual({ folder: "src/core", busFactor: 1, totalWeight: 850 });
  });

  it("needs every contributor at a threshold of 1 and only the top one at 0", () => {
    const matrix = matrixOf([
      ["alice", "lib", 0.1],
      ["bob", "lib", 0.2],
      ["carol", "lib", 0.7],
    ]);

    const full = computeBusFactor(matrix, { coverageThreshold: 1 });
    const none = computeBusFactor(matrix, { coverageThreshold: 0 });

    expect(full.folders[0]).toMatchObject({ busFactor: 3 });
    expect(none.folders[0]).toMatchObject({ busFactor: 1 });
  });

  it("breaks equal weights by contributor identity", () => {
    const summary = computeBusFactor(
      matrixOf([
        ["zoe", "lib", 10],
        ["adam", "lib", 10],
      ]),
      { coverageThreshold: 0.5 },
    );

    expect(summary.folders[0]).toMatchObject({ busFactor: 1, riskSet: [{ contributorId: "adam" }] });
  });

  it("marks requested folders without weight as undefined and leaves them out of the ranking", () => {
    const summary = computeBusFactor(matrixOf([["alice", "src", 5]]), {
      coverageThreshold: 0.5,
      folders: ["vendor"],
    });

    expect(summary.folders).toContainEqual({ folder: "vendor", status: "undefined", reason: "zero_total_weight" });
    expect(summary.ranking).toEqual(["src"]);
  });

  it("ranks folders by bus factor, then by weight, then by path", () => {
    const summary = computeBusFactor(
      matrixOf([
        ["alice", "api", 10],
        ["bob", "api", 10],
        ["carol", "web", 5],
        ["dave", "docs", 5],
        ["erin", "core", 40],
      ]),
      { coverageThreshold: 0.6 },
    );

    expect(summary.ranking).toEqual(["core", "docs", "web", "api"]);
    expect(summary.primaryRisk).toEqual({ folder: "core", busFactor: 1, totalWeight: 40 });
    expect(summary.repositoryBusFactor).toBe(2);
  });

  it("has no primary risk for an empty matrix", () => {
    const summary = computeBusFactor(matrixOf([]), { coverageThreshold: 0.5 });

    expect(summary).toEqual({
      coverageThreshold: 0.5,
      folders: [],
      ranking: [],
      primaryRisk: null,
      repositoryBusFactor: null,
    });
  });
});
