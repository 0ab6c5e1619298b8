import { describe, expect, it } from "vitest";
import { computeBusFactor } from "./bus-factor.js";
import { buildMitigationPlan, riskLevelForBusFactor } from "./mitigation.js";
import { matrixOf } from "./test-fixtures.js";

describe("buildMitigationPlan", () => {
  it("pairs sole owners of single-owner-risk folders, heaviest folder first", () => {
    const matrix = matrixOf([
      ["alice", "src/core", 800],
      ["bob", "src/core", 50],
      ["carol", "docs", 40],
      ["alice", "lib", 10],
      ["bob", "lib", 10],
      ["dave", "lib", 10],
    ]);

    const plan = buildMitigationPlan(matrix, computeBusFactor(matrix, { coverageThreshold: 0.5 }));

    expect(plan).toEqual({
      riskLevel: "critical",
      monopolists: ["alice", "carol"],
      exclusiveFolders: [{ contributorId: "carol", folders: ["docs"] }],
      actions: [
        { priority: 1, folder: "src/core", ownerId: "alice", partnerId: "bob", action: "pair_with_next_owner" },
        { priority: 2, folder: "docs", ownerId: "carol", partnerId: "alice", action: "pair_with_active_contributor" },
      ],
    });
  });

  it("asks a lone contributor to document what they own", () => {
    const matrix = matrixOf([["alice", "src", 10]]);

    const plan = buildMitigationPlan(matrix, computeBusFactor(matrix, { coverageThreshold: 0.5 }));

    expect(plan.actions).toEqual([
      { priority: 1, folder: "src", ownerId: "alice", partnerId: null, action: "document_ownership" },
    ]);
  });

  it("has nothing to do without ownership data", () => {
    const matrix = matrixOf([]);

    expect(buildMitigationPlan(matrix, computeBusFactor(matrix, { coverageThreshold: 0.5 }))).toEqual({
      riskLevel: "none",
      monopolists: [],
      exclusiveFolders: [],
      actions: [],
    });
  });
});

describe("riskLevelForBusFactor", () => {
  it("maps bus factors to risk levels", () => {
    expect([null, 1, 2, 3, 4].map(riskLevelForBusFactor)).toEqual(["none", "critical", "high", "medium", "low"]);
  });
});
