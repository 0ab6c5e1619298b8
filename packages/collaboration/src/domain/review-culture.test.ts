import { SECONDS_PER_HOUR } from "@collabscope/core";
import { describe, expect, it } from "vitest";
import { computeReviewCulture } from "./review-culture.js";
import { pullRequest, review } from "./test-fixtures.js";

const hours = (value: number): number => value * SECONDS_PER_HOUR;
const window = { startUnix: 0, endUnix: hours(100) };

const pullRequests = [
  pullRequest({
    number: 1,
    authorId: "alice",
    createdAtUnix: 0,
    reviews: [
      review("alice", hours(1), "commented"),
      review("bob", hours(2), "approved"),
      review("carol", hours(4), "changes_requested"),
      review("bob", hours(5), "commented"),
    ],
  }),
  pullRequest({ number: 2, authorId: "alice", createdAtUnix: hours(10), reviews: [review("bob", hours(16), "approved")] }),
  pullRequest({
    number: 3,
    authorId: "bob",
    createdAtUnix: hours(20),
    reviews: [review("carol", hours(21), "approved"), review("dave", hours(30), "approved")],
  }),
  pullRequest({ number: 4, authorId: "dave", createdAtUnix: hours(40) }),
  pullRequest({ number: 5, authorId: "erin", createdAtUnix: -hours(10), reviews: [review("bob", hours(1), "approved")] }),
  pullRequest({ number: 6, authorId: "carol", createdAtUnix: hours(50), reviews: [review("bob", hours(200), "approved")] }),
];

describe("computeReviewCulture", () => {
  it("summarizes reviewers, pairs and latency for pull requests opened in the window", () => {
    const summary = computeReviewCulture(pullRequests, window, { bottleneckPercentile: 0.2 });

    expect(summary).toMatchObject({
      pullRequestsInScope: 5,
      reviewedPullRequests: 3,
      pendingReviewCount: 2,
      meanHoursToFirstReview: 3,
      medianHoursToFirstReview: 2,
    });
    expect(summary.reviewers).toEqual([
      {
        reviewerId: "bob",
        reviewCount: 3,
        reviewedPullRequests: 2,
        approvals: 2,
        changesRequested: 0,
        approvalRate: 0.6667,
        meanHoursToFirstReview: 4,
        medianHoursToFirstReview: 4,
      },
      {
        reviewerId: "carol",
        reviewCount: 2,
        reviewedPullRequests: 2,
        approvals: 1,
        changesRequested: 1,
        approvalRate: 0.5,
        meanHoursToFirstReview: 2.5,
        medianHoursToFirstReview: 2.5,
      },
      {
        reviewerId: "dave",
        reviewCount: 1,
        reviewedPullRequests: 1,
        approvals: 1,
        changesRequested: 0,
        approvalRate: 1,
        meanHoursToFirstReview: 10,
        medianHoursToFirstReview: 10,
      },
    ]);
    expect(summary.pairs).toEqual([
      { authorId: "alice", reviewerId: "bob", pullRequests: 2 },
      { authorId: "alice", reviewerId: "carol", pullRequests: 1 },
      { authorId: "bob", reviewerId: "carol", pullRequests: 1 },
      { authorId: "bob", reviewerId: "dave", pullRequests: 1 },
    ]);
  });

  it("flags busy reviewers that are slower than the typical reviewer", () => {
    expect(computeReviewCulture(pullRequests, window, { bottleneckPercentile: 0.2 }).bottleneckReviewers).toEqual([]);
    expect(computeReviewCulture(pullRequests, window, { bottleneckPercentile: 1 }).bottleneckReviewers).toEqual([
      "dave",
    ]);
  });

  it("ignores reviews submitted before the pull request was opened when measuring latency", () => {
    const summary = computeReviewCulture(
      [pullRequest({ number: 1, authorId: "alice", createdAtUnix: hours(5), reviews: [review("bob", hours(4), "approved")] })],
      window,
      { bottleneckPercentile: 0.2 },
    );

    expect(summary.reviewers[0]).toMatchObject({ reviewCount: 1, medianHoursToFirstReview: null });
    expect(summary.medianHoursToFirstReview).toBeNull();
  });

  it("returns an empty summary without pull requests", () => {
    expect(computeReviewCulture([], window, { bottleneckPercentile: 0.2 })).toEqual({
      pullRequestsInScope: 0,
      reviewedPullRequests: 0,
      pendingReviewCount: 0,
      meanHoursToFirstReview: null,
      medianHoursToFirstReview: null,
      reviewers: [],
      pairs: [],
      bottleneckReviewers: [],
    });
  });
});
