import {
  SECONDS_PER_HOUR,
  isWithinWindow,
  round4,
  type AnalysisWindow,
  type ContributorId,
  type PullRequest,
  type Review,
  type ReviewCultureSummary,
  type ReviewPair,
  type ReviewerStats,
} from "@collabscope/core";
import type { ReviewCultureConfig } from "./collaboration-types.js";
import { average, median } from "./math.js";

type ReviewerAccumulator = {
  reviewerId: ContributorId;
  reviewCount: number;
  approvals: number;
  changesRequested: number;
  pullRequests: Set<number>;
  hoursToFirstReview: number[];
};

type RankedReviewer = {
  stats: ReviewerStats;
  rawMedianHours: number | null;
};

const roundOrNull = (value: number | null): number | null => (value === null ? null : round4(value));

const hoursBetween = (fromUnix: number, toUnix: number): number => (toUnix - fromUnix) / SECONDS_PER_HOUR;

/** Reviews that count toward culture metrics: submitted in the window by someone other than the author. */
const countedReviews = (pullRequest: PullRequest, window: AnalysisWindow): readonly Review[] =>
  pullRequest.reviews
    .filter((review) => review.reviewerId !== pullRequest.authorId && isWithinWindow(review.submittedAtUnix, window))
    .sort((a, b) => a.submittedAtUnix - b.submittedAtUnix || a.reviewerId.localeCompare(b.reviewerId));

const selectBottlenecks = (ranked: readonly RankedReviewer[], percentile: number): readonly ContributorId[] => {
  const reviewerMedians = ranked.flatMap((reviewer) =>
    reviewer.rawMedianHours === null ? [] : [reviewer.rawMedianHours],
  );
  const overallMedian = median(reviewerMedians);
  if (overallMedian === null) {
    return [];
  }

  const busiestCount = Math.max(1, Math.ceil(ranked.length * percentile));
  return ranked
    .slice(0, busiestCount)
    .filter((reviewer) => reviewer.rawMedianHours !== null && reviewer.rawMedianHours > overallMedian)
    .map((reviewer) => reviewer.stats.reviewerId);
};

export const computeReviewCulture = (
  pullRequests: readonly PullRequest[],
  window: AnalysisWindow,
  config: ReviewCultureConfig,
): ReviewCultureSummary => {
  const inScope = pullRequests.filter((pullRequest) => isWithinWindow(pullRequest.createdAtUnix, window));
  const reviewers = new Map<ContributorId, ReviewerAccumulator>();
  const pairs = new Map<string, { authorId: ContributorId; reviewerId: ContributorId; pullRequests: Set<number> }>();
  const firstReviewHours: number[] = [];
  let pendingReviewCount = 0;

  for (const pullRequest of inScope) {
    const reviews = countedReviews(pullRequest, window);
    const first = reviews[0];
    if (first === undefined) {
      pendingReviewCount += 1;
      continue;
    }

    const latency = hoursBetween(pullRequest.createdAtUnix, first.submittedAtUnix);
    if (latency >= 0) {
      firstReviewHours.push(latency);
    }

    const seenOnThisPullRequest = new Set<ContributorId>();
    for (const review of reviews) {
      const reviewer = reviewers.get(review.reviewerId) ?? {
        reviewerId: review.reviewerId,
        reviewCount: 0,
        approvals: 0,
        changesRequested: 0,
        pullRequests: new Set<number>(),
        hoursToFirstReview: [],
      };
      reviewer.reviewCount += 1;
      reviewer.approvals += review.verdict === "approved" ? 1 : 0;
      reviewer.changesRequested += review.verdict === "changes_requested" ? 1 : 0;
      reviewer.pullRequests.add(pullRequest.number);
      reviewers.set(review.reviewerId, reviewer);

      if (!seenOnThisPullRequest.has(review.reviewerId)) {
        seenOnThisPullRequest.add(review.reviewerId);
        const ownLatency = hoursBetween(pullRequest.createdAtUnix, review.submittedAtUnix);
        if (ownLatency >= 0) {
          reviewer.hoursToFirstReview.push(ownLatency);
        }
      }

      const pairKey = `${pullRequest.authorId}\u0000${review.reviewerId}`;
      const pair = pairs.get(pairKey) ?? {
        authorId: pullRequest.authorId,
        reviewerId: review.reviewerId,
        pullRequests: new Set<number>(),
      };
      pair.pullRequests.add(pullRequest.number);
      pairs.set(pairKey, pair);
    }
  }

  const ranked: RankedReviewer[] = [...reviewers.values()]
    .map((reviewer) => {
      const rawMedianHours = median(reviewer.hoursToFirstReview);
      return {
        rawMedianHours,
        stats: {
          reviewerId: reviewer.reviewerId,
          reviewCount: reviewer.reviewCount,
          reviewedPullRequests: reviewer.pullRequests.size,
          approvals: reviewer.approvals,
          changesRequested: reviewer.changesRequested,
          approvalRate: round4(reviewer.approvals / reviewer.reviewCount),
          meanHoursToFirstReview: roundOrNull(average(reviewer.hoursToFirstReview)),
          medianHoursToFirstReview: roundOrNull(rawMedianHours),
        },
      };
    })
    .sort(
      (a, b) => b.stats.reviewCount - a.stats.reviewCount || a.stats.reviewerId.localeCompare(b.stats.reviewerId),
    );

  const reviewPairs: ReviewPair[] = [...pairs.values()]
    .map((pair) => ({ authorId: pair.authorId, reviewerId: pair.reviewerId, pullRequests: pair.pullRequests.size }))
    .sort(
      (a, b) =>
        b.pullRequests - a.pullRequests ||
        a.authorId.localeCompare(b.authorId) ||
        a.reviewerId.localeCompare(b.reviewerId),
    );

  return {
    pullRequestsInScope: inScope.length,
    reviewedPullRequests: inScope.length - pendingReviewCount,
    pendingReviewCount,
    meanHoursToFirstReview: roundOrNull(average(firstReviewHours)),
    medianHoursToFirstReview: roundOrNull(median(firstReviewHours)),
    reviewers: ranked.map((reviewer) => reviewer.stats),
    pairs: reviewPairs,
    bottleneckReviewers: selectBottlenecks(ranked, config.bottleneckPercentile),
  };
};
