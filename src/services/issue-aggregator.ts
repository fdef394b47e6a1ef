import type { Issue } from "../types";
import { AggregatorFinalizedError } from "../types/errors";
import { nodeWeight } from "../utils/node-weight";

export type AggregatorState = "accumulating" | "finalized";

/**
 * What happened to an offered issue
 */
export type OfferOutcome = "inserted" | "replaced" | "kept";

/**
 * Deduplicates issues seen across export files, one record per key
 *
 * A later version of an issue replaces the stored one only when its weight
 * is strictly greater; on a tie the first-seen version stays, so the result
 * depends on the order in which files are processed.
 */
export class IssueAggregator {
  private readonly issuesByKey = new Map<string, Issue>();
  private currentState: AggregatorState = "accumulating";

  constructor(private readonly weigh: (issue: Issue) => number = nodeWeight) {}

  get state(): AggregatorState {
    return this.currentState;
  }

  get size(): number {
    return this.issuesByKey.size;
  }

  /**
   * Adds an issue, keeping the heavier version when the key is already known
   * @throws {AggregatorFinalizedError} When called after finalize()
   */
  offer(issue: Issue): OfferOutcome {
    if (this.currentState === "finalized") {
      throw new AggregatorFinalizedError(issue.key);
    }

    const previous = this.issuesByKey.get(issue.key);
    if (!previous) {
      this.issuesByKey.set(issue.key, issue);
      return "inserted";
    }

    if (this.weigh(issue) > this.weigh(previous)) {
      this.issuesByKey.set(issue.key, issue);
      return "replaced";
    }

    return "kept";
  }

  /**
   * Stops accepting issues and returns them sorted by key (ordinal compare)
   */
  finalize(): Issue[] {
    this.currentState = "finalized";

    return [...this.issuesByKey.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, issue]) => issue);
  }
}
