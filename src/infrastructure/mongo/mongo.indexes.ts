import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

export type IndexPlan = Array<{ keys: IndexSpecification; options: CreateIndexesOptions }>;

/**
 * Index plan, applied idempotently on first use:
 * - job_reports: unique { jobKey: 1 } so re-runs overwrite; { finishedAt: 1 } for recency queries
 * - dead_letters: { receivedAt: 1 }
 */
export const mongoIndexes: { jobReports: IndexPlan; deadLetters: IndexPlan } = {
  jobReports: [
    { keys: { jobKey: 1 }, options: { unique: true } },
    { keys: { finishedAt: 1 }, options: {} }
  ],
  deadLetters: [
    { keys: { receivedAt: 1 }, options: {} }
  ]
};
