import type { RecommendationAggregator } from "@/application/services/RecommendationAggregator";
import type { RecommendationList } from "@/domain/entities/Book";
import type { AppError } from "@/domain/errors/AppError";
import type { Logger } from "@/shared/logging/Logger";

import { normalizeError } from "@/domain/errors/AppError";
import { withDeadline } from "@/shared/concurrency/Deadline";

export interface RecommendBooksParams {
  numberBooks: number;
  timeoutMs: number;
  userId?: number;
}

export type RecommendBooksOutcome =
  | { kind: "recommended"; books: RecommendationList }
  | { kind: "empty" }
  | { kind: "timed-out"; timeoutMs: number }
  | { kind: "failed"; error: AppError };

export interface RecommendBooksDependencies {
  aggregator: RecommendationAggregator;
  logger: Logger;
}

export class RecommendBooksUseCase {
  constructor(private readonly deps: RecommendBooksDependencies) {}

  async execute(params: RecommendBooksParams): Promise<RecommendBooksOutcome> {
    const { numberBooks, timeoutMs, userId } = params;
    const { aggregator, logger } = this.deps;
    const start = Date.now();

    try {
      const result = await withDeadline(timeoutMs, (signal) =>
        aggregator.aggregate({ numberBooks, userId, signal })
      );

      if (result.status === "timed-out") {
        logger.warn(`Gave up after ${result.timeoutMs}ms`);
        return { kind: "timed-out", timeoutMs: result.timeoutMs };
      }

      logger.info(`Finished in ${Date.now() - start}ms`);
      return result.value.length === 0 ? { kind: "empty" } : { kind: "recommended", books: result.value };
    } catch (error) {
      const appError = normalizeError(error, "recommend");
      logger.error("Recommendation failed", appError);
      return { kind: "failed", error: appError };
    }
  }
}
