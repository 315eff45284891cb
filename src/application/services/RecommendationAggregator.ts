import type { CatalogGateway } from "@/application/services/types";
import type { BookId, RecommendationList, SimilarBook } from "@/domain/entities/Book";
import type { Logger } from "@/shared/logging/Logger";

import { normalizeError } from "@/domain/errors/AppError";
import { rankRecommendations } from "@/domain/services/RecommendationRanking";
import { PromiseQueue } from "@/shared/concurrency/PromiseQueue";

export type FailurePolicy = "abort" | "skip";

export interface AggregateRequest {
  numberBooks: number;
  userId?: number;
  signal?: AbortSignal;
}

export interface RecommendationAggregator {
  aggregate(request: AggregateRequest): Promise<RecommendationList>;
}

export type RecommendationAggregatorDeps = {
  gateway: CatalogGateway;
  logger: Logger;
  concurrency?: number;
  failurePolicy?: FailurePolicy;
};

export class DefaultRecommendationAggregator implements RecommendationAggregator {
  private readonly concurrency: number;
  private readonly failurePolicy: FailurePolicy;

  constructor(private readonly deps: RecommendationAggregatorDeps) {
    this.concurrency = deps.concurrency ?? 1;
    this.failurePolicy = deps.failurePolicy ?? "abort";
  }

  async aggregate(request: AggregateRequest): Promise<RecommendationList> {
    const { gateway, logger } = this.deps;
    const { numberBooks, signal } = request;

    signal?.throwIfAborted();
    const userId = request.userId ?? (await gateway.fetchAuthUserId(signal));
    logger.info(`Collecting recommendations for user ${userId}`);

    const [readIds, currentlyReadingIds] = await Promise.all([
      gateway.fetchShelfBookIds(userId, "read", signal),
      gateway.fetchShelfBookIds(userId, "currently-reading", signal)
    ]);
    const excluded = new Set<BookId>(currentlyReadingIds);
    logger.info(`read=${readIds.length}, currently-reading=${excluded.size}`);

    if (readIds.length === 0) {
      return [];
    }

    const similarLists = await this.fetchSimilarLists(readIds, signal);
    const ranked = rankRecommendations(similarLists, excluded, numberBooks);
    logger.info(`Ranked ${ranked.length} recommendations`);
    return ranked;
  }

  /** One similar-book list per read id, in read-list order regardless of completion order. */
  private async fetchSimilarLists(readIds: BookId[], outerSignal?: AbortSignal): Promise<SimilarBook[][]> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(outerSignal?.reason);
    if (outerSignal?.aborted) {
      forwardAbort();
    } else {
      outerSignal?.addEventListener("abort", forwardAbort, { once: true });
    }

    const queue = new PromiseQueue(this.concurrency);
    const tasks = readIds.map((bookId) => queue.enqueue(() => this.fetchSimilar(bookId, controller)));

    try {
      return await Promise.all(tasks);
    } finally {
      outerSignal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async fetchSimilar(bookId: BookId, controller: AbortController): Promise<SimilarBook[]> {
    const { signal } = controller;
    signal.throwIfAborted();
    try {
      return await this.deps.gateway.fetchSimilarBooks(bookId, signal);
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      if (this.failurePolicy === "abort") {
        // Lookups still queued or in flight are no longer wanted.
        controller.abort(error);
        throw error;
      }
      this.deps.logger.warn(`Skipping similar books of ${bookId}: ${normalizeError(error).message}`);
      return [];
    }
  }
}
