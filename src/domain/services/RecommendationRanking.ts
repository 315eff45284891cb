import type { BookId, RecommendationList, SimilarBook } from "@/domain/entities/Book";

const ratingOf = (book: SimilarBook): number => book.averageRating ?? Number.NEGATIVE_INFINITY;

const byRatingDescending = (a: SimilarBook, b: SimilarBook): number => {
  const left = ratingOf(a);
  const right = ratingOf(b);
  if (left === right) return 0;
  return left > right ? -1 : 1;
};

/**
 * Merges similar-book lists into a ranked recommendation list.
 *
 * Lists are concatenated in the order given, excluded ids are dropped, the first
 * occurrence of each id wins, and the survivors are stably sorted by average rating
 * (highest first, missing ratings last) and cut to `limit`.
 * Candidates without an id can be neither excluded nor deduplicated and are dropped.
 */
export function rankRecommendations(
  similarLists: readonly (readonly SimilarBook[])[],
  excluded: ReadonlySet<BookId>,
  limit: number
): RecommendationList {
  const seen = new Set<BookId>();
  const pool: SimilarBook[] = [];

  for (const list of similarLists) {
    for (const candidate of list) {
      if (candidate.id === null) continue;
      if (excluded.has(candidate.id) || seen.has(candidate.id)) continue;
      seen.add(candidate.id);
      pool.push(candidate);
    }
  }

  // Array.prototype.sort is stable, so equal ratings keep their first-seen order.
  pool.sort(byRatingDescending);

  return pool.slice(0, Math.max(0, limit));
}
