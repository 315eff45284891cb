import type { BookId, Shelf, SimilarBook } from "@/domain/entities/Book";

export interface CatalogGateway {
  fetchAuthUserId(signal?: AbortSignal): Promise<number>;
  fetchShelfBookIds(userId: number, shelf: Shelf, signal?: AbortSignal): Promise<BookId[]>;
  fetchSimilarBooks(bookId: BookId, signal?: AbortSignal): Promise<SimilarBook[]>;
}
