export type BookId = number;

export type Shelf = "read" | "currently-reading";

export interface Author {
  name: string;
}

export interface SimilarBook {
  id: BookId | null;
  title: string;
  link: string;
  averageRating: number | null;
  authors: Author[];
}

export type RecommendationList = readonly SimilarBook[];

