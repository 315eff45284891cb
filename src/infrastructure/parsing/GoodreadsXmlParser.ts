import { XMLParser, XMLValidator } from "fast-xml-parser";

import type { Author, BookId, SimilarBook } from "@/domain/entities/Book";

import { XmlParseError } from "@/domain/errors/AppError";

// Element paths that may repeat. Declared up front so a single child still comes back as an array.
const ARRAY_PATHS = new Set([
  "GoodreadsResponse.reviews.review",
  "GoodreadsResponse.book.similar_books.book",
  "GoodreadsResponse.book.similar_books.book.authors.author"
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (_name, jpath) => ARRAY_PATHS.has(jpath)
});

type TextNode = string | { "#text"?: string };

type AuthUserResponse = {
  GoodreadsResponse?: {
    user?: { "@_id"?: string; name?: TextNode };
  };
};

type ReviewNode = {
  book?: { id?: TextNode };
};

type ReviewListResponse = {
  GoodreadsResponse?: {
    reviews?: "" | { review?: ReviewNode[] };
  };
};

type SimilarAuthorNode = { name?: TextNode };

type SimilarBookNode = {
  id?: TextNode;
  title?: TextNode;
  link?: TextNode;
  average_rating?: TextNode;
  authors?: "" | { author?: SimilarAuthorNode[] };
};

type BookShowResponse = {
  GoodreadsResponse?: {
    book?: {
      similar_books?: "" | { book?: SimilarBookNode[] };
    };
  };
};

export interface AuthUser {
  id: number | null;
  name: string;
}

function parseDocument(xml: string, document: string): unknown {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new XmlParseError(`Malformed ${document} XML at line ${line}: ${msg}`, document);
  }
  return parser.parse(xml);
}

function text(node: TextNode | undefined): string {
  if (node === undefined) return "";
  if (typeof node === "string") return node.trim();
  return (node["#text"] ?? "").trim();
}

function isObject<T extends object>(node: "" | T | undefined): node is T {
  return typeof node === "object" && node !== null;
}

/** Integer value of `raw`, or null when it is not a plain integer. */
export function parseOptionalInt(raw: string): number | null {
  const value = raw.trim();
  if (!/^[+-]?\d+$/.test(value)) return null;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/** Floating-point value of `raw`, or null when it is not a finite decimal number. */
export function parseOptionalFloat(raw: string): number | null {
  const value = raw.trim();
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(value)) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseAuthUser(xml: string): AuthUser {
  const parsed = parseDocument(xml, "auth_user") as AuthUserResponse;
  const user = parsed.GoodreadsResponse?.user;
  if (!user) {
    throw new XmlParseError("auth_user response has no <user> element", "auth_user");
  }
  return {
    id: parseOptionalInt(user["@_id"] ?? ""),
    name: text(user.name)
  };
}

/**
 * Book ids of a review list, in document order.
 * Reviews whose book id does not parse are skipped: there is nothing to look up for them.
 */
export function parseShelfBookIds(xml: string): BookId[] {
  const parsed = parseDocument(xml, "review_list") as ReviewListResponse;
  const reviews = parsed.GoodreadsResponse?.reviews;
  if (reviews === undefined) {
    throw new XmlParseError("review list response has no <reviews> element", "review_list");
  }
  if (!isObject(reviews)) return [];

  const ids: BookId[] = [];
  for (const review of reviews.review ?? []) {
    const id = parseOptionalInt(text(review.book?.id));
    if (id !== null) ids.push(id);
  }
  return ids;
}

export function parseSimilarBooks(xml: string): SimilarBook[] {
  const parsed = parseDocument(xml, "book_show") as BookShowResponse;
  const book = parsed.GoodreadsResponse?.book;
  if (!book) {
    throw new XmlParseError("book show response has no <book> element", "book_show");
  }
  if (!isObject(book.similar_books)) return [];

  return (book.similar_books.book ?? []).map(toSimilarBook);
}

function toSimilarBook(node: SimilarBookNode): SimilarBook {
  const authors: Author[] = isObject(node.authors)
    ? (node.authors.author ?? []).map((author) => ({ name: text(author.name) }))
    : [];

  return {
    id: parseOptionalInt(text(node.id)),
    title: text(node.title),
    link: text(node.link),
    averageRating: parseOptionalFloat(text(node.average_rating)),
    authors
  };
}
