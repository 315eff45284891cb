import { isAxiosError, isCancel } from "axios";

import type { CatalogGateway } from "@/application/services/types";
import type { BookId, Shelf, SimilarBook } from "@/domain/entities/Book";
import type { HttpClient } from "@/infrastructure/http/HttpClient";
import type { QueryParams, RequestSigner } from "@/infrastructure/http/OAuthSigner";
import type { GoodreadsConfig } from "@/shared/config/Config";
import type { Logger } from "@/shared/logging/Logger";

import { ApiError, XmlParseError } from "@/domain/errors/AppError";
import { parseAuthUser, parseShelfBookIds, parseSimilarBooks } from "@/infrastructure/parsing/GoodreadsXmlParser";

export const SHELF_PAGE_SIZE = 200;

export class GoodreadsGateway implements CatalogGateway {
  constructor(
    private readonly http: HttpClient,
    private readonly signer: RequestSigner,
    private readonly config: Pick<GoodreadsConfig, "apiKey" | "baseUri">,
    private readonly logger: Logger
  ) {}

  async fetchAuthUserId(signal?: AbortSignal): Promise<number> {
    const body = await this.get("/api/auth_user", {}, signal);
    const user = parseAuthUser(body);
    if (user.id === null) {
      throw new XmlParseError("auth_user response carries no numeric user id", "auth_user");
    }
    this.logger.debug?.(`Authenticated as ${user.name || "(unnamed)"} (id=${user.id})`);
    return user.id;
  }

  async fetchShelfBookIds(userId: number, shelf: Shelf, signal?: AbortSignal): Promise<BookId[]> {
    const body = await this.get(
      "/review/list",
      { v: 2, id: userId, shelf, per_page: SHELF_PAGE_SIZE, key: this.config.apiKey, format: "xml" },
      signal
    );
    const ids = parseShelfBookIds(body);
    this.logger.debug?.(`Shelf ${shelf} of user ${userId}: ${ids.length} books`);
    return ids;
  }

  async fetchSimilarBooks(bookId: BookId, signal?: AbortSignal): Promise<SimilarBook[]> {
    const body = await this.get(`/book/show/${bookId}.xml`, { key: this.config.apiKey }, signal);
    const similar = parseSimilarBooks(body);
    this.logger.debug?.(`Book ${bookId}: ${similar.length} similar books`);
    return similar;
  }

  private async get(path: string, params: QueryParams, signal?: AbortSignal): Promise<string> {
    const url = `${this.config.baseUri}${path}`;
    const authorization = this.signer.authorizationHeader(url, params);

    const response = await this.http
      .get<string>(url, {
        params,
        headers: { Authorization: authorization },
        responseType: "text",
        signal,
        validateStatus: () => true
      })
      .catch((error: unknown) => {
        if (isCancel(error)) throw error;
        const reason = isAxiosError(error) ? error.message : String(error);
        throw new ApiError(`Request to ${path} failed: ${reason}`, undefined, path, error);
      });

    if (response.status !== 200) {
      throw new ApiError(`Request to ${path} returned HTTP ${response.status}`, response.status, path);
    }
    return response.data;
  }
}
