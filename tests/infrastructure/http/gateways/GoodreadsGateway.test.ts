import { describe, expect, it, vi } from "vitest";

import { AxiosHeaders } from "axios";

import type { HttpClient } from "@/infrastructure/http/HttpClient";
import type { QueryParams, RequestSigner } from "@/infrastructure/http/OAuthSigner";
import type { AxiosResponse } from "axios";

import { ApiError, XmlParseError } from "@/domain/errors/AppError";
import { GoodreadsGateway } from "@/infrastructure/http/gateways/GoodreadsGateway";

import { silentLogger } from "../../../support/books";
import { fixture } from "../../../support/fixtures";

const BASE_URI = "https://catalog.test";

function respond(status: number, data: string): AxiosResponse<string> {
  return { status, data, statusText: "", headers: {}, config: { headers: new AxiosHeaders() } };
}

function createGateway(response: AxiosResponse<string> | Error) {
  const get = vi.fn(async () => {
    if (response instanceof Error) throw response;
    return response;
  });
  const http = { get } as unknown as HttpClient;
  const authorizationHeader = vi.fn((url: string, _params: QueryParams) => `OAuth signed-for=${url}`);
  const signer: RequestSigner = { authorizationHeader };
  const gateway = new GoodreadsGateway(http, signer, { apiKey: "test-key", baseUri: BASE_URI }, silentLogger);
  return { gateway, get, authorizationHeader };
}

describe("GoodreadsGateway", () => {
  it("resolves the authenticated user id", async () => {
    const { gateway, get } = createGateway(respond(200, fixture("auth_user.xml")));

    await expect(gateway.fetchAuthUserId()).resolves.toBe(124723493);
    expect(get).toHaveBeenCalledWith(
      `${BASE_URI}/api/auth_user`,
      expect.objectContaining({ params: {}, headers: { Authorization: `OAuth signed-for=${BASE_URI}/api/auth_user` } })
    );
  });

  it("requests a shelf with signed query parameters", async () => {
    const { gateway, get, authorizationHeader } = createGateway(respond(200, fixture("review_list_read.xml")));
    const controller = new AbortController();

    const ids = await gateway.fetchShelfBookIds(124723493, "read", controller.signal);

    const expectedParams = {
      v: 2,
      id: 124723493,
      shelf: "read",
      per_page: 200,
      key: "test-key",
      format: "xml"
    };
    expect(ids).toEqual([101, 102]);
    expect(authorizationHeader).toHaveBeenCalledWith(`${BASE_URI}/review/list`, expectedParams);
    expect(get).toHaveBeenCalledWith(
      `${BASE_URI}/review/list`,
      expect.objectContaining({ params: expectedParams, responseType: "text", signal: controller.signal })
    );
  });

  it("fetches similar books from the book detail endpoint", async () => {
    const { gateway, get } = createGateway(respond(200, fixture("book_show.xml")));

    const similar = await gateway.fetchSimilarBooks(101);

    expect(similar.map((book) => book.id)).toEqual([5, 6]);
    expect(get).toHaveBeenCalledWith(
      `${BASE_URI}/book/show/101.xml`,
      expect.objectContaining({ params: { key: "test-key" } })
    );
  });

  it("treats any status other than 200 as a failure", async () => {
    const { gateway } = createGateway(respond(204, ""));

    const failure = gateway.fetchSimilarBooks(101);

    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toMatchObject({ statusCode: 204, endpoint: "/book/show/101.xml" });
  });

  it("wraps transport errors as network errors", async () => {
    const { gateway } = createGateway(new Error("socket hang up"));

    const error = await gateway.fetchShelfBookIds(1, "currently-reading").catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ message: "Request to /review/list failed: socket hang up", endpoint: "/review/list" });
    expect(error instanceof ApiError && error.isNetworkError).toBe(true);
  });

  it("fails on malformed XML", async () => {
    const { gateway } = createGateway(respond(200, "<GoodreadsResponse><book>"));

    await expect(gateway.fetchSimilarBooks(101)).rejects.toBeInstanceOf(XmlParseError);
  });

  it("fails when the user id is missing", async () => {
    const { gateway } = createGateway(respond(200, "<GoodreadsResponse><user><name>x</name></user></GoodreadsResponse>"));

    await expect(gateway.fetchAuthUserId()).rejects.toThrow("auth_user response carries no numeric user id");
  });
});
