import { createHmac } from "node:crypto";

import OAuth from "oauth-1.0a";

import type { GoodreadsCredentials } from "@/shared/config/Config";

export type QueryParams = Record<string, string | number>;

export interface RequestSigner {
  authorizationHeader(url: string, params: QueryParams): string;
}

/**
 * OAuth v1 HMAC-SHA1 signing with a consumer key pair and an access token pair.
 * Query parameters take part in the signature base string.
 */
export class OAuthSigner implements RequestSigner {
  private readonly oauth: OAuth;
  private readonly token: OAuth.Token;

  constructor(credentials: GoodreadsCredentials) {
    this.oauth = new OAuth({
      consumer: { key: credentials.apiKey, secret: credentials.apiSecret },
      signature_method: "HMAC-SHA1",
      hash_function: (baseString, key) => createHmac("sha1", key).update(baseString).digest("base64")
    });
    this.token = { key: credentials.oauthToken, secret: credentials.oauthTokenSecret };
  }

  authorizationHeader(url: string, params: QueryParams): string {
    const data = Object.fromEntries(Object.entries(params).map(([key, value]) => [key, String(value)]));
    const authorization = this.oauth.authorize({ url, method: "GET", data }, this.token);
    return this.oauth.toHeader(authorization).Authorization;
  }
}
