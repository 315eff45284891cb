export interface GoodreadsCredentials {
  apiKey: string;
  apiSecret: string;
  oauthToken: string;
  oauthTokenSecret: string;
}

export interface GoodreadsConfig extends GoodreadsCredentials {
  baseUri: string;
  userId?: number;
}

export interface RecommendOptions {
  timeoutMs: number;
  numberBooks: number;
  concurrency: number;
  skipFailed: boolean;
  userId?: number;
}
