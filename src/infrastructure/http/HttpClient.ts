import axios from "axios";

import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from "axios";

export interface HttpClient {
  get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse<T>>;
}

// The API answers in XML; asking for JSON gets an HTML error page on some endpoints.
const DEFAULT_HEADERS = {
  Accept: "application/xml",
  "User-Agent": "shelf-recs"
};

export class AxiosHttpClient implements HttpClient {
  private readonly client: AxiosInstance;

  constructor(config: AxiosRequestConfig = {}) {
    this.client = axios.create({ maxRedirects: 5, headers: DEFAULT_HEADERS, ...config });
  }

  get<T>(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    return this.client.get<T>(url, config);
  }
}
