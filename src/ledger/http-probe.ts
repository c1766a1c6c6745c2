import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { toComponentError } from "../http/client.js";

/** Anonymous reachability check for a published URL. */
export interface Fetcher {
  /** HTTP status of an unauthenticated HEAD. Throws when no response arrives. */
  head(url: string): Promise<number>;
}

export interface HttpFetcherOpts {
  timeoutMs: number;
  adapter?: AxiosAdapter;
}

/**
 * HEAD through a bare axios instance: no credentials, no base URL, every status
 * returned rather than thrown.
 */
export class HttpFetcher implements Fetcher {
  private http: AxiosInstance;

  constructor(opts: HttpFetcherOpts) {
    this.http = axios.create({
      timeout: opts.timeoutMs,
      maxRedirects: 5,
      validateStatus: () => true,
      adapter: opts.adapter,
    });
  }

  async head(url: string): Promise<number> {
    try {
      const response = await this.http.head(url);
      return response.status;
    } catch (err) {
      throw toComponentError(err, `HEAD ${url}`, "CONNECTIVITY");
    }
  }
}
