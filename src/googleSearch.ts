import { google } from "googleapis";
import { DEFAULT_MAX_RESULTS, DEFAULT_MAX_RETRIES } from "./constants";
import { errorMessage, httpStatusOf } from "./errors";
import { calculateForRateLimit } from "./features/exponential-backoff";
import { consoleLogger, type Logger } from "./helpers/log.helper";
import { matchesNetwork, type NetworkProfile } from "./networks";
import type { SearchCredentials } from "./types";
import { sleep } from "./utils";

export type CseListParams = {
  q: string;
  key: string;
  cx: string;
  num: number;
};

export type CseListResult = {
  items?: Array<{ link?: string | null }> | null;
};

/** One GET against the Custom Search JSON API. Errors must carry the HTTP status like gaxios does. */
export type SearchTransport = (params: CseListParams) => Promise<CseListResult>;

// gaxios retries 429/5xx on its own by default; backoff is handled by googleSearch alone
export const customSearchTransport: SearchTransport = async (params) => {
  const res = await google.customsearch("v1").cse.list(params, { retry: false });
  return res.data;
};

export type GoogleSearchOptions = {
  credentials: SearchCredentials;
  maxResults?: number;
  maxRetries?: number;
  transport?: SearchTransport;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

export function pickPostLink(result: CseListResult, network: NetworkProfile): string {
  for (const item of result.items ?? []) {
    const link = item.link;
    if (link && matchesNetwork(link, network)) return link;
  }
  return "";
}

/**
 * Searches Google for the query and returns the first link that belongs to a
 * post on the given network, or "" when there is none. Rate limiting (429) is
 * retried with exponential backoff; every other failure ends the search for
 * this query. Never throws.
 */
export async function googleSearch(
  query: string,
  network: NetworkProfile,
  {
    credentials,
    maxResults = DEFAULT_MAX_RESULTS,
    maxRetries = DEFAULT_MAX_RETRIES,
    transport = customSearchTransport,
    sleep: wait = sleep,
    logger = consoleLogger,
  }: GoogleSearchOptions
): Promise<string> {
  const params: CseListParams = {
    q: query,
    key: credentials.apiKey,
    cx: credentials.cseId,
    num: maxResults,
  };

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    let result: CseListResult;
    try {
      result = await transport(params);
    } catch (err) {
      if (httpStatusOf(err) !== 429) {
        logger.error(`Search request failed: ${errorMessage(err)}`);
        return "";
      }
      const delay = calculateForRateLimit(attempt);
      logger.warn(`Error 429: too many requests. Waiting ${delay / 1000} seconds before retrying...`);
      await wait(delay);
      continue;
    }

    // an empty match set is an answer, not a transient failure
    return pickPostLink(result, network);
  }

  return "";
}

export type SearchFn = (query: string) => Promise<string>;

export function createSearch(network: NetworkProfile, options: GoogleSearchOptions): SearchFn {
  return (query) => googleSearch(query, network, options);
}
