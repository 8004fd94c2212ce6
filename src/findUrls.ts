import { MIN_QUERY_LENGTH } from "./constants";
import type { SearchFn } from "./googleSearch";
import { consoleLogger, type Logger } from "./helpers/log.helper";
import type { NetworkProfile } from "./networks";
import { buildQuery } from "./query";
import type { PostRow, RunCounters } from "./types";

export type FindUrlsResult = {
  rows: PostRow[];
  counters: RunCounters;
};

/**
 * Looks up a post URL for every row, one row at a time and in input order.
 * Input rows are left untouched; each output row carries the network's URL
 * column, empty unless a link was accepted.
 */
export async function findPostUrls(
  rows: readonly PostRow[],
  network: NetworkProfile,
  search: SearchFn,
  logger: Logger = consoleLogger
): Promise<FindUrlsResult> {
  const out: PostRow[] = [];
  let found = 0;
  let skipped = 0;

  for (const [index, row] of rows.entries()) {
    const line = index + 1;
    const built = buildQuery(row[network.textColumn], network);

    if (!built.ok) {
      logger.warn(`Row ${line} skipped (invalid length: ${built.length} characters)`);
      skipped++;
      out.push({ ...row, [network.urlColumn]: "" });
      continue;
    }

    const url = await search(built.query);
    if (url) {
      found++;
      logger.success(`URL found for row ${line}: ${url}`);
    } else {
      logger.info(`URL not found for row ${line}`);
    }
    out.push({ ...row, [network.urlColumn]: url });
  }

  const total = rows.length;
  return {
    rows: out,
    counters: { total, found, skipped, notFound: total - found - skipped },
  };
}

export function summarize(counters: RunCounters, logger: Logger = consoleLogger): void {
  logger.success(`\nSearch finished. URLs found: ${counters.found}/${counters.total}`);
  logger.info(`Posts skipped for insufficient text (less than ${MIN_QUERY_LENGTH} characters): ${counters.skipped}`);
  logger.info(`Posts searched without success: ${counters.notFound}`);
}
