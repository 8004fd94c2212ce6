/** One CSV row keyed by header name. */
export type PostRow = Readonly<Record<string, string>>;

export type PostTable = {
  fields: string[];
  rows: PostRow[];
};

export type SearchCredentials = {
  apiKey: string;
  cseId: string;
};

export type RunCounters = {
  total: number;
  found: number;
  skipped: number;
  notFound: number;
};
