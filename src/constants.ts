export const MIN_QUERY_LENGTH = 200;

export const DEFAULT_MAX_RESULTS = 5;
export const DEFAULT_MAX_RETRIES = 5;

// Google caps a single Custom Search page at 10 results
export const MAX_RESULTS_PER_PAGE = 10;

export const INPUT_EXTENSION = ".csv";
export const OUTPUT_SUFFIX = "_with_urls";
