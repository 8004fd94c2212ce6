const baseTimeout = 1_000;

const ratio = 2;

/** Wait before retrying a rate-limited search: 1s, 2s, 4s, ... for attempts 0, 1, 2, ... */
export const calculateForRateLimit = (attempt: number): number => baseTimeout * ratio ** attempt;
