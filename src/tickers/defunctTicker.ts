// Characters a canonical ticker may keep; share-class dots survive, everything else goes
const NON_TICKER_CHARACTERS = /[^A-Z0-9.]/g;
const EDGE_DOTS = /^\.+|\.+$/g;

export interface NormalizedTickers {
  success: boolean;
  tickers: string[];
}

function cleanTickerToken(token: string): string {
  let cleaned = token;

  // "NASDAQ:MSFT" and similar prefixed forms keep only the last segment
  const prefixEnd = cleaned.lastIndexOf(':');
  if (prefixEnd >= 0) {
    cleaned = cleaned.slice(prefixEnd + 1);
  }

  // "GOOG|C": the class suffix after a pipe is dropped
  const classStart = cleaned.indexOf('|');
  if (classStart >= 0) {
    cleaned = cleaned.slice(0, classStart);
  }

  return cleaned.toUpperCase().replace(NON_TICKER_CHARACTERS, '').replace(EDGE_DOTS, '');
}

/**
 * Turns a raw ticker from the defunct-ticker feed into canonical tickers.
 *
 * A raw field can carry several securities separated by whitespace
 * ("CRDA CRDB"), so the result is a list in input order. Tokens that are
 * empty after cleaning are dropped. Never throws.
 */
export function normalizeDefunctTicker(rawTicker: string): string[] {
  return rawTicker
    .split(/\s+/)
    .map(cleanTickerToken)
    .filter((ticker) => ticker.length > 0);
}

export function tryNormalizeDefunctTicker(rawTicker: string): NormalizedTickers {
  const tickers = normalizeDefunctTicker(rawTicker);
  return { success: tickers.length > 0, tickers };
}
