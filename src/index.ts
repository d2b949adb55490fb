export * from './types/insiderTrading';
export { normalizeDefunctTicker, tryNormalizeDefunctTicker } from './tickers/defunctTicker';
export type { NormalizedTickers } from './tickers/defunctTicker';
export {
  createInsiderTrading,
  createInsiderTradingUniverse,
  cloneRecord,
  formatInsiderTrading,
  formatInsiderTradingUniverse,
  formatRecord,
} from './records/insiderTrading';
export type { InsiderTradingInput } from './records/insiderTrading';
export {
  parseInsiderTradingLine,
  parseInsiderTradingUniverseLine,
  parseInsiderTradingFile,
  parseInsiderTradingUniverseFile,
  parseOrderDirection,
} from './parsing/insiderTradingParser';
export { InsiderTradingParseError } from './parsing/parseError';
export {
  INSIDER_TRADING_PROPERTIES,
  getInsiderTradingSource,
  getInsiderTradingUniverseSource,
  getInsiderTradingPath,
  getInsiderTradingUniversePath,
} from './dataset/insiderTradingDataset';
export { serializeRecord, deserializeRecord, toJsonObject, fromJsonObject } from './serialization/json';
export type { InsiderTradingJson } from './serialization/json';
export { SymbolDatabase } from './db/symbolDatabase';
export type { SymbolEntry } from './db/symbolDatabase';
export { parseSymbolLines } from './db/symbolImport';
export { InsiderTradingDownloader, mapDirection } from './downloader/insiderTradingDownloader';
export type { DownloaderOptions, DownloadSummary, HttpClient, ProviderFiling } from './downloader/insiderTradingDownloader';
export { selectInsiderUniverse, summarizeActivity, symbolKey, loadUniverse, DEFAULT_SELECTION_CRITERIA } from './universe/selection';
export type { UniverseSelectionCriteria, SymbolActivity } from './universe/selection';
