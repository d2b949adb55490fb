export type OrderDirection = 'Buy' | 'Sell' | 'Hold';

// Numeric codes as they appear in the CSV files
export const ORDER_DIRECTION_CODES: Record<OrderDirection, number> = {
  Buy: 0,
  Sell: 1,
  Hold: 2,
};

export type Resolution = 'Tick' | 'Second' | 'Minute' | 'Hour' | 'Daily';
export type TransportMedium = 'LocalFile' | 'RemoteFile' | 'Rest';
export type FileFormat = 'Csv' | 'FoldingCollection';

export interface SecuritySymbol {
  /** Ticker as of the record's time */
  value: string;
  /** Resolved security identifier, empty when the ticker was never mapped */
  id: string;
}

interface InsiderTradingFields {
  readonly symbol: SecuritySymbol;
  /** When the record becomes visible: the day after the filing */
  readonly time: Date;
  readonly endTime: Date;
  /** Price per share, 0 when absent */
  readonly value: number;
  /** Filing date */
  readonly date: Date;
  /** Filer name */
  readonly name: string;
  readonly transaction: OrderDirection;
  readonly shares: number | null;
  readonly pricePerShare: number | null;
  readonly sharesOwnedFollowing: number | null;
}

export interface InsiderTradingRecord extends InsiderTradingFields {
  readonly kind: 'insiderTrading';
}

export interface InsiderTradingUniverseRecord extends InsiderTradingFields {
  readonly kind: 'universe';
}

export type AnyInsiderTradingRecord = InsiderTradingRecord | InsiderTradingUniverseRecord;

export interface SubscriptionDataSource {
  source: string;
  transportMedium: TransportMedium;
  format: FileFormat;
}

export interface DatasetProperties {
  defaultResolution: Resolution;
  supportedResolutions: Resolution[];
  dataTimeZone: string;
  isSparseData: boolean;
  requiresMapping: boolean;
}
