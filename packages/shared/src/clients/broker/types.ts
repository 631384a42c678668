/**
 * Live price for one symbol as reported by the broker
 */
export interface LiveQuote {
  symbol: string;
  ltp: number;
  close: number;
  change: number;
  changePercent: number;
}

/**
 * Session-holding broker client. Only `login` talks to the network without a session;
 * `quote` answers null rather than throwing.
 */
export interface BrokerClient {
  /** Establish a session. Resolves false when credentials are missing or rejected. */
  login(): Promise<boolean>;
  /** Live quote for the symbol, or null when none is available */
  quote(symbol: string): Promise<LiveQuote | null>;
  isConnected(): boolean;
  logout(): Promise<void>;
}

export interface SmartApiInstrument {
  exchange: 'NSE';
  tradingSymbol: string;
  symbolToken: string;
}
