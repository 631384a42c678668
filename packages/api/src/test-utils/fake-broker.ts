import type { BrokerClient, LiveQuote } from '@market-terminal/shared/broker';

/**
 * In-memory broker for route and service tests. Serves the configured live
 * quotes while "connected"; every other symbol gets null.
 */
export class FakeBroker implements BrokerClient {
  readonly quoteCalls: string[] = [];
  loginAttempts = 0;
  private connected = false;

  constructor(
    private readonly liveQuotes: Readonly<Record<string, Omit<LiveQuote, 'symbol'>>> = {},
    private readonly loginSucceeds = false
  ) {}

  async login(): Promise<boolean> {
    this.loginAttempts += 1;
    this.connected = this.loginSucceeds;
    return this.connected;
  }

  async quote(symbol: string): Promise<LiveQuote | null> {
    this.quoteCalls.push(symbol);
    if (!this.connected) {
      return null;
    }
    const live = this.liveQuotes[symbol];
    return live ? { symbol, ...live } : null;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async logout(): Promise<void> {
    this.connected = false;
  }
}
