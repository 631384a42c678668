import { authenticator } from 'otplib';
import type { BrokerConfig, BrokerCredentials } from '../../config';
import { roundPercent } from '../../quotes/mock-pricer';
import { getErrorMessage } from '../../utils/error-helpers';
import { logger } from '../../utils/logger';
import { requestJson } from '../base/http-client';
import { isInvalidTokenError, SmartApiError } from './errors';
import { type LtpData, loginResponseSchema, ltpResponseSchema } from './schemas';
import { lookupInstrument } from './symbol-tokens';
import type { BrokerClient, LiveQuote } from './types';

export const SMARTAPI_LOGIN_PATH = '/rest/auth/angelbroking/user/v1/loginByPassword';
export const SMARTAPI_LTP_PATH = '/rest/secure/angelbroking/order/v1/getLtpData';
export const SMARTAPI_LOGOUT_PATH = '/rest/secure/angelbroking/user/v1/logout';

export type TotpGenerator = (secret: string) => string;

export interface SmartApiClientOptions extends Pick<BrokerConfig, 'baseUrl' | 'timeoutMs'> {
  credentials: BrokerCredentials | null;
  /** Defaults to otplib's RFC 6238 authenticator */
  generateTotp?: TotpGenerator;
}

const defaultTotp: TotpGenerator = (secret) => authenticator.generate(secret);

export function toLiveQuote(symbol: string, data: LtpData): LiveQuote {
  const change = roundPercent(data.ltp - data.close);
  return {
    symbol,
    ltp: data.ltp,
    close: data.close,
    change,
    changePercent: data.close === 0 ? 0 : roundPercent((change / data.close) * 100),
  };
}

/**
 * Angel One SmartAPI client.
 *
 * Holds at most one session. Login attempts are never retried automatically;
 * when the broker rejects the token the session is dropped and quotes fall back
 * to null until `login()` succeeds again.
 */
export class SmartApiClient implements BrokerClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly credentials: BrokerCredentials | null;
  private readonly generateTotp: TotpGenerator;

  private jwtToken: string | null = null;
  private loginInFlight: Promise<boolean> | null = null;

  constructor(options: SmartApiClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.credentials = options.credentials;
    this.generateTotp = options.generateTotp ?? defaultTotp;
  }

  isConnected(): boolean {
    return this.jwtToken !== null;
  }

  async login(): Promise<boolean> {
    const credentials = this.credentials;
    if (!credentials) {
      logger.info('SmartAPI credentials not configured, serving mock quotes');
      return false;
    }

    if (!this.loginInFlight) {
      this.loginInFlight = this.performLogin(credentials).finally(() => {
        this.loginInFlight = null;
      });
    }
    return this.loginInFlight;
  }

  async quote(symbol: string): Promise<LiveQuote | null> {
    const token = this.jwtToken;
    if (!token) {
      return null;
    }

    const instrument = lookupInstrument(symbol);
    if (!instrument) {
      logger.debug('No SmartAPI token for symbol', { symbol });
      return null;
    }

    try {
      const body = await requestJson(SMARTAPI_LTP_PATH, {
        method: 'POST',
        baseUrl: this.baseUrl,
        timeoutMs: this.timeoutMs,
        headers: this.buildHeaders(token),
        json: {
          exchange: instrument.exchange,
          tradingsymbol: instrument.tradingSymbol,
          symboltoken: instrument.symbolToken,
        },
      });

      const parsed = ltpResponseSchema.safeParse(body);
      if (!parsed.success) {
        logger.warn('Malformed SmartAPI LTP response', { symbol, issues: parsed.error.issues.length });
        return null;
      }

      const { status, data, message, errorcode } = parsed.data;
      if (!status || !data) {
        throw new SmartApiError(message || 'LTP request rejected', errorcode ?? null);
      }
      return toLiveQuote(symbol, data);
    } catch (error) {
      if (isInvalidTokenError(error)) {
        this.dropSession('token rejected while fetching LTP');
      }
      logger.warn('SmartAPI quote failed', { symbol, error: getErrorMessage(error) });
      return null;
    }
  }

  async logout(): Promise<void> {
    const token = this.jwtToken;
    if (!token || !this.credentials) {
      this.jwtToken = null;
      return;
    }

    try {
      await requestJson(SMARTAPI_LOGOUT_PATH, {
        method: 'POST',
        baseUrl: this.baseUrl,
        timeoutMs: this.timeoutMs,
        headers: this.buildHeaders(token),
        json: { clientcode: this.credentials.clientCode },
      });
    } catch (error) {
      logger.warn('SmartAPI logout failed', { error: getErrorMessage(error) });
    } finally {
      this.jwtToken = null;
    }
  }

  private async performLogin(credentials: BrokerCredentials): Promise<boolean> {
    try {
      const body = await requestJson(SMARTAPI_LOGIN_PATH, {
        method: 'POST',
        baseUrl: this.baseUrl,
        timeoutMs: this.timeoutMs,
        headers: this.buildHeaders(),
        json: {
          clientcode: credentials.clientCode,
          password: credentials.password,
          totp: this.generateTotp(credentials.totpSecret),
        },
      });

      const parsed = loginResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new SmartApiError('Malformed login response', null);
      }
      const { status, data, message, errorcode } = parsed.data;
      if (!status || !data) {
        throw new SmartApiError(message || 'Login rejected', errorcode ?? null);
      }

      this.jwtToken = data.jwtToken;
      logger.info('SmartAPI session established', { clientCode: credentials.clientCode });
      return true;
    } catch (error) {
      this.jwtToken = null;
      logger.warn('SmartAPI login failed, serving mock quotes', { error: getErrorMessage(error) });
      return false;
    }
  }

  private dropSession(reason: string): void {
    if (this.jwtToken !== null) {
      logger.warn('SmartAPI session dropped', { reason });
    }
    this.jwtToken = null;
  }

  private buildHeaders(token?: string): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'X-UserType': 'USER',
      'X-SourceID': 'WEB',
      'X-ClientLocalIP': '127.0.0.1',
      'X-ClientPublicIP': '127.0.0.1',
      'X-MACAddress': '00:00:00:00:00:00',
      'X-PrivateKey': this.credentials?.apiKey ?? '',
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    return headers;
  }
}
