import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import type { BrokerCredentials } from '../../config';
import {
  SMARTAPI_LOGIN_PATH,
  SMARTAPI_LOGOUT_PATH,
  SMARTAPI_LTP_PATH,
  SmartApiClient,
  toLiveQuote,
} from './SmartApiClient';
import { lookupInstrument } from './symbol-tokens';

const BASE_URL = 'https://broker.test';

const credentials: BrokerCredentials = {
  apiKey: 'test-api-key',
  clientCode: 'C123',
  password: 'test-secret',
  totpSecret: 'test-totp-secret',
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const loginOk = { status: true, message: 'SUCCESS', errorcode: '', data: { jwtToken: 'jwt-1', refreshToken: 'r-1' } };

function ltpOk(tradingsymbol: string, ltp: number, close: number) {
  return {
    status: true,
    message: 'SUCCESS',
    errorcode: '',
    data: { exchange: 'NSE', tradingsymbol, symboltoken: '11536', open: close, high: ltp, low: close, close, ltp },
  };
}

function createClient(creds: BrokerCredentials | null = credentials) {
  return new SmartApiClient({
    baseUrl: BASE_URL,
    timeoutMs: 1000,
    credentials: creds,
    generateTotp: () => '123456',
  });
}

function callsTo(spy: MockInstance<typeof fetch>, path: string) {
  return spy.mock.calls.filter(([input]) => String(input) === `${BASE_URL}${path}`);
}

function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

describe('lookupInstrument', () => {
  it('maps known symbols to NSE equity instruments', () => {
    expect(lookupInstrument('tcs')).toEqual({ exchange: 'NSE', tradingSymbol: 'TCS-EQ', symbolToken: '11536' });
  });

  it('returns null for unknown symbols', () => {
    expect(lookupInstrument('NOTLISTED')).toBeNull();
    expect(lookupInstrument('toString')).toBeNull();
  });
});

describe('toLiveQuote', () => {
  it('rounds change to two decimals', () => {
    const data = { exchange: 'NSE', tradingsymbol: 'SBIN-EQ', symboltoken: '3045', close: 0.1, ltp: 0.3 };

    expect(toLiveQuote('SBIN', data)).toEqual({
      symbol: 'SBIN',
      ltp: 0.3,
      close: 0.1,
      change: 0.2,
      changePercent: 200,
    });
  });
});

describe('SmartApiClient', () => {
  let fetchSpy: MockInstance<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, 'fetch').mockRejectedValue(new Error('unexpected request'));
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  describe('login', () => {
    it('returns false without credentials and makes no request', async () => {
      const client = createClient(null);

      await expect(client.login()).resolves.toBe(false);
      expect(client.isConnected()).toBe(false);
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('posts credentials with a generated TOTP and stores the session', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(loginOk));
      const client = createClient();

      await expect(client.login()).resolves.toBe(true);
      expect(client.isConnected()).toBe(true);

      const [call] = callsTo(fetchSpy, SMARTAPI_LOGIN_PATH);
      const init = call?.[1];
      expect(init?.method).toBe('POST');
      expect(requestBody(init)).toEqual({ clientcode: 'C123', password: 'test-secret', totp: '123456' });
      const headers = new Headers(init?.headers);
      expect(headers.get('X-PrivateKey')).toBe('test-api-key');
      expect(headers.get('X-UserType')).toBe('USER');
      expect(headers.get('Authorization')).toBeNull();
    });

    it('generates the TOTP from the base32 secret with otplib by default', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
      try {
        fetchSpy.mockResolvedValueOnce(jsonResponse(loginOk));
        const client = new SmartApiClient({
          baseUrl: BASE_URL,
          timeoutMs: 1000,
          credentials: { ...credentials, totpSecret: 'JBSWY3DPEHPK3PXP' },
        });

        await expect(client.login()).resolves.toBe(true);

        const [call] = callsTo(fetchSpy, SMARTAPI_LOGIN_PATH);
        expect(requestBody(call?.[1])).toEqual({ clientcode: 'C123', password: 'test-secret', totp: '432690' });
      } finally {
        vi.useRealTimers();
      }
    });

    it('returns false when the broker rejects the login', async () => {
      fetchSpy.mockResolvedValueOnce(
        jsonResponse({ status: false, message: 'Invalid totp', errorcode: 'AB1050', data: null })
      );
      const client = createClient();

      await expect(client.login()).resolves.toBe(false);
      expect(client.isConnected()).toBe(false);
    });

    it('returns false on network failure', async () => {
      fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(createClient().login()).resolves.toBe(false);
    });

    it('shares one in-flight attempt between concurrent callers', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(loginOk));
      const client = createClient();

      const results = await Promise.all([client.login(), client.login(), client.login()]);

      expect(results).toEqual([true, true, true]);
      expect(callsTo(fetchSpy, SMARTAPI_LOGIN_PATH)).toHaveLength(1);
    });
  });

  describe('quote', () => {
    async function connectedClient() {
      fetchSpy.mockResolvedValueOnce(jsonResponse(loginOk));
      const client = createClient();
      await client.login();
      return client;
    }

    it('returns null without a session and makes no request', async () => {
      await expect(createClient().quote('TCS')).resolves.toBeNull();
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('returns null for a symbol without an instrument token', async () => {
      const client = await connectedClient();

      await expect(client.quote('NOTLISTED')).resolves.toBeNull();
      expect(callsTo(fetchSpy, SMARTAPI_LTP_PATH)).toHaveLength(0);
    });

    it('derives change from close and ltp', async () => {
      const client = await connectedClient();
      fetchSpy.mockResolvedValueOnce(jsonResponse(ltpOk('TCS-EQ', 3912.5, 3890)));

      await expect(client.quote('TCS')).resolves.toEqual({
        symbol: 'TCS',
        ltp: 3912.5,
        close: 3890,
        change: 22.5,
        changePercent: 0.58,
      });

      const [call] = callsTo(fetchSpy, SMARTAPI_LTP_PATH);
      expect(requestBody(call?.[1])).toEqual({ exchange: 'NSE', tradingsymbol: 'TCS-EQ', symboltoken: '11536' });
      expect(new Headers(call?.[1]?.headers).get('Authorization')).toBe('Bearer jwt-1');
    });

    it('reports zero percent change when close is zero', async () => {
      const client = await connectedClient();
      fetchSpy.mockResolvedValueOnce(jsonResponse(ltpOk('INFY-EQ', 1500, 0)));

      const quote = await client.quote('INFY');
      expect(quote?.change).toBe(1500);
      expect(quote?.changePercent).toBe(0);
    });

    it('returns null for a malformed payload and keeps the session', async () => {
      const client = await connectedClient();
      fetchSpy.mockResolvedValueOnce(jsonResponse({ status: true, data: { ltp: 'n/a' } }));

      await expect(client.quote('TCS')).resolves.toBeNull();
      expect(client.isConnected()).toBe(true);
    });

    it('returns null on upstream server error and keeps the session', async () => {
      const client = await connectedClient();
      fetchSpy.mockResolvedValueOnce(jsonResponse({ message: 'Internal error' }, 500));

      await expect(client.quote('TCS')).resolves.toBeNull();
      expect(client.isConnected()).toBe(true);
    });

    it('drops the session on an invalid token error code', async () => {
      const client = await connectedClient();
      fetchSpy.mockResolvedValueOnce(
        jsonResponse({ status: false, message: 'Invalid Token', errorcode: 'AG8001', data: null })
      );

      await expect(client.quote('TCS')).resolves.toBeNull();
      expect(client.isConnected()).toBe(false);
    });

    it('drops the session on HTTP 401', async () => {
      const client = await connectedClient();
      fetchSpy.mockResolvedValueOnce(jsonResponse({ message: 'Unauthorized' }, 401));

      await expect(client.quote('TCS')).resolves.toBeNull();
      expect(client.isConnected()).toBe(false);
    });
  });

  describe('logout', () => {
    it('clears the session even when the broker call fails', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(loginOk));
      const client = createClient();
      await client.login();
      fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

      await client.logout();

      expect(client.isConnected()).toBe(false);
      const [call] = callsTo(fetchSpy, SMARTAPI_LOGOUT_PATH);
      expect(requestBody(call?.[1])).toEqual({ clientcode: 'C123' });
    });

    it('is a no-op without a session', async () => {
      await createClient().logout();
      expect(fetchSpy).not.toHaveBeenCalled();
    });
  });
});
