import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestApp, jsonRequest, type TestApp } from '../../test-utils/test-app';

interface ErrorBody {
  error: string;
  message: string;
}

describe('Watchlist Stock Routes', () => {
  let ctx: TestApp;
  let techId: number;

  beforeEach(async () => {
    ctx = await createTestApp();
    const tech = await ctx.watchlistService.createWatchlist({ name: 'Tech', symbols: ['TCS', 'INFY'] });
    techId = tech.id;
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  describe('POST /api/watchlists/{id}/add-stock', () => {
    it('adds the upper-cased symbol', async () => {
      const res = await ctx.app.request(`/api/watchlists/${techId}/add-stock`, jsonRequest('POST', { symbol: 'wipro' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ message: 'Stock WIPRO added to watchlist' });
      await expect(ctx.watchlistService.listSymbols(techId)).resolves.toEqual(['TCS', 'INFY', 'WIPRO']);
    });

    it('returns 409 for a symbol already in the watchlist', async () => {
      const res = await ctx.app.request(`/api/watchlists/${techId}/add-stock`, jsonRequest('POST', { symbol: 'tcs' }));

      expect(res.status).toBe(409);
      const body = (await res.json()) as ErrorBody;
      expect(body.error).toBe('Conflict');
      expect(body.message).toBe(`Stock TCS already exists in watchlist ${techId}`);
    });

    it('allows the same symbol in a different watchlist', async () => {
      const res = await ctx.app.request('/api/watchlists/2/add-stock', jsonRequest('POST', { symbol: 'TCS' }));

      expect(res.status).toBe(200);
    });

    it('returns 404 for an unknown watchlist', async () => {
      const res = await ctx.app.request('/api/watchlists/999/add-stock', jsonRequest('POST', { symbol: 'TCS' }));

      expect(res.status).toBe(404);
      const body = (await res.json()) as ErrorBody;
      expect(body.error).toBe('Not Found');
      expect(body.message).toBe('Watchlist with ID 999 not found');
    });

    it('returns 400 for a non-numeric id', async () => {
      const res = await ctx.app.request('/api/watchlists/abc/add-stock', jsonRequest('POST', { symbol: 'TCS' }));

      expect(res.status).toBe(400);
    });

    it('returns 400 for an empty symbol', async () => {
      const res = await ctx.app.request(`/api/watchlists/${techId}/add-stock`, jsonRequest('POST', { symbol: '  ' }));

      expect(res.status).toBe(400);
    });
  });

  describe('DELETE /api/watchlists/{id}/stocks/{symbol}', () => {
    it('removes the symbol', async () => {
      const res = await ctx.app.request(`/api/watchlists/${techId}/stocks/tcs`, { method: 'DELETE' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ message: 'Stock TCS removed from watchlist' });
      await expect(ctx.watchlistService.listSymbols(techId)).resolves.toEqual(['INFY']);
    });

    it('succeeds again for a symbol that is no longer a member', async () => {
      await ctx.app.request(`/api/watchlists/${techId}/stocks/TCS`, { method: 'DELETE' });
      const res = await ctx.app.request(`/api/watchlists/${techId}/stocks/TCS`, { method: 'DELETE' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ message: 'Stock TCS removed from watchlist' });
    });

    it('decodes encoded symbols', async () => {
      await ctx.app.request(`/api/watchlists/${techId}/add-stock`, jsonRequest('POST', { symbol: 'M&M' }));

      const res = await ctx.app.request(`/api/watchlists/${techId}/stocks/M%26M`, { method: 'DELETE' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ message: 'Stock M&M removed from watchlist' });
      await expect(ctx.watchlistService.listSymbols(techId)).resolves.toEqual(['TCS', 'INFY']);
    });

    it('returns 404 for an unknown watchlist', async () => {
      const res = await ctx.app.request('/api/watchlists/999/stocks/TCS', { method: 'DELETE' });

      expect(res.status).toBe(404);
    });
  });

  it('keeps stock_count equal to the number of quotes after adds and removes', async () => {
    await ctx.app.request(`/api/watchlists/${techId}/add-stock`, jsonRequest('POST', { symbol: 'WIPRO' }));
    await ctx.app.request(`/api/watchlists/${techId}/stocks/INFY`, { method: 'DELETE' });
    await ctx.app.request(`/api/watchlists/${techId}/add-stock`, jsonRequest('POST', { symbol: 'INFY' }));

    const list = (await (await ctx.app.request('/api/watchlists')).json()) as {
      watchlists: Array<{ id: number; stock_count: number }>;
    };
    const stocks = (await (await ctx.app.request(`/api/watchlists/${techId}/stocks`)).json()) as {
      stocks: Array<{ symbol: string }>;
    };

    expect(list.watchlists.find((w) => w.id === techId)?.stock_count).toBe(3);
    expect(stocks.stocks.map((s) => s.symbol)).toEqual(['TCS', 'WIPRO', 'INFY']);
  });
});
