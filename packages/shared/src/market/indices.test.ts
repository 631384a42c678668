import { describe, expect, it } from 'vitest';
import { getMarketIndices } from './indices';

describe('getMarketIndices', () => {
  it('returns the three headline indices in display order', () => {
    expect(getMarketIndices()).toEqual([
      { name: 'NIFTY 50', value: 19674.25, change: 156.8, changePercent: 0.8 },
      { name: 'SENSEX', value: 66023.69, change: 525.42, changePercent: 0.8 },
      { name: 'BANK NIFTY', value: 44258.75, change: -125.3, changePercent: -0.28 },
    ]);
  });

  it('returns copies that callers cannot use to alter later results', () => {
    const first = getMarketIndices();
    const nifty = first[0];
    if (nifty) nifty.value = 0;

    expect(getMarketIndices()[0]?.value).toBe(19674.25);
  });
});
