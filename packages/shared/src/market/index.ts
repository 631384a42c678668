export { getMarketIndices, type MarketIndex } from './indices';
