export { fnv1a32 } from './hash';
export { mockQuote, roundPercent } from './mock-pricer';
export { LIVE_DATA_SECTOR, MOCK_SECTOR, type Quote } from './types';
