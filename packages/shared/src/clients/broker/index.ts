/**
 * Broker client: Angel One SmartAPI session and LTP lookups
 */

export { isInvalidTokenError, SmartApiError } from './errors';
export {
  SMARTAPI_LOGIN_PATH,
  SMARTAPI_LOGOUT_PATH,
  SMARTAPI_LTP_PATH,
  SmartApiClient,
  type SmartApiClientOptions,
  type TotpGenerator,
  toLiveQuote,
} from './SmartApiClient';
export { lookupInstrument } from './symbol-tokens';
export type { BrokerClient, LiveQuote, SmartApiInstrument } from './types';
