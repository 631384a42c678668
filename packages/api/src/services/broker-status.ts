import type { BrokerClient } from '@market-terminal/shared/broker';

export type BrokerStatus = 'Connected' | 'Mock Data';

export function getBrokerStatus(broker: BrokerClient): BrokerStatus {
  return broker.isConnected() ? 'Connected' : 'Mock Data';
}
