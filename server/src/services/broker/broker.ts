/**
 * Broker composition: one registry shared by the connection manager and the dispatcher,
 * with the backend ingest in front of the dispatcher.
 */

import type { OverflowPolicy } from './broker.types.js';
import { BackendIngest } from './backend-ingest.js';
import { ConnectionManager } from './connection-manager.js';
import { Dispatcher } from './dispatcher.js';
import { SubscriptionRegistry } from './subscription-registry.js';

export interface BrokerOptions {
  outboundQueueMax: number;
  overflowPolicy: OverflowPolicy;
  maxSubscriptionsPerSession: number;
  allowLegacy: boolean;
  coalesceWindowMs: number;
  subscribeRateMax: number;
  subscribeRatePerSec: number;
}

export interface Broker {
  registry: SubscriptionRegistry;
  manager: ConnectionManager;
  dispatcher: Dispatcher;
  ingest: BackendIngest;
  shutdown(): Promise<void>;
}

export function createBroker(options: BrokerOptions): Broker {
  const registry = new SubscriptionRegistry();
  const manager = new ConnectionManager(registry, {
    outboundQueueMax: options.outboundQueueMax,
    overflowPolicy: options.overflowPolicy,
    maxSubscriptionsPerSession: options.maxSubscriptionsPerSession,
    allowLegacy: options.allowLegacy,
    subscribeRateLimit: {
      maxTokens: options.subscribeRateMax,
      refillPerSecond: options.subscribeRatePerSec
    }
  });
  const dispatcher = new Dispatcher(registry, manager);
  const ingest = new BackendIngest(dispatcher, { coalesceWindowMs: options.coalesceWindowMs });

  return {
    registry,
    manager,
    dispatcher,
    ingest,
    async shutdown() {
      // Refuse new changes before sessions start closing
      ingest.stop();
      await manager.shutdown();
    }
  };
}
