/**
 * Endpoint Discovery Registry
 * Keeps the latest record of every endpoint the engine reported and a
 * matching outbound session (recipient card) for each of them
 */

import { TypedEmitter, Unsubscribe } from '../lib/emitter.lib';
import { Clock } from '../lib/eta.lib';
import { OutboundSession } from '../models/outboundSession.model';
import { TransferStore } from '../repository/transferRegistry.repository';
import { EndpointInfo } from '../interfaces/transfer.interface';
import { logger } from '../utils/logger';

export type UpsertResult = 'added' | 'updated';

type DiscoveryEvents = {
  'recipients-changed': [recipients: OutboundSession[]];
};

export class DiscoveryRegistry {
  private readonly endpoints = new Map<string, EndpointInfo>();
  private readonly events = new TypedEmitter<DiscoveryEvents>('DiscoveryRegistry');

  constructor(
    private readonly store: TransferStore,
    private readonly clock?: Clock
  ) {}

  get size(): number {
    return this.endpoints.size;
  }

  get(id: string): EndpointInfo | undefined {
    const endpoint = this.endpoints.get(id);
    return endpoint ? { ...endpoint } : undefined;
  }

  list(): EndpointInfo[] {
    return [...this.endpoints.values()].map((endpoint) => ({ ...endpoint }));
  }

  onRecipientsChanged(listener: (recipients: OutboundSession[]) => void): Unsubscribe {
    return this.events.on('recipients-changed', listener);
  }

  /**
   * Record a discovered endpoint. A known id keeps its session and takes the
   * new record; an unseen id gets a fresh session at the front of the list.
   */
  async upsert(endpoint: EndpointInfo): Promise<UpsertResult> {
    const result = await this.store.outbound.withLock((view): UpsertResult => {
      const existing = view.get(endpoint.id);
      if (existing) {
        existing.updateEndpoint(endpoint);
        return 'updated';
      }
      view.add(new OutboundSession(endpoint, this.clock));
      return 'added';
    });

    this.endpoints.set(endpoint.id, { ...endpoint });
    logger.debug(
      `Endpoint ${endpoint.id} (${endpoint.name ?? 'unnamed'}) ${result}, present: ${endpoint.present}`
    );
    this.events.emit('recipients-changed', this.store.outbound.list());
    return result;
  }

  /**
   * Drop endpoint records whose sessions were refreshed away
   */
  forget(ids: Iterable<string>): number {
    let count = 0;
    for (const id of ids) {
      if (this.endpoints.delete(id)) {
        count++;
      }
    }
    if (count > 0) {
      this.events.emit('recipients-changed', this.store.outbound.list());
    }
    return count;
  }

  clear(): void {
    this.endpoints.clear();
  }
}
