/**
 * Transfer registries
 * Outbound sessions by id plus the single inbound slot, each behind its own lock
 */

import { Mutex } from 'async-mutex';
import { InboundOutcome, InboundSession } from '../models/inboundSession.model';
import { OutboundSession } from '../models/outboundSession.model';
import {
  InboundSessionSnapshot,
  OutboundSessionSnapshot,
  OutboundTransferState,
  ProtocolEvent,
} from '../interfaces/transfer.interface';
import { logger } from '../utils/logger';

/**
 * Operations available while holding the outbound lock
 */
export interface OutboundView {
  get(id: string): OutboundSession | undefined;
  list(): OutboundSession[];
  add(session: OutboundSession): void;
  remove(id: string): OutboundSession | undefined;
}

export class OutboundRegistry {
  private readonly sessions = new Map<string, OutboundSession>();
  // presentation order, newest first
  private order: OutboundSession[] = [];
  private readonly mutex = new Mutex();

  private readonly view: OutboundView = {
    get: (id) => this.sessions.get(id),
    list: () => [...this.order],
    add: (session) => this.insert(session),
    remove: (id) => this.delete(id),
  };

  get size(): number {
    return this.sessions.size;
  }

  get isLocked(): boolean {
    return this.mutex.isLocked();
  }

  /**
   * Unlocked read for observers; mutation goes through `withLock`
   */
  peek(id: string): OutboundSession | undefined {
    return this.sessions.get(id);
  }

  list(): OutboundSession[] {
    return [...this.order];
  }

  withLock<T>(fn: (view: OutboundView) => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => fn(this.view));
  }

  get(id: string): Promise<OutboundSession | undefined> {
    return this.withLock((view) => view.get(id));
  }

  /**
   * Apply an engine event to the session with the event's id. Events for an
   * id that has been refreshed away are dropped.
   */
  applyEvent(event: ProtocolEvent): Promise<OutboundTransferState | undefined> {
    return this.withLock((view) => {
      const session = view.get(event.id);
      if (!session) {
        logger.debug(`Dropping ${event.state ?? 'stateless'} event for unknown outbound ${event.id}`);
        return undefined;
      }
      return session.applyEvent(event);
    });
  }

  /**
   * Remove every matching session from the map and the presentation list
   */
  removeWhere(predicate: (session: OutboundSession) => boolean): Promise<OutboundSession[]> {
    return this.withLock(() => {
      const removed = this.order.filter(predicate);
      for (const session of removed) {
        this.delete(session.id);
        session.dispose();
      }
      return removed;
    });
  }

  /**
   * The session currently holding the engine's single transfer, if any
   */
  activeSession(excludeId?: string): OutboundSession | undefined {
    return this.order.find((session) => session.id !== excludeId && session.isActive());
  }

  snapshot(): OutboundSessionSnapshot[] {
    return this.order.map((session) => session.snapshot());
  }

  clear(): void {
    for (const session of this.order) {
      session.dispose();
    }
    this.sessions.clear();
    this.order = [];
  }

  private insert(session: OutboundSession): void {
    if (this.sessions.has(session.id)) {
      throw new RangeError(`Outbound session ${session.id} already registered`);
    }
    this.sessions.set(session.id, session);
    this.order.unshift(session);
  }

  private delete(id: string): OutboundSession | undefined {
    const session = this.sessions.get(id);
    if (!session) {
      return undefined;
    }
    this.sessions.delete(id);
    this.order = this.order.filter((it) => it !== session);
    return session;
  }
}

export type InboundApplyResult = 'applied' | 'closed' | 'stale';

export class InboundSlot {
  private session: InboundSession | undefined;
  private readonly mutex = new Mutex();

  /**
   * Unlocked read for observers
   */
  get current(): InboundSession | undefined {
    return this.session;
  }

  withLock<T>(fn: (session: InboundSession | undefined) => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => fn(this.session));
  }

  /**
   * Put `session` in the slot. Refused while another session that has not
   * closed holds it.
   */
  occupy(session: InboundSession): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const holder = this.session;
      if (holder && !holder.isClosed) {
        return false;
      }
      holder?.dispose();
      this.session = session;
      return true;
    });
  }

  /**
   * Empty the slot if it still holds `transferId`
   */
  release(transferId: string): Promise<InboundSession | undefined> {
    return this.mutex.runExclusive(() => this.releaseUnlocked(transferId));
  }

  /**
   * Close the holder with `outcome` and empty the slot
   */
  evict(outcome: InboundOutcome): Promise<InboundSession | undefined> {
    return this.mutex.runExclusive(() => {
      const session = this.session;
      if (!session) {
        return undefined;
      }
      session.close(outcome);
      return this.releaseUnlocked(session.transferId);
    });
  }

  applyEvent(event: ProtocolEvent): Promise<InboundApplyResult> {
    return this.mutex.runExclusive(() => {
      const session = this.session;
      if (!session || !session.applyEvent(event)) {
        logger.debug(`Dropping stale inbound event ${event.state ?? 'stateless'} for ${event.id}`);
        return 'stale';
      }
      if (session.isClosed) {
        this.releaseUnlocked(session.transferId);
        return 'closed';
      }
      return 'applied';
    });
  }

  snapshot(): InboundSessionSnapshot | undefined {
    return this.session?.snapshot();
  }

  clear(): void {
    this.session?.dispose();
    this.session = undefined;
  }

  private releaseUnlocked(transferId: string): InboundSession | undefined {
    const session = this.session;
    if (!session || session.transferId !== transferId) {
      return undefined;
    }
    this.session = undefined;
    session.dispose();
    return session;
  }
}

export interface StoreSnapshot {
  outbound: OutboundSessionSnapshot[];
  inbound?: InboundSessionSnapshot;
}

/**
 * The one store shared by the router, the discovery registry and the facade
 */
export class TransferStore {
  readonly outbound = new OutboundRegistry();
  readonly inbound = new InboundSlot();

  /**
   * Whether the engine is mid-transfer for any outbound session
   */
  isEngineBusy(): boolean {
    return this.outbound.list().some((session) => session.isEngineBusy());
  }

  snapshot(): StoreSnapshot {
    return {
      outbound: this.outbound.snapshot(),
      inbound: this.inbound.snapshot(),
    };
  }

  clear(): void {
    this.outbound.clear();
    this.inbound.clear();
  }
}
