/**
 * Backend Ingest
 * The one entry point for "resource X changed" reports, whatever transport carried them
 * (in-process call, HTTP, Redis channel).
 *
 * Coalescing (coalesceWindowMs > 0): the first change to a uri opens a window; changes
 * arriving inside it replace the pending payload and produce no dispatch of their own.
 * When the window closes one dispatch goes out carrying the latest payload. Clients are
 * therefore guaranteed at least one notification after the latest change, not one per
 * change. With a window of 0 every change dispatches immediately, in arrival order.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { BackendUnavailableError, InvalidChangeError } from '../../lib/errors/broker-errors.js';
import { hashForLog } from '../../utils/security.utils.js';
import type { ResourceUri } from './broker.types.js';
import type { DispatchSummary, Dispatcher } from './dispatcher.js';
import { isResourceUri, MAX_URI_LENGTH } from './protocol/resource-uri.js';

export interface IngestAck {
  uri: ResourceUri;
  /** Folded into a change already waiting in the coalescing window */
  coalesced: boolean;
  /** Present when the change was dispatched synchronously */
  summary?: DispatchSummary;
}

export interface BackendIngestOptions {
  coalesceWindowMs: number;
}

interface PendingChange {
  payload: string | undefined;
  timer: NodeJS.Timeout;
  count: number;
}

export class BackendIngest {
  private readonly pending = new Map<ResourceUri, PendingChange>();
  private stopped = false;
  private received = 0;

  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly options: BackendIngestOptions
  ) { }

  get isAccepting(): boolean {
    return !this.stopped;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get receivedCount(): number {
    return this.received;
  }

  async reportChange(uri: string, payload?: string): Promise<IngestAck> {
    if (this.stopped) {
      throw new BackendUnavailableError('Broker is shutting down and no longer accepts changes');
    }
    if (!isResourceUri(uri)) {
      throw new InvalidChangeError(`uri must be a non-empty string of at most ${MAX_URI_LENGTH} characters`);
    }

    this.received++;

    if (this.options.coalesceWindowMs <= 0) {
      const summary = this.dispatcher.dispatch(payload === undefined ? { uri } : { uri, payload });
      return { uri, coalesced: false, summary };
    }

    const existing = this.pending.get(uri);
    if (existing) {
      existing.payload = payload;
      existing.count++;
      return { uri, coalesced: true };
    }

    const timer = setTimeout(() => this.flush(uri), this.options.coalesceWindowMs);
    this.pending.set(uri, { payload, timer, count: 1 });
    return { uri, coalesced: false };
  }

  /**
   * Dispatch a pending coalesced change now
   */
  flush(uri: ResourceUri): DispatchSummary | null {
    const entry = this.pending.get(uri);
    if (!entry) {
      return null;
    }
    clearTimeout(entry.timer);
    this.pending.delete(uri);

    if (entry.count > 1) {
      logger.debug({
        uriHash: hashForLog(uri),
        coalescedChanges: entry.count,
        event: 'changes_coalesced'
      }, 'Coalesced changes into one dispatch');
    }

    return this.dispatcher.dispatch(entry.payload === undefined ? { uri } : { uri, payload: entry.payload });
  }

  /**
   * Flush every pending change, then refuse new ones
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;

    const uris = Array.from(this.pending.keys());
    for (const uri of uris) {
      this.flush(uri);
    }

    logger.info({
      flushed: uris.length,
      received: this.received,
      event: 'ingest_stopped'
    }, 'Backend ingest stopped');
  }
}
