/**
 * @capvault/event-store: In-memory notification log.
 *
 * One global array holds every event in position order. Each stream keeps
 * the global positions of its own events, so a stream read is an index
 * lookup into the global log. Nothing survives the process.
 */

import type { DomainEvent } from "@capvault/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  HashedStoredEvent,
  ReadAllOptions,
  ReadDirection,
  ReadOptions,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Returns the ISO 8601 timestamp stamped as `appendedAt` */
  readonly clock?: (() => string) | undefined;
}

/**
 * Take events starting at `from` (inclusive) in the given direction,
 * then cap the count. `key` extracts the ordering number of an event.
 */
function select(
  events: readonly HashedStoredEvent[],
  key: (event: HashedStoredEvent) => number,
  from: number,
  direction: ReadDirection,
  maxCount: number | undefined,
): HashedStoredEvent[] {
  const picked =
    direction === "forward"
      ? events.filter((e) => key(e) >= from)
      : events.filter((e) => key(e) <= from).reverse();

  return maxCount !== undefined && maxCount >= 0 ? picked.slice(0, maxCount) : picked;
}

export class InMemoryEventStore implements EventStore {
  private readonly _log: HashedStoredEvent[] = [];
  /** streamId → global positions of that stream's events, in version order */
  private readonly _positions = new Map<string, number[]>();
  private readonly _streamHandlers = new Map<string, Set<EventHandler>>();
  private readonly _allHandlers = new Set<EventHandler>();
  private readonly _clock: () => string;

  constructor(options?: InMemoryEventStoreOptions) {
    this._clock = options?.clock ?? (() => new Date().toISOString());
  }

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    requireStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const current = this.streamVersion(streamId);
    checkExpectedVersion(streamId, current, options?.expectedVersion);

    const positions = this._positions.get(streamId) ?? [];
    this._positions.set(streamId, positions);

    const appendedAt = this._clock();
    const appended: HashedStoredEvent[] = [];

    for (const { type, metadata, payload } of events) {
      const base = {
        event: { type, metadata, payload },
        streamId,
        version: current + appended.length + 1,
        globalPosition: this._log.length + 1,
        appendedAt,
      };
      const previousHash = this._log.at(-1)?.hash ?? GENESIS_HASH;
      const stored: HashedStoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };

      this._log.push(stored);
      positions.push(stored.globalPosition);
      appended.push(stored);
    }

    this._publish(streamId, appended);

    return {
      streamId,
      fromVersion: current + 1,
      toVersion: current + appended.length,
      count: appended.length,
    };
  }

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    requireStreamId(streamId);

    const requested = options?.fromVersion;
    if (requested !== undefined && requested < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${requested}`,
        streamId,
      );
    }

    const stream = (this._positions.get(streamId) ?? []).flatMap((position) => {
      const event = this._log[position - 1];
      return event === undefined ? [] : [event];
    });
    const direction = options?.direction ?? "forward";

    return select(
      stream,
      (e) => e.version,
      requested ?? startOf(direction, stream.length),
      direction,
      options?.maxCount,
    );
  }

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    const direction = options?.direction ?? "forward";
    return select(
      this._log,
      (e) => e.globalPosition,
      options?.fromPosition ?? startOf(direction, this._log.length),
      direction,
      options?.maxCount,
    );
  }

  subscribe(streamId: string, handler: EventHandler): Subscription {
    requireStreamId(streamId);

    const handlers = this._streamHandlers.get(streamId) ?? new Set<EventHandler>();
    this._streamHandlers.set(streamId, handlers);
    handlers.add(handler);

    return {
      unsubscribe: () => {
        handlers.delete(handler);
        if (handlers.size === 0) {
          this._streamHandlers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._allHandlers.add(handler);
    return { unsubscribe: () => this._allHandlers.delete(handler) };
  }

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._positions.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  /** Stream handlers see the batch first, then global handlers. */
  private _publish(streamId: string, events: readonly HashedStoredEvent[]): void {
    const handlers = [...(this._streamHandlers.get(streamId) ?? []), ...this._allHandlers];
    for (const handler of handlers) {
      events.forEach((event) => handler(event));
    }
  }
}

/** Forward reads start at the first event, backward reads at the head. */
function startOf(direction: ReadDirection, head: number): number {
  return direction === "forward" ? 1 : head;
}

function requireStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

function checkExpectedVersion(
  streamId: string,
  current: number,
  expected: ExpectedVersion | undefined,
): void {
  if (expected === undefined || expected === "any") {
    return;
  }
  if (expected === "no_stream" && current !== 0) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" already exists (version ${current}), expected no_stream`,
      streamId,
    );
  }
  if (typeof expected === "number" && current !== expected) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${current}, expected ${expected}`,
      streamId,
    );
  }
}
