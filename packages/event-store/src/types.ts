/**
 * @capvault/event-store: Core types.
 *
 * The notification log is a set of append-only streams. Versions are
 * contiguous per stream, global positions are contiguous across streams,
 * and every stored event carries its link in the hash chain.
 */

import type { DomainEvent, EventMetadata } from "@capvault/types";

// ─── Stored events ───────────────────────────────────────────────────────

export interface StoredEvent<TPayload = Record<string, unknown>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;
  readonly streamId: string;
  /** 1-based position within the stream */
  readonly version: number;
  /** 1-based position across every stream */
  readonly globalPosition: number;
  /** Store time, distinct from the notification's own timestamp */
  readonly appendedAt: string;
}

export interface HashedStoredEvent<TPayload = Record<string, unknown>>
  extends StoredEvent<TPayload> {
  /** sha256(canonical event + previousHash) */
  readonly hash: string;
  /** Hash of the event before, or "genesis" */
  readonly previousHash: string;
}

export function isHashedEvent(event: StoredEvent): event is HashedStoredEvent {
  return (
    "hash" in event &&
    typeof event.hash === "string" &&
    "previousHash" in event &&
    typeof event.previousHash === "string"
  );
}

// ─── Append ──────────────────────────────────────────────────────────────

/**
 * Optimistic concurrency on append: an exact stream version, "no_stream"
 * for a first write, or "any" to skip the check.
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  /** New head of the stream */
  readonly toVersion: number;
  readonly count: number;
}

// ─── Read ────────────────────────────────────────────────────────────────

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Inclusive start. Default: 1 forward, the stream head backward */
  readonly fromVersion?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Inclusive start. Default: 1 forward, the last position backward */
  readonly fromPosition?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

// ─── Subscriptions ───────────────────────────────────────────────────────

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// ─── Store ───────────────────────────────────────────────────────────────

/**
 * Append-only log of committed vault notifications.
 *
 * Handlers run synchronously during `append`, in version order for a
 * stream and in global order for `subscribeAll`.
 */
export interface EventStore {
  /**
   * Append events to a stream.
   *
   * @throws EventStoreError `CONCURRENCY_CONFLICT` when `expectedVersion`
   * does not match, `EMPTY_APPEND` for an empty batch
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream; empty for an unknown stream. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of every stream in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the last event in the stream, 0 when empty. */
  streamVersion(streamId: string): number;

  /** Position of the last event in the store, 0 when empty. */
  globalPosition(): number;
}

// ─── Integrity ───────────────────────────────────────────────────────────

export interface IntegrityError {
  /** Global position of the offending event */
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event whose hash was checked, 0 if none */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
