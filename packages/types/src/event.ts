/**
 * Domain events.
 *
 * Committed ledger notifications are persisted as DomainEvents in the
 * notification log. Events are immutable; the log only grows.
 */

export interface EventMetadata {
  readonly eventId: string;

  /** ISO 8601; the notification's own timestamp */
  readonly timestamp: string;

  /** Account that invoked the operation */
  readonly actor: string;

  /** Shared by every event one request or operation commits */
  readonly correlationId: string;

  readonly source: "ledger" | "node";
}

export interface DomainEvent {
  /** e.g. "vault.deposited" */
  readonly type: string;
  readonly metadata: EventMetadata;
  /** Opaque to the store; amounts inside are digit strings */
  readonly payload: Readonly<Record<string, unknown>>;
}
