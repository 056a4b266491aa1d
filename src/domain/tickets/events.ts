/**
 * Ticket Domain Events - the output of domain decisions.
 *
 * Domain events are facts, named in the past tense and complete enough for
 * evolve() to rebuild state. Each one that reaches the store becomes exactly
 * one row of the event log, typed by EVENT_LOG_TYPES and carrying an
 * immutable snapshot of the resulting state.
 *
 * Flow: Command -> decide() -> Event[] -> evolve() -> NewState
 */

import type { TicketId, UserId, TicketStatus, TicketPriority } from './types';
import type { TicketSnapshot, CommentSnapshot } from './snapshots';

interface BaseEvent {
  readonly _type: string;
  /** ISO timestamp */
  readonly occurredAt: string;
  readonly causedBy: UserId;
}

// === Lifecycle events ===

/** Ticket id is assigned by the store when this event is persisted. */
export interface TicketCreatedEvent extends BaseEvent {
  readonly _type: 'TicketCreated';
  readonly title: string;
  readonly description: string;
  readonly priority: TicketPriority;
  readonly requesterId: UserId;
}

export interface StatusUpdatedEvent extends BaseEvent {
  readonly _type: 'StatusUpdated';
  readonly ticketId: TicketId;
  readonly fromStatus: TicketStatus;
  readonly toStatus: TicketStatus;
}

export interface TicketAssignedEvent extends BaseEvent {
  readonly _type: 'TicketAssigned';
  readonly ticketId: TicketId;
  readonly previousAssigneeId: UserId | null;
  readonly newAssigneeId: UserId;
}

// === Comment events ===

export interface CommentAddedEvent extends BaseEvent {
  readonly _type: 'CommentAdded';
  readonly ticketId: TicketId;
  readonly body: string;
}

export type TicketEvent =
  | TicketCreatedEvent
  | StatusUpdatedEvent
  | TicketAssignedEvent
  | CommentAddedEvent;

// === Event constructors ===

export const statusUpdated = (
  ticketId: TicketId,
  fromStatus: TicketStatus,
  toStatus: TicketStatus,
  causedBy: UserId,
  occurredAt: string
): StatusUpdatedEvent => ({
  _type: 'StatusUpdated',
  ticketId,
  fromStatus,
  toStatus,
  causedBy,
  occurredAt,
});

export const ticketAssigned = (
  ticketId: TicketId,
  previousAssigneeId: UserId | null,
  newAssigneeId: UserId,
  causedBy: UserId,
  occurredAt: string
): TicketAssignedEvent => ({
  _type: 'TicketAssigned',
  ticketId,
  previousAssigneeId,
  newAssigneeId,
  causedBy,
  occurredAt,
});

export const commentAdded = (
  ticketId: TicketId,
  body: string,
  causedBy: UserId,
  occurredAt: string
): CommentAddedEvent => ({
  _type: 'CommentAdded',
  ticketId,
  body,
  causedBy,
  occurredAt,
});

// === Type guards ===

export const isTicketCreated = (event: TicketEvent): event is TicketCreatedEvent =>
  event._type === 'TicketCreated';

export const isCommentAdded = (event: TicketEvent): event is CommentAddedEvent =>
  event._type === 'CommentAdded';

// === Persisted event log ===

export const EVENT_LOG_TYPES = [
  'TICKET_CREATED',
  'STATUS_UPDATED',
  'TICKET_ASSIGNED',
  'COMMENT_ADDED',
] as const;
export type EventLogType = (typeof EVENT_LOG_TYPES)[number];

export const EVENT_LOG_TYPE: Record<TicketEvent['_type'], EventLogType> = {
  TicketCreated: 'TICKET_CREATED',
  StatusUpdated: 'STATUS_UPDATED',
  TicketAssigned: 'TICKET_ASSIGNED',
  CommentAdded: 'COMMENT_ADDED',
};

export const isEventLogType = (value: string): value is EventLogType =>
  (EVENT_LOG_TYPES as readonly string[]).includes(value);

export type EventPayload = TicketSnapshot | CommentSnapshot;

/** Event row before the store has assigned its id and timestamp. */
export interface NewLoggedEvent {
  readonly ticketId: TicketId;
  readonly type: EventLogType;
  readonly payload: EventPayload;
  readonly actorId: UserId;
}

/** Event row as persisted. Ids increase across the whole log. */
export interface LoggedEvent extends NewLoggedEvent {
  readonly id: number;
  readonly createdAt: string;
}
