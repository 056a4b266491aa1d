/**
 * Ticket Domain Types - Pure domain model for tickets.
 *
 * These types are the domain's view of tickets, independent of the
 * database schema. They are:
 *
 * 1. Pure - no side effects, no Date.now(), no DB
 * 2. Immutable - all fields are readonly
 * 3. Serializable - timestamps are ISO strings
 */

// === Value Objects ===

export const TICKET_STATUSES = ['OPEN', 'IN_PROGRESS', 'CLOSED'] as const;
export type TicketStatus = (typeof TICKET_STATUSES)[number];

export const TICKET_PRIORITIES = ['LOW', 'MEDIUM', 'HIGH'] as const;
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];

// === Entity IDs (branded types for type safety) ===

export type TicketId = number & { readonly _brand: 'TicketId' };
export type UserId = string & { readonly _brand: 'UserId' };
export type CommentId = number & { readonly _brand: 'CommentId' };

export const toTicketId = (value: number): TicketId => value as TicketId;
export const toUserId = (value: string): UserId => value as UserId;
export const toCommentId = (value: number): CommentId => value as CommentId;

// === Field limits ===

export const TITLE_MAX_LENGTH = 255;
export const DESCRIPTION_MAX_LENGTH = 10_000;
export const COMMENT_BODY_MAX_LENGTH = 5_000;

// === Domain Entities ===

/**
 * Ticket aggregate root.
 *
 * `updatedAt` stays null until the first mutation after creation;
 * `closedAt` is stamped when the ticket enters CLOSED.
 */
export interface Ticket {
  readonly id: TicketId;
  readonly title: string;
  readonly description: string;
  readonly status: TicketStatus;
  readonly priority: TicketPriority;
  readonly requesterId: UserId;
  readonly assigneeId: UserId | null;
  readonly createdAt: string;
  readonly updatedAt: string | null;
  readonly closedAt: string | null;
}

/** Comment on a ticket. Stored in its own table, not folded into the ticket. */
export interface TicketComment {
  readonly id: CommentId;
  readonly ticketId: TicketId;
  readonly authorId: UserId;
  readonly body: string;
  readonly createdAt: string;
}

// === State Snapshot (for decide/evolve) ===

/**
 * Ticket state passed to decide() and produced by evolve().
 * `id` is null until the store has assigned one.
 */
export interface TicketState {
  readonly id: TicketId | null;
  readonly title: string;
  readonly description: string;
  readonly status: TicketStatus;
  readonly priority: TicketPriority;
  readonly requesterId: UserId | null;
  readonly assigneeId: UserId | null;
  readonly createdAt: string | null;
  readonly updatedAt: string | null;
  readonly closedAt: string | null;
}

export const emptyTicketState = (): TicketState => ({
  id: null,
  title: '',
  description: '',
  status: 'OPEN',
  priority: 'MEDIUM',
  requesterId: null,
  assigneeId: null,
  createdAt: null,
  updatedAt: null,
  closedAt: null,
});

export const stateFromTicket = (ticket: Ticket): TicketState => ({ ...ticket });

// === Type guards ===

export const isTicketStatus = (value: string): value is TicketStatus =>
  (TICKET_STATUSES as readonly string[]).includes(value);

export const isTicketPriority = (value: string): value is TicketPriority =>
  (TICKET_PRIORITIES as readonly string[]).includes(value);

export const isClosed = (state: Pick<TicketState, 'status'>): boolean =>
  state.status === 'CLOSED';

// === Status transition rules ===

/** CLOSED is terminal. Same-status requests are not transitions. */
export const VALID_STATUS_TRANSITIONS: Record<TicketStatus, readonly TicketStatus[]> = {
  OPEN: ['IN_PROGRESS', 'CLOSED'],
  IN_PROGRESS: ['OPEN', 'CLOSED'],
  CLOSED: [],
} as const;

export const canTransitionTo = (from: TicketStatus, to: TicketStatus): boolean =>
  VALID_STATUS_TRANSITIONS[from].includes(to);
