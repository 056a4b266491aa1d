/**
 * Ticket Domain Module - Public API
 *
 * - Types (pure domain model)
 * - Commands (input DTOs)
 * - Events (output facts) and event-log record types
 * - Snapshots (immutable event payloads)
 * - decide() / evolve()
 */

// === Types ===
export type {
  TicketStatus,
  TicketPriority,
  TicketId,
  UserId,
  CommentId,
  Ticket,
  TicketComment,
  TicketState,
} from './types';

export {
  TICKET_STATUSES,
  TICKET_PRIORITIES,
  TITLE_MAX_LENGTH,
  DESCRIPTION_MAX_LENGTH,
  COMMENT_BODY_MAX_LENGTH,
  VALID_STATUS_TRANSITIONS,
  emptyTicketState,
  stateFromTicket,
  isTicketStatus,
  isTicketPriority,
  isClosed,
  canTransitionTo,
  toTicketId,
  toUserId,
  toCommentId,
} from './types';

// === Commands ===
export type {
  TicketCommand,
  CreateTicketCommand,
  UpdateStatusCommand,
  AssignTicketCommand,
  AddCommentCommand,
} from './commands';

export { createTicket, updateStatus, assignTicket, addComment } from './commands';

// === Events ===
export type {
  TicketEvent,
  TicketCreatedEvent,
  StatusUpdatedEvent,
  TicketAssignedEvent,
  CommentAddedEvent,
  EventLogType,
  EventPayload,
  NewLoggedEvent,
  LoggedEvent,
} from './events';

export {
  EVENT_LOG_TYPES,
  EVENT_LOG_TYPE,
  isEventLogType,
  isTicketCreated,
  isCommentAdded,
  statusUpdated,
  ticketAssigned,
  commentAdded,
} from './events';

// === Snapshots ===
export type { TicketSnapshot, CommentSnapshot } from './snapshots';
export { toTicketSnapshot, toCommentSnapshot } from './snapshots';

// === Decision logic ===
export type { DomainError, FieldErrors } from './decide';
export { decide } from './decide';

// === State evolution ===
export { evolve, evolveAll, toTicket } from './evolve';
