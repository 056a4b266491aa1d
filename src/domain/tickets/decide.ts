/**
 * Ticket Domain - Decision Functions
 *
 * decide() takes a command and the current state and returns
 * Result<DomainError, TicketEvent[]>. It is pure and deterministic: no I/O,
 * no clock, no exceptions. Persistence and delivery happen in the services.
 */

import { type Result, ok, err } from '@domain/shared/result';
import type {
  TicketCommand,
  CreateTicketCommand,
  UpdateStatusCommand,
  AssignTicketCommand,
  AddCommentCommand,
} from './commands';
import type { TicketEvent, TicketCreatedEvent } from './events';
import { statusUpdated, ticketAssigned, commentAdded } from './events';
import type { TicketState, TicketStatus } from './types';
import {
  canTransitionTo,
  isClosed,
  isTicketPriority,
  VALID_STATUS_TRANSITIONS,
  TITLE_MAX_LENGTH,
  DESCRIPTION_MAX_LENGTH,
  COMMENT_BODY_MAX_LENGTH,
  TICKET_PRIORITIES,
} from './types';

// === Domain Errors ===

export type FieldErrors = Readonly<Record<string, readonly string[]>>;

export type DomainError =
  | { readonly code: 'VALIDATION_FAILED'; readonly message: string; readonly fields: FieldErrors }
  | { readonly code: 'INVALID_STATUS_TRANSITION'; readonly message: string; readonly from: TicketStatus; readonly to: TicketStatus }
  | { readonly code: 'CANNOT_ASSIGN_CLOSED'; readonly message: string }
  | { readonly code: 'TICKET_NOT_FOUND'; readonly message: string };

// === Error constructors ===

const validationFailed = (fields: FieldErrors): DomainError => ({
  code: 'VALIDATION_FAILED',
  message: `Validation failed: ${Object.keys(fields).length} field(s) have errors`,
  fields,
});

const invalidStatusTransition = (from: TicketStatus, to: TicketStatus): DomainError => ({
  code: 'INVALID_STATUS_TRANSITION',
  message: `Cannot transition from '${from}' to '${to}'. Valid transitions from '${from}': ${VALID_STATUS_TRANSITIONS[from].join(', ') || 'none'}`,
  from,
  to,
});

const cannotAssignClosed = (): DomainError => ({
  code: 'CANNOT_ASSIGN_CLOSED',
  message: 'Cannot assign a closed ticket',
});

const ticketNotFound = (): DomainError => ({
  code: 'TICKET_NOT_FOUND',
  message: 'Ticket not found',
});

/** Accumulates every violated field instead of stopping at the first. */
class FieldErrorCollector {
  private readonly errors: Record<string, string[]> = {};

  add(field: string, message: string): this {
    (this.errors[field] ??= []).push(message);
    return this;
  }

  hasErrors(): boolean {
    return Object.keys(this.errors).length > 0;
  }

  toFieldErrors(): FieldErrors {
    return this.errors;
  }
}

// === Main decide function ===

export function decide(
  command: TicketCommand,
  state: TicketState
): Result<DomainError, TicketEvent[]> {
  switch (command._type) {
    case 'CreateTicket':
      return decideCreateTicket(command);

    case 'UpdateStatus':
      return decideUpdateStatus(command, state);

    case 'AssignTicket':
      return decideAssignTicket(command, state);

    case 'AddComment':
      return decideAddComment(command, state);
  }
}

// === Individual decision functions ===

function decideCreateTicket(cmd: CreateTicketCommand): Result<DomainError, TicketEvent[]> {
  const errors = new FieldErrorCollector();
  const title = (cmd.title ?? '').trim();
  const description = cmd.description ?? '';

  if (title === '') {
    errors.add('title', 'Title is required');
  } else if (title.length > TITLE_MAX_LENGTH) {
    errors.add('title', `Title must be at most ${TITLE_MAX_LENGTH} characters`);
  }

  if (description.length > DESCRIPTION_MAX_LENGTH) {
    errors.add('description', `Description must be at most ${DESCRIPTION_MAX_LENGTH} characters`);
  }

  if (!isTicketPriority(cmd.priority)) {
    errors.add('priority', `Priority must be one of ${TICKET_PRIORITIES.join(', ')}`);
  }

  if (!cmd.requesterId) {
    errors.add('requesterId', 'Requester is required');
  }

  if (errors.hasErrors() || !isTicketPriority(cmd.priority) || !cmd.requesterId) {
    return err(validationFailed(errors.toFieldErrors()));
  }

  const event: TicketCreatedEvent = {
    _type: 'TicketCreated',
    occurredAt: cmd.timestamp,
    causedBy: cmd.actorId,
    title,
    description,
    priority: cmd.priority,
    requesterId: cmd.requesterId,
  };

  return ok([event]);
}

function decideUpdateStatus(
  cmd: UpdateStatusCommand,
  state: TicketState
): Result<DomainError, TicketEvent[]> {
  if (state.id === null) {
    return err(ticketNotFound());
  }

  // Same-status requests (CLOSED -> CLOSED included) are rejected, not no-ops
  if (!canTransitionTo(state.status, cmd.newStatus)) {
    return err(invalidStatusTransition(state.status, cmd.newStatus));
  }

  return ok([
    statusUpdated(state.id, state.status, cmd.newStatus, cmd.actorId, cmd.timestamp),
  ]);
}

function decideAssignTicket(
  cmd: AssignTicketCommand,
  state: TicketState
): Result<DomainError, TicketEvent[]> {
  if (state.id === null) {
    return err(ticketNotFound());
  }

  if (isClosed(state)) {
    return err(cannotAssignClosed());
  }

  // Eligibility of the assignee is checked by the caller, not here.
  return ok([
    ticketAssigned(state.id, state.assigneeId, cmd.assigneeId, cmd.actorId, cmd.timestamp),
  ]);
}

function decideAddComment(
  cmd: AddCommentCommand,
  state: TicketState
): Result<DomainError, TicketEvent[]> {
  if (state.id === null) {
    return err(ticketNotFound());
  }

  const body = (cmd.body ?? '').trim();
  const errors = new FieldErrorCollector();

  if (body === '') {
    errors.add('body', 'Comment body is required');
  } else if (body.length > COMMENT_BODY_MAX_LENGTH) {
    errors.add('body', `Comment body must be at most ${COMMENT_BODY_MAX_LENGTH} characters`);
  }

  if (errors.hasErrors()) {
    return err(validationFailed(errors.toFieldErrors()));
  }

  return ok([commentAdded(state.id, body, cmd.actorId, cmd.timestamp)]);
}
