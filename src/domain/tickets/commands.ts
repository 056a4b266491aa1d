/**
 * Ticket Commands - Input DTOs for domain operations.
 *
 * Commands are intents. decide() validates them against the current state
 * and turns them into events. They carry ISO timestamps, never Date objects,
 * and discriminate on `_type`.
 */

import type { TicketId, UserId, TicketStatus, TicketPriority } from './types';

interface BaseCommand {
  readonly _type: string;
  /** User performing the action */
  readonly actorId: UserId;
  /** ISO timestamp of the command */
  readonly timestamp: string;
}

export interface CreateTicketCommand extends BaseCommand {
  readonly _type: 'CreateTicket';
  readonly title: string;
  readonly description: string;
  /** Unchecked input; decide() rejects values outside the priority enum */
  readonly priority: string;
  readonly requesterId: UserId | null;
}

export interface UpdateStatusCommand extends BaseCommand {
  readonly _type: 'UpdateStatus';
  readonly ticketId: TicketId;
  readonly newStatus: TicketStatus;
}

export interface AssignTicketCommand extends BaseCommand {
  readonly _type: 'AssignTicket';
  readonly ticketId: TicketId;
  readonly assigneeId: UserId;
}

export interface AddCommentCommand extends BaseCommand {
  readonly _type: 'AddComment';
  readonly ticketId: TicketId;
  readonly body: string;
}

export type TicketCommand =
  | CreateTicketCommand
  | UpdateStatusCommand
  | AssignTicketCommand
  | AddCommentCommand;

// === Command factories ===

export const createTicket = (
  params: Omit<CreateTicketCommand, '_type' | 'priority'> & { priority: TicketPriority | string }
): CreateTicketCommand => ({
  _type: 'CreateTicket',
  ...params,
});

export const updateStatus = (
  ticketId: TicketId,
  newStatus: TicketStatus,
  actorId: UserId,
  timestamp: string
): UpdateStatusCommand => ({
  _type: 'UpdateStatus',
  ticketId,
  newStatus,
  actorId,
  timestamp,
});

export const assignTicket = (
  ticketId: TicketId,
  assigneeId: UserId,
  actorId: UserId,
  timestamp: string
): AssignTicketCommand => ({
  _type: 'AssignTicket',
  ticketId,
  assigneeId,
  actorId,
  timestamp,
});

export const addComment = (
  ticketId: TicketId,
  body: string,
  actorId: UserId,
  timestamp: string
): AddCommentCommand => ({
  _type: 'AddComment',
  ticketId,
  body,
  actorId,
  timestamp,
});
