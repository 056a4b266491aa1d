/**
 * Immutable payloads stored with each event and pushed to live clients.
 * Shapes mirror what API consumers see for tickets and comments.
 */

import type { Ticket, TicketComment, TicketPriority, TicketStatus } from './types';

export interface TicketSnapshot {
  readonly id: number;
  readonly title: string;
  readonly description: string;
  readonly status: TicketStatus;
  readonly priority: TicketPriority;
  readonly requesterId: string;
  readonly assigneeId: string | null;
  readonly createdAt: string;
  readonly updatedAt: string | null;
  readonly closedAt: string | null;
}

export interface CommentSnapshot {
  readonly id: string;
  readonly ticketId: number;
  readonly authorId: string;
  readonly body: string;
  readonly createdAt: string;
}

export const toTicketSnapshot = (ticket: Ticket): TicketSnapshot =>
  Object.freeze({
    id: ticket.id,
    title: ticket.title,
    description: ticket.description,
    status: ticket.status,
    priority: ticket.priority,
    requesterId: ticket.requesterId,
    assigneeId: ticket.assigneeId,
    createdAt: ticket.createdAt,
    updatedAt: ticket.updatedAt,
    closedAt: ticket.closedAt,
  });

export const toCommentSnapshot = (comment: TicketComment): CommentSnapshot =>
  Object.freeze({
    id: String(comment.id),
    ticketId: comment.ticketId,
    authorId: comment.authorId,
    body: comment.body,
    createdAt: comment.createdAt,
  });
