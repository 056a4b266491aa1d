// src/services/CommentService.ts
import {
  addComment,
  EVENT_LOG_TYPE,
  isCommentAdded,
  stateFromTicket,
  toCommentSnapshot,
  type TicketComment,
  type TicketId,
  type UserId,
} from '@domain/tickets';
import { createRealClock, type Clock } from '@domain/shared/clock';
import { AppError } from '@/lib/app-error';
import { logger as rootLogger, type Logger } from '@/lib/logger';
import type { OutboxCoordinator } from '@/services/outboxService';
import type { BackgroundNotifications } from '@/services/notificationService';
import { canViewTicket, requirePermission, type Authorizer } from '@/services/authorizationService';
import { decideOrThrow } from '@/services/TicketService';

export interface CommentServiceDeps {
  outbox: OutboxCoordinator;
  authorizer: Authorizer;
  notifications: BackgroundNotifications;
  clock?: Clock;
  logger?: Logger;
}

export class CommentService {
  private readonly outbox: OutboxCoordinator;
  private readonly authorizer: Authorizer;
  private readonly notifications: BackgroundNotifications;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(deps: CommentServiceDeps) {
    this.outbox = deps.outbox;
    this.authorizer = deps.authorizer;
    this.notifications = deps.notifications;
    this.clock = deps.clock ?? createRealClock();
    this.log = (deps.logger ?? rootLogger).child({ component: 'comment_service' });
  }

  /**
   * Add a comment to a ticket the author can see and record COMMENT_ADDED
   * with the comment as payload. Closed tickets still take comments. The
   * requester is emailed when someone else comments.
   */
  async addComment(authorId: UserId, ticketId: TicketId, body: string): Promise<TicketComment> {
    await requirePermission(this.authorizer, authorId, 'comments:create');

    const {
      result: { ticket, comment },
    } = await this.outbox.record({
      persist: async (scope) => {
        const current = await scope.tickets.findByIdForUpdate(ticketId);
        if (!current) {
          throw AppError.notFound('Ticket');
        }
        if (!(await canViewTicket(this.authorizer, current, authorId))) {
          throw AppError.forbidden('You cannot comment on this ticket');
        }

        const now = this.clock.now();
        const [added] = decideOrThrow(addComment(ticketId, body, authorId, now), stateFromTicket(current));
        if (!added || !isCommentAdded(added)) {
          throw AppError.internal('AddComment produced no CommentAdded event');
        }

        const created = await scope.comments.create({
          ticketId,
          authorId,
          body: added.body,
          createdAt: added.occurredAt,
        });
        return { ticket: current, comment: created };
      },
      describe: (persisted) => ({
        ticketId: persisted.comment.ticketId,
        type: EVENT_LOG_TYPE.CommentAdded,
        payload: toCommentSnapshot(persisted.comment),
        actorId: authorId,
      }),
    });

    this.log.info('Comment added', { ticketId, commentId: comment.id, authorId });

    if (ticket.requesterId !== authorId) {
      this.notifications.send({
        recipientUserId: ticket.requesterId,
        subject: `A new comment was added to your ticket: #${ticket.id}`,
        message: `A new comment has been added to your ticket '${ticket.title}'.`,
        ticketId: ticket.id,
      });
    }

    return comment;
  }

  async listComments(viewerId: UserId, ticketId: TicketId): Promise<TicketComment[]> {
    await requirePermission(this.authorizer, viewerId, 'comments:read');

    const { tickets, comments } = this.outbox.repositories;
    const ticket = await tickets.findById(ticketId);
    if (!ticket) {
      throw AppError.notFound('Ticket');
    }
    if (!(await canViewTicket(this.authorizer, ticket, viewerId))) {
      throw AppError.forbidden('You cannot view this ticket');
    }
    return comments.listByTicket(ticketId);
  }
}
