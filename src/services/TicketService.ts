// src/services/TicketService.ts
// Ticket use cases: authorize, decide, persist with its event, then notify.
import {
  assignTicket,
  createTicket,
  decide,
  emptyTicketState,
  EVENT_LOG_TYPE,
  evolveAll,
  isTicketCreated,
  isTicketStatus,
  stateFromTicket,
  toTicket,
  toTicketSnapshot,
  updateStatus,
  type Ticket,
  type TicketCommand,
  type TicketEvent,
  type TicketId,
  type TicketState,
  type UserId,
} from '@domain/tickets';
import { isErr } from '@domain/shared/result';
import { createRealClock, type Clock } from '@domain/shared/clock';
import { AppError } from '@/lib/app-error';
import { logger as rootLogger, type Logger } from '@/lib/logger';
import type { NewTicket, RepositoryScope } from '@/repositories/types';
import type { OutboxCoordinator } from '@/services/outboxService';
import { canViewTicket, requirePermission, type Authorizer } from '@/services/authorizationService';
import type { BackgroundNotifications } from '@/services/notificationService';

// --- Types ---
export interface CreateTicketInput {
  title: string;
  description?: string;
  priority?: string;
  /** Defaults to the actor */
  requesterId?: UserId;
}

export interface TicketServiceDeps {
  outbox: OutboxCoordinator;
  authorizer: Authorizer;
  notifications: BackgroundNotifications;
  clock?: Clock;
  logger?: Logger;
}

/** Run decide() and turn a rejection into an AppError. */
export function decideOrThrow(command: TicketCommand, state: TicketState): TicketEvent[] {
  const decision = decide(command, state);
  if (isErr(decision)) {
    throw AppError.fromDomain(decision.error);
  }
  return decision.value;
}

async function loadForUpdate(scope: RepositoryScope, ticketId: TicketId): Promise<Ticket> {
  const ticket = await scope.tickets.findByIdForUpdate(ticketId);
  if (!ticket) {
    throw AppError.notFound('Ticket');
  }
  return ticket;
}

function applyEvents(current: Ticket, events: readonly TicketEvent[]): Ticket {
  const next = toTicket(evolveAll(stateFromTicket(current), events));
  if (!next) {
    throw AppError.internal(`Ticket ${current.id} lost its identity while applying events`);
  }
  return next;
}

// --- Service Class ---
export class TicketService {
  private readonly outbox: OutboxCoordinator;
  private readonly authorizer: Authorizer;
  private readonly notifications: BackgroundNotifications;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(deps: TicketServiceDeps) {
    this.outbox = deps.outbox;
    this.authorizer = deps.authorizer;
    this.notifications = deps.notifications;
    this.clock = deps.clock ?? createRealClock();
    this.log = (deps.logger ?? rootLogger).child({ component: 'ticket_service' });
  }

  /**
   * Create a ticket in OPEN and record TICKET_CREATED with it.
   */
  async createTicket(actorId: UserId, input: CreateTicketInput): Promise<Ticket> {
    await requirePermission(this.authorizer, actorId, 'tickets:create');

    const events = decideOrThrow(
      createTicket({
        title: input.title,
        description: input.description ?? '',
        priority: input.priority ?? 'MEDIUM',
        requesterId: input.requesterId ?? actorId,
        actorId,
        timestamp: this.clock.now(),
      }),
      emptyTicketState()
    );

    const created = events.find(isTicketCreated);
    if (!created) {
      throw AppError.internal('Create produced no TicketCreated event');
    }

    const draft: NewTicket = {
      title: created.title,
      description: created.description,
      status: 'OPEN',
      priority: created.priority,
      requesterId: created.requesterId,
      assigneeId: null,
      createdAt: created.occurredAt,
      updatedAt: null,
      closedAt: null,
    };

    const { result: ticket, event } = await this.outbox.record({
      persist: (scope) => scope.tickets.create(draft),
      describe: (persisted) => ({
        ticketId: persisted.id,
        type: EVENT_LOG_TYPE[created._type],
        payload: toTicketSnapshot(persisted),
        actorId,
      }),
    });

    this.log.info('Ticket created', { ticketId: ticket.id, eventId: event.id, actorId });
    return ticket;
  }

  /**
   * Fetch one ticket. Requester and assignee always see it; anyone else
   * needs tickets:read:all.
   */
  async getTicket(viewerId: UserId, ticketId: TicketId): Promise<Ticket> {
    await requirePermission(this.authorizer, viewerId, 'tickets:read');

    const ticket = await this.outbox.repositories.tickets.findById(ticketId);
    if (!ticket) {
      throw AppError.notFound('Ticket');
    }
    if (!(await canViewTicket(this.authorizer, ticket, viewerId))) {
      throw AppError.forbidden('You cannot view this ticket');
    }
    return ticket;
  }

  /**
   * Move a ticket through the status machine and record STATUS_UPDATED.
   * The requester is emailed when someone else made the change.
   */
  async updateStatus(actorId: UserId, ticketId: TicketId, newStatus: string): Promise<Ticket> {
    await requirePermission(this.authorizer, actorId, 'tickets:update:status');

    if (!isTicketStatus(newStatus)) {
      throw AppError.validation({ status: ['Status must be one of OPEN, IN_PROGRESS, CLOSED'] });
    }

    const { result: ticket } = await this.outbox.record({
      persist: async (scope) => {
        const current = await loadForUpdate(scope, ticketId);
        const events = decideOrThrow(
          updateStatus(ticketId, newStatus, actorId, this.clock.now()),
          stateFromTicket(current)
        );
        return scope.tickets.update(applyEvents(current, events));
      },
      describe: (persisted) => ({
        ticketId: persisted.id,
        type: EVENT_LOG_TYPE.StatusUpdated,
        payload: toTicketSnapshot(persisted),
        actorId,
      }),
    });

    this.log.info('Ticket status updated', { ticketId, status: ticket.status, actorId });

    if (ticket.requesterId !== actorId) {
      this.notifications.send({
        recipientUserId: ticket.requesterId,
        subject: `Your ticket status has been updated: #${ticket.id}`,
        message: `The status of your ticket '${ticket.title}' was changed to ${ticket.status}.`,
        ticketId: ticket.id,
      });
    }

    return ticket;
  }

  /**
   * Set the assignee and record TICKET_ASSIGNED. Status is left as it is.
   */
  async assignTicket(actorId: UserId, ticketId: TicketId, assigneeId: UserId): Promise<Ticket> {
    await requirePermission(this.authorizer, actorId, 'tickets:assign');

    const { result: ticket } = await this.outbox.record({
      persist: async (scope) => {
        const current = await loadForUpdate(scope, ticketId);
        const events = decideOrThrow(
          assignTicket(ticketId, assigneeId, actorId, this.clock.now()),
          stateFromTicket(current)
        );
        return scope.tickets.update(applyEvents(current, events));
      },
      describe: (persisted) => ({
        ticketId: persisted.id,
        type: EVENT_LOG_TYPE.TicketAssigned,
        payload: toTicketSnapshot(persisted),
        actorId,
      }),
    });

    this.log.info('Ticket assigned', { ticketId, assigneeId, actorId });
    return ticket;
  }
}
