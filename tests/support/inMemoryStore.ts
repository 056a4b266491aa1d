/**
 * In-process stand-in for Postgres behind the repository interfaces.
 * Each run() works on a private copy that replaces the committed state only
 * when fn resolves; transactions run one at a time, like rows held FOR UPDATE.
 */

import {
  toCommentId,
  toTicketId,
  type LoggedEvent,
  type NewLoggedEvent,
  type Ticket,
  type TicketComment,
  type TicketId,
} from '@domain/tickets';
import type {
  CommentRepository,
  EventLogStore,
  NewComment,
  NewTicket,
  RepositoryScope,
  TicketRepository,
  TransactionRunner,
} from '@/repositories/types';

interface Tables {
  tickets: Map<number, Ticket>;
  comments: TicketComment[];
  events: LoggedEvent[];
  nextTicketId: number;
  nextCommentId: number;
  nextEventId: number;
}

const cloneTables = (tables: Tables): Tables => ({
  ...tables,
  tickets: new Map(tables.tickets),
  comments: [...tables.comments],
  events: [...tables.events],
});

export const STORE_NOW = '2024-01-15T10:00:00.000Z';

export class InMemoryStore implements TransactionRunner {
  private committed: Tables = {
    tickets: new Map(),
    comments: [],
    events: [],
    nextTicketId: 1,
    nextCommentId: 1,
    nextEventId: 1,
  };
  private queue: Promise<unknown> = Promise.resolve();
  private appendFailure: Error | null = null;

  readonly repositories: RepositoryScope;
  commits = 0;
  rollbacks = 0;

  constructor(private readonly now: () => string = () => STORE_NOW) {
    this.repositories = this.scopeOver(() => this.committed);
  }

  /** Make the next event append throw, as a constraint or connection failure would. */
  failNextAppend(error: Error): void {
    this.appendFailure = error;
  }

  run<T>(fn: (scope: RepositoryScope) => Promise<T>): Promise<T> {
    const attempt = this.queue.then(async () => {
      const draft = cloneTables(this.committed);
      try {
        const result = await fn(this.scopeOver(() => draft));
        this.committed = draft;
        this.commits++;
        return result;
      } catch (error) {
        this.rollbacks++;
        throw error;
      }
    });
    this.queue = attempt.catch(() => undefined);
    return attempt;
  }

  // --- Inspection ---

  allEvents(): LoggedEvent[] {
    return [...this.committed.events];
  }

  eventsFor(ticketId: number): LoggedEvent[] {
    return this.committed.events.filter((event) => event.ticketId === ticketId);
  }

  ticket(id: number): Ticket | undefined {
    return this.committed.tickets.get(id);
  }

  /** Seed a committed ticket row directly, bypassing the event log. */
  seedTicket(ticket: NewTicket): Ticket {
    const id = toTicketId(this.committed.nextTicketId++);
    const row: Ticket = { ...ticket, id };
    this.committed.tickets.set(id, row);
    return row;
  }

  private scopeOver(tables: () => Tables): RepositoryScope {
    const tickets: TicketRepository = {
      create: async (ticket: NewTicket) => {
        const t = tables();
        const row: Ticket = { ...ticket, id: toTicketId(t.nextTicketId++) };
        t.tickets.set(row.id, row);
        return row;
      },
      findById: async (id: TicketId) => tables().tickets.get(id) ?? null,
      findByIdForUpdate: async (id: TicketId) => tables().tickets.get(id) ?? null,
      update: async (ticket: Ticket) => {
        const t = tables();
        if (!t.tickets.has(ticket.id)) {
          throw new Error(`Ticket ${ticket.id} disappeared during update`);
        }
        t.tickets.set(ticket.id, ticket);
        return ticket;
      },
    };

    const comments: CommentRepository = {
      create: async (comment: NewComment) => {
        const t = tables();
        const row: TicketComment = { ...comment, id: toCommentId(t.nextCommentId++) };
        t.comments.push(row);
        return row;
      },
      listByTicket: async (ticketId: TicketId) =>
        tables().comments.filter((comment) => comment.ticketId === ticketId),
    };

    const events: EventLogStore = {
      append: async (event: NewLoggedEvent) => {
        if (this.appendFailure) {
          const failure = this.appendFailure;
          this.appendFailure = null;
          throw failure;
        }
        const t = tables();
        const row: LoggedEvent = { ...event, id: t.nextEventId++, createdAt: this.now() };
        t.events.push(row);
        return row;
      },
      listByTicket: async (ticketId: TicketId, afterId: number, limit: number) =>
        tables()
          .events.filter((event) => event.ticketId === ticketId && event.id > afterId)
          .sort((a, b) => a.id - b.id)
          .slice(0, limit),
    };

    return { tickets, comments, events };
  }
}
