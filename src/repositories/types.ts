import type {
  Ticket,
  TicketComment,
  TicketId,
  UserId,
  LoggedEvent,
  NewLoggedEvent,
} from '@domain/tickets';

export type NewTicket = Omit<Ticket, 'id'>;

export interface NewComment {
  readonly ticketId: TicketId;
  readonly authorId: UserId;
  readonly body: string;
  readonly createdAt: string;
}

export interface TicketRepository {
  create(ticket: NewTicket): Promise<Ticket>;
  findById(id: TicketId): Promise<Ticket | null>;
  /** Loads the row and holds its write lock until the surrounding transaction ends. */
  findByIdForUpdate(id: TicketId): Promise<Ticket | null>;
  update(ticket: Ticket): Promise<Ticket>;
}

export interface CommentRepository {
  create(comment: NewComment): Promise<TicketComment>;
  listByTicket(ticketId: TicketId): Promise<TicketComment[]>;
}

/**
 * Append-only event log. There is deliberately no update or delete.
 */
export interface EventLogStore {
  append(event: NewLoggedEvent): Promise<LoggedEvent>;
  /** Events with id > afterId, ascending by id, at most `limit` rows. */
  listByTicket(ticketId: TicketId, afterId: number, limit: number): Promise<LoggedEvent[]>;
}

export interface RepositoryScope {
  readonly tickets: TicketRepository;
  readonly comments: CommentRepository;
  readonly events: EventLogStore;
}

/**
 * Runs work inside one atomic unit. Every write made through the scope handed
 * to `fn` commits together, or none does.
 */
export interface TransactionRunner {
  /** Repositories bound to the pool, for reads outside a transaction. */
  readonly repositories: RepositoryScope;
  run<T>(fn: (scope: RepositoryScope) => Promise<T>): Promise<T>;
}
