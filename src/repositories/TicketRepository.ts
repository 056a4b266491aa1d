import { eq } from 'drizzle-orm';
import { tickets, type DbExecutor } from '@/lib/db';
import { toTicketId, toUserId, type Ticket, type TicketId } from '@domain/tickets';
import type { NewTicket, TicketRepository } from '@/repositories/types';

type TicketRow = typeof tickets.$inferSelect;

const toIso = (value: Date | null): string | null => (value ? value.toISOString() : null);

export function toTicket(row: TicketRow): Ticket {
  return {
    id: toTicketId(row.id),
    title: row.title,
    description: row.description,
    status: row.status,
    priority: row.priority,
    requesterId: toUserId(row.requesterId),
    assigneeId: row.assigneeId ? toUserId(row.assigneeId) : null,
    createdAt: row.createdAt.toISOString(),
    updatedAt: toIso(row.updatedAt),
    closedAt: toIso(row.closedAt),
  };
}

const toDate = (value: string | null): Date | null => (value ? new Date(value) : null);

export class DrizzleTicketRepository implements TicketRepository {
  constructor(private readonly db: DbExecutor) {}

  async create(ticket: NewTicket): Promise<Ticket> {
    const [row] = await this.db.insert(tickets).values({
      title: ticket.title,
      description: ticket.description,
      status: ticket.status,
      priority: ticket.priority,
      requesterId: ticket.requesterId,
      assigneeId: ticket.assigneeId,
      createdAt: new Date(ticket.createdAt),
      updatedAt: toDate(ticket.updatedAt),
      closedAt: toDate(ticket.closedAt),
    }).returning();

    return toTicket(row);
  }

  async findById(id: TicketId): Promise<Ticket | null> {
    const row = await this.db.query.tickets.findFirst({
      where: eq(tickets.id, id),
    });
    return row ? toTicket(row) : null;
  }

  async findByIdForUpdate(id: TicketId): Promise<Ticket | null> {
    const [row] = await this.db.select().from(tickets)
      .where(eq(tickets.id, id))
      .for('update');
    return row ? toTicket(row) : null;
  }

  async update(ticket: Ticket): Promise<Ticket> {
    const [row] = await this.db.update(tickets).set({
      title: ticket.title,
      description: ticket.description,
      status: ticket.status,
      priority: ticket.priority,
      assigneeId: ticket.assigneeId,
      updatedAt: toDate(ticket.updatedAt),
      closedAt: toDate(ticket.closedAt),
    }).where(eq(tickets.id, ticket.id)).returning();

    if (!row) {
      throw new Error(`Ticket ${ticket.id} disappeared during update`);
    }
    return toTicket(row);
  }
}
