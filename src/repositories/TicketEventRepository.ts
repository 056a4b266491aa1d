import { and, asc, eq, gt } from 'drizzle-orm';
import { ticketEvents, type DbExecutor } from '@/lib/db';
import {
  isEventLogType,
  toTicketId,
  toUserId,
  type LoggedEvent,
  type NewLoggedEvent,
  type TicketId,
} from '@domain/tickets';
import type { EventLogStore } from '@/repositories/types';

function toLoggedEvent(row: typeof ticketEvents.$inferSelect): LoggedEvent {
  if (!isEventLogType(row.type)) {
    throw new Error(`Unknown event type '${row.type}' on ticket event ${row.id}`);
  }
  return {
    id: row.id,
    ticketId: toTicketId(row.ticketId),
    type: row.type,
    payload: row.payload,
    actorId: toUserId(row.actorId),
    createdAt: row.createdAt.toISOString(),
  };
}

/**
 * Postgres-backed event log. Ids come from a bigserial, so they increase
 * across the whole table and therefore within every ticket.
 */
export class DrizzleTicketEventRepository implements EventLogStore {
  constructor(private readonly db: DbExecutor) {}

  async append(event: NewLoggedEvent): Promise<LoggedEvent> {
    const [row] = await this.db.insert(ticketEvents).values({
      ticketId: event.ticketId,
      type: event.type,
      payload: event.payload,
      actorId: event.actorId,
    }).returning();

    return toLoggedEvent(row);
  }

  async listByTicket(ticketId: TicketId, afterId: number, limit: number): Promise<LoggedEvent[]> {
    const rows = await this.db.select().from(ticketEvents)
      .where(and(eq(ticketEvents.ticketId, ticketId), gt(ticketEvents.id, afterId)))
      .orderBy(asc(ticketEvents.id))
      .limit(limit);
    return rows.map(toLoggedEvent);
  }
}
