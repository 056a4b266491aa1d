// src/services/eventService.ts
// Catch-up reads over the event log for clients that reconnect.
import { z } from 'zod';
import type { LoggedEvent, TicketId, UserId } from '@domain/tickets';
import { AppError } from '@/lib/app-error';
import type { EventLogStore } from '@/repositories/types';
import type { TicketService } from '@/services/TicketService';

export const DEFAULT_EVENTS_LIMIT = 50;
export const MAX_EVENTS_LIMIT = 200;

const listEventsSchema = z.object({
  afterId: z.number().int().min(0).default(0),
  limit: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_EVENTS_LIMIT)
    .transform((limit) => Math.min(limit, MAX_EVENTS_LIMIT)),
});

export interface ListTicketEventsParams {
  ticketId: TicketId;
  viewerId: UserId;
  afterId?: number;
  limit?: number;
}

export interface TicketEventsPage {
  events: LoggedEvent[];
  /** Id of the last event on the page; pass back as afterId. Absent on an empty page. */
  nextCursor?: number;
}

export class EventService {
  constructor(
    private readonly events: EventLogStore,
    private readonly tickets: Pick<TicketService, 'getTicket'>
  ) {}

  async listTicketEvents(params: ListTicketEventsParams): Promise<TicketEventsPage> {
    const parsed = listEventsSchema.safeParse({ afterId: params.afterId, limit: params.limit });
    if (!parsed.success) {
      const { fieldErrors } = parsed.error.flatten();
      const fields: Record<string, string[]> = {};
      for (const [field, messages] of Object.entries(fieldErrors)) {
        if (messages && messages.length > 0) fields[field] = messages;
      }
      throw AppError.validation(fields);
    }

    // Same visibility rule as reading the ticket itself
    await this.tickets.getTicket(params.viewerId, params.ticketId);

    const events = await this.events.listByTicket(
      params.ticketId,
      parsed.data.afterId,
      parsed.data.limit
    );
    const last = events[events.length - 1];
    return last ? { events, nextCursor: last.id } : { events };
  }
}
