/**
 * Realtime wire protocol. Every frame is one JSON object.
 */

import { z } from 'zod';
import { type Result, ok, err } from '@domain/shared/result';
import {
  toTicketId,
  type EventLogType,
  type EventPayload,
  type LoggedEvent,
  type TicketId,
} from '@domain/tickets';

// --- Client -> server ---

const ticketRefSchema = z.object({
  ticketId: z.number().int().positive(),
});

export const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('SUBSCRIBE_TO_TICKET'), payload: ticketRefSchema }),
  z.object({ type: z.literal('UNSUBSCRIBE_FROM_TICKET'), payload: ticketRefSchema }),
  z.object({ type: z.literal('PING') }),
]);

export type ClientMessage =
  | { type: 'SUBSCRIBE_TO_TICKET'; ticketId: TicketId }
  | { type: 'UNSUBSCRIBE_FROM_TICKET'; ticketId: TicketId }
  | { type: 'PING' };

export function parseClientMessage(raw: string): Result<string, ClientMessage> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return err('Message is not valid JSON');
  }

  const parsed = clientMessageSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return err(`Invalid message${where}: ${issue ? issue.message : 'unknown shape'}`);
  }

  const message = parsed.data;
  switch (message.type) {
    case 'SUBSCRIBE_TO_TICKET':
    case 'UNSUBSCRIBE_FROM_TICKET':
      return ok({ type: message.type, ticketId: toTicketId(message.payload.ticketId) });
    case 'PING':
      return ok({ type: 'PING' });
  }
}

// --- Server -> client ---

export interface EventMessage {
  readonly id: number;
  readonly type: EventLogType;
  readonly payload: EventPayload;
  readonly ticketId: number;
}

export interface PongMessage {
  readonly type: 'PONG';
}

export type ServerMessage = EventMessage | PongMessage;

export const PONG: PongMessage = Object.freeze({ type: 'PONG' });

export const toEventMessage = (event: LoggedEvent): EventMessage => ({
  id: event.id,
  type: event.type,
  payload: event.payload,
  ticketId: event.ticketId,
});

export const encodeServerMessage = (message: ServerMessage): string => JSON.stringify(message);
