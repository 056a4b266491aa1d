/**
 * Ticket Domain - State Evolution Functions
 *
 * evolve() applies one event to state and returns the new state:
 *
 *   newState = events.reduce(evolve, initialState)
 *
 * Pure and immutable; the input state is never touched.
 */

import type { TicketEvent } from './events';
import type { Ticket, TicketState } from './types';
import { emptyTicketState } from './types';

export function evolve(state: TicketState, event: TicketEvent): TicketState {
  switch (event._type) {
    case 'TicketCreated':
      return {
        ...emptyTicketState(),
        title: event.title,
        description: event.description,
        status: 'OPEN',
        priority: event.priority,
        requesterId: event.requesterId,
        createdAt: event.occurredAt,
      };

    case 'StatusUpdated':
      return {
        ...state,
        status: event.toStatus,
        updatedAt: event.occurredAt,
        closedAt: event.toStatus === 'CLOSED' ? event.occurredAt : state.closedAt,
      };

    case 'TicketAssigned':
      return {
        ...state,
        assigneeId: event.newAssigneeId,
        updatedAt: event.occurredAt,
      };

    case 'CommentAdded':
      // Comments live in their own table; the ticket row is unchanged.
      return state;
  }
}

export function evolveAll(state: TicketState, events: readonly TicketEvent[]): TicketState {
  return events.reduce(evolve, state);
}

/**
 * Narrow a state back to a persisted Ticket. Returns null for states the
 * store has not yet assigned an id to.
 */
export function toTicket(state: TicketState): Ticket | null {
  if (state.id === null || state.requesterId === null || state.createdAt === null) {
    return null;
  }
  return {
    id: state.id,
    title: state.title,
    description: state.description,
    status: state.status,
    priority: state.priority,
    requesterId: state.requesterId,
    assigneeId: state.assigneeId,
    createdAt: state.createdAt,
    updatedAt: state.updatedAt,
    closedAt: state.closedAt,
  };
}
