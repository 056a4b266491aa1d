import { toTicketId } from '@domain/tickets';
import { createFixedClock } from '@domain/shared/clock';
import { OutboxCoordinator } from '@/services/outboxService';
import { BackgroundNotifications } from '@/services/notificationService';
import { TicketService } from '@/services/TicketService';
import { CommentService } from '@/services/CommentService';
import { EventService } from '@/services/eventService';
import { InMemoryStore } from '../../support/inMemoryStore';
import {
  AGENT_ID,
  CUSTOMER_ID,
  OTHER_CUSTOMER_ID,
  RecordingBroadcaster,
  RecordingNotifier,
  StaticAuthorizer,
} from '../../support/fakes';

describe('EventService', () => {
  let store: InMemoryStore;
  let tickets: TicketService;
  let comments: CommentService;
  let events: EventService;

  beforeEach(() => {
    store = new InMemoryStore();
    const outbox = new OutboxCoordinator(store, new RecordingBroadcaster());
    const authorizer = new StaticAuthorizer();
    const clock = createFixedClock('2024-01-15T10:00:00.000Z');
    const notifications = new BackgroundNotifications(new RecordingNotifier());
    tickets = new TicketService({ outbox, authorizer, notifications, clock });
    comments = new CommentService({ outbox, authorizer, notifications, clock });
    events = new EventService(store.repositories.events, tickets);
  });

  /** Ticket 1 with five events, interleaved with ticket 2's. */
  const seedTwoTickets = async (): Promise<void> => {
    const first = await tickets.createTicket(CUSTOMER_ID, { title: 'Printer down' });
    const second = await tickets.createTicket(OTHER_CUSTOMER_ID, { title: 'VPN flaky' });
    await comments.addComment(AGENT_ID, first.id, 'Looking');
    await comments.addComment(AGENT_ID, second.id, 'Looking too');
    await tickets.assignTicket(AGENT_ID, first.id, AGENT_ID);
    await tickets.updateStatus(AGENT_ID, first.id, 'IN_PROGRESS');
    await comments.addComment(CUSTOMER_ID, first.id, 'Thanks');
  };

  it('returns one ticket events in ascending id order', async () => {
    await seedTwoTickets();

    const page = await events.listTicketEvents({ ticketId: toTicketId(1), viewerId: CUSTOMER_ID });

    expect(page.events.map((event) => event.id)).toEqual([1, 3, 5, 6, 7]);
    expect(page.events.map((event) => event.type)).toEqual([
      'TICKET_CREATED',
      'COMMENT_ADDED',
      'TICKET_ASSIGNED',
      'STATUS_UPDATED',
      'COMMENT_ADDED',
    ]);
    expect(page.nextCursor).toBe(7);
  });

  it('pages with the cursor without overlap or gaps', async () => {
    await seedTwoTickets();
    const ticketId = toTicketId(1);

    const first = await events.listTicketEvents({ ticketId, viewerId: AGENT_ID, limit: 2 });
    const second = await events.listTicketEvents({
      ticketId,
      viewerId: AGENT_ID,
      afterId: first.nextCursor,
      limit: 2,
    });
    const third = await events.listTicketEvents({
      ticketId,
      viewerId: AGENT_ID,
      afterId: second.nextCursor,
      limit: 2,
    });
    const done = await events.listTicketEvents({
      ticketId,
      viewerId: AGENT_ID,
      afterId: third.nextCursor,
      limit: 2,
    });

    expect(first.events.map((event) => event.id)).toEqual([1, 3]);
    expect(second.events.map((event) => event.id)).toEqual([5, 6]);
    expect(third.events.map((event) => event.id)).toEqual([7]);
    expect(done).toEqual({ events: [] });
  });

  it('picks up events committed after the previous read', async () => {
    const ticket = await tickets.createTicket(CUSTOMER_ID, { title: 'Printer down' });
    const before = await events.listTicketEvents({ ticketId: ticket.id, viewerId: CUSTOMER_ID });

    await comments.addComment(AGENT_ID, ticket.id, 'On my way');
    const after = await events.listTicketEvents({
      ticketId: ticket.id,
      viewerId: CUSTOMER_ID,
      afterId: before.nextCursor,
    });

    expect(after.events.map((event) => event.type)).toEqual(['COMMENT_ADDED']);
  });

  it('clamps the limit to 200', async () => {
    const listByTicket = jest.spyOn(store.repositories.events, 'listByTicket');
    const ticket = await tickets.createTicket(CUSTOMER_ID, { title: 'Printer down' });

    await events.listTicketEvents({ ticketId: ticket.id, viewerId: CUSTOMER_ID, limit: 5000 });

    expect(listByTicket).toHaveBeenCalledWith(ticket.id, 0, 200);
  });

  it('defaults to 50 events after id 0', async () => {
    const listByTicket = jest.spyOn(store.repositories.events, 'listByTicket');
    const ticket = await tickets.createTicket(CUSTOMER_ID, { title: 'Printer down' });

    await events.listTicketEvents({ ticketId: ticket.id, viewerId: CUSTOMER_ID });

    expect(listByTicket).toHaveBeenCalledWith(ticket.id, 0, 50);
  });

  it('rejects a negative cursor and a zero limit', async () => {
    const ticket = await tickets.createTicket(CUSTOMER_ID, { title: 'Printer down' });

    await expect(
      events.listTicketEvents({ ticketId: ticket.id, viewerId: CUSTOMER_ID, afterId: -1, limit: 0 })
    ).rejects.toMatchObject({
      code: 'VALIDATION_FAILED',
      details: {
        fields: {
          afterId: ['Number must be greater than or equal to 0'],
          limit: ['Number must be greater than or equal to 1'],
        },
      },
    });
  });

  it('applies the ticket visibility rule', async () => {
    const ticket = await tickets.createTicket(CUSTOMER_ID, { title: 'Printer down' });

    await expect(
      events.listTicketEvents({ ticketId: ticket.id, viewerId: OTHER_CUSTOMER_ID })
    ).rejects.toMatchObject({ code: 'FORBIDDEN' });
  });
});
