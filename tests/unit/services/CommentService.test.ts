import { toTicketId } from '@domain/tickets';
import { createFixedClock } from '@domain/shared/clock';
import { OutboxCoordinator } from '@/services/outboxService';
import { CommentService } from '@/services/CommentService';
import { BackgroundNotifications } from '@/services/notificationService';
import { InMemoryStore } from '../../support/inMemoryStore';
import {
  AGENT_ID,
  CUSTOMER_ID,
  OTHER_CUSTOMER_ID,
  RecordingBroadcaster,
  RecordingNotifier,
  StaticAuthorizer,
} from '../../support/fakes';

const NOW = '2024-01-15T12:30:00.000Z';

describe('CommentService', () => {
  let store: InMemoryStore;
  let broadcaster: RecordingBroadcaster;
  let notifier: RecordingNotifier;
  let notifications: BackgroundNotifications;
  let service: CommentService;

  beforeEach(() => {
    store = new InMemoryStore();
    broadcaster = new RecordingBroadcaster();
    notifier = new RecordingNotifier();
    notifications = new BackgroundNotifications(notifier);
    service = new CommentService({
      outbox: new OutboxCoordinator(store, broadcaster),
      authorizer: new StaticAuthorizer(),
      notifications,
      clock: createFixedClock(NOW),
    });
    store.seedTicket({
      title: 'Printer down',
      description: '',
      status: 'OPEN',
      priority: 'HIGH',
      requesterId: CUSTOMER_ID,
      assigneeId: null,
      createdAt: '2024-01-15T10:00:00.000Z',
      updatedAt: null,
      closedAt: null,
    });
  });

  const TICKET = toTicketId(1);

  describe('addComment', () => {
    it('stores the trimmed comment and records COMMENT_ADDED with it', async () => {
      const comment = await service.addComment(AGENT_ID, TICKET, '  Toner replaced  ');

      expect(comment).toEqual({
        id: 1,
        ticketId: 1,
        authorId: AGENT_ID,
        body: 'Toner replaced',
        createdAt: NOW,
      });
      expect(store.eventsFor(1)).toEqual([
        {
          id: 1,
          ticketId: 1,
          type: 'COMMENT_ADDED',
          payload: {
            id: '1',
            ticketId: 1,
            authorId: AGENT_ID,
            body: 'Toner replaced',
            createdAt: NOW,
          },
          actorId: AGENT_ID,
          createdAt: '2024-01-15T10:00:00.000Z',
        },
      ]);
      expect(broadcaster.events).toHaveLength(1);
    });

    it('lets the requester comment on their own ticket', async () => {
      await expect(service.addComment(CUSTOMER_ID, TICKET, 'Still broken')).resolves.toMatchObject({
        authorId: CUSTOMER_ID,
      });
    });

    it('refuses comments from users who cannot see the ticket', async () => {
      await expect(service.addComment(OTHER_CUSTOMER_ID, TICKET, 'me too')).rejects.toMatchObject({
        code: 'FORBIDDEN',
      });
      expect(store.allEvents()).toEqual([]);
    });

    it('rejects an empty body without writing anything', async () => {
      await expect(service.addComment(AGENT_ID, TICKET, '   ')).rejects.toMatchObject({
        code: 'VALIDATION_FAILED',
        details: { fields: { body: ['Comment body is required'] } },
      });
      expect(store.allEvents()).toEqual([]);
      expect(broadcaster.events).toEqual([]);
    });

    it('emails the requester when someone else comments', async () => {
      await service.addComment(AGENT_ID, TICKET, 'Toner replaced');
      await notifications.drain();

      expect(notifier.sent).toEqual([
        {
          recipientUserId: CUSTOMER_ID,
          subject: 'A new comment was added to your ticket: #1',
          message: "A new comment has been added to your ticket 'Printer down'.",
          ticketId: 1,
        },
      ]);
    });

    it('does not email the requester about their own comment', async () => {
      await service.addComment(CUSTOMER_ID, TICKET, 'Still broken');
      await notifications.drain();

      expect(notifier.sent).toEqual([]);
    });

    it('keeps the comment when the email fails', async () => {
      notifier.failWith = new Error('smtp down');

      await expect(service.addComment(AGENT_ID, TICKET, 'Toner replaced')).resolves.toMatchObject({
        body: 'Toner replaced',
      });
      await notifications.drain();

      expect(notifications.inFlight).toBe(0);
      expect(store.eventsFor(1)).toHaveLength(1);
    });

    it('reports a missing ticket', async () => {
      await expect(service.addComment(AGENT_ID, toTicketId(9), 'hello')).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });
  });

  describe('listComments', () => {
    it('returns the comments of a visible ticket', async () => {
      await service.addComment(AGENT_ID, TICKET, 'First');
      await service.addComment(CUSTOMER_ID, TICKET, 'Second');

      const comments = await service.listComments(CUSTOMER_ID, TICKET);
      expect(comments.map((comment) => comment.body)).toEqual(['First', 'Second']);
    });

    it('hides comments from users who cannot see the ticket', async () => {
      await expect(service.listComments(OTHER_CUSTOMER_ID, TICKET)).rejects.toMatchObject({
        code: 'FORBIDDEN',
      });
    });
  });
});
