import { toTicketSnapshot, toUserId, type LoggedEvent, type NewLoggedEvent, type Ticket } from '@domain/tickets';
import { AppError } from '@/lib/app-error';
import { OutboxCoordinator, type EventBroadcaster } from '@/services/outboxService';
import type { NewTicket, RepositoryScope } from '@/repositories/types';
import { InMemoryStore } from '../../support/inMemoryStore';
import { RecordingBroadcaster } from '../../support/fakes';

const ACTOR = toUserId('aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa');

const draft: NewTicket = {
  title: 'Printer down',
  description: '',
  status: 'OPEN',
  priority: 'HIGH',
  requesterId: ACTOR,
  assigneeId: null,
  createdAt: '2024-01-15T10:00:00.000Z',
  updatedAt: null,
  closedAt: null,
};

const persistDraft = (scope: RepositoryScope): Promise<Ticket> => scope.tickets.create(draft);

const describeCreated = (ticket: Ticket): NewLoggedEvent => ({
  ticketId: ticket.id,
  type: 'TICKET_CREATED',
  payload: toTicketSnapshot(ticket),
  actorId: ACTOR,
});

describe('OutboxCoordinator', () => {
  let store: InMemoryStore;
  let broadcaster: RecordingBroadcaster;
  let outbox: OutboxCoordinator;

  beforeEach(() => {
    store = new InMemoryStore();
    broadcaster = new RecordingBroadcaster();
    outbox = new OutboxCoordinator(store, broadcaster);
  });

  describe('record', () => {
    it('commits the row and its event together, then broadcasts the committed event', async () => {
      const { result, event } = await outbox.record({ persist: persistDraft, describe: describeCreated });

      expect(result.id).toBe(1);
      expect(event).toEqual({
        id: 1,
        ticketId: 1,
        type: 'TICKET_CREATED',
        payload: toTicketSnapshot(result),
        actorId: ACTOR,
        createdAt: '2024-01-15T10:00:00.000Z',
      });
      expect(store.allEvents()).toEqual([event]);
      expect(broadcaster.events).toEqual([event]);
      expect(store.commits).toBe(1);
    });

    it('broadcasts only after the commit is visible', async () => {
      const seenAtBroadcast: LoggedEvent[][] = [];
      const observer: EventBroadcaster = {
        broadcast: () => {
          seenAtBroadcast.push(store.allEvents());
          return true;
        },
      };
      outbox = new OutboxCoordinator(store, observer);

      const { event } = await outbox.record({ persist: persistDraft, describe: describeCreated });

      expect(seenAtBroadcast).toEqual([[event]]);
    });

    it('rolls back the row when the event append fails and reports a transient error', async () => {
      store.failNextAppend(new Error('connection reset'));

      const attempt = outbox.record({ persist: persistDraft, describe: describeCreated });

      await expect(attempt).rejects.toMatchObject({
        code: 'TRANSIENT_INFRA',
        statusCode: 503,
        message: 'Could not commit the change, please retry',
      });
      expect(store.ticket(1)).toBeUndefined();
      expect(store.allEvents()).toEqual([]);
      expect(broadcaster.events).toEqual([]);
      expect(store.rollbacks).toBe(1);
    });

    it('passes application errors through unchanged and broadcasts nothing', async () => {
      const denied = AppError.forbidden('nope');

      await expect(
        outbox.record({
          persist: async () => {
            throw denied;
          },
          describe: () => {
            throw new Error('describe must not run');
          },
        })
      ).rejects.toBe(denied);
      expect(broadcaster.events).toEqual([]);
    });

    it('keeps the committed event when the broadcaster drops it', async () => {
      broadcaster.accept = false;

      const { event } = await outbox.record({ persist: persistDraft, describe: describeCreated });

      expect(store.allEvents()).toEqual([event]);
    });

    it('does not fail the mutation when the broadcaster throws', async () => {
      outbox = new OutboxCoordinator(store, {
        broadcast: () => {
          throw new Error('hub exploded');
        },
      });

      const { event } = await outbox.record({ persist: persistDraft, describe: describeCreated });

      expect(event.id).toBe(1);
      expect(store.allEvents()).toHaveLength(1);
    });
  });
});
