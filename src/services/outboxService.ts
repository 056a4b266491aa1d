import type { LoggedEvent, NewLoggedEvent } from '@domain/tickets';
import type { RepositoryScope, TransactionRunner } from '@/repositories/types';
import { AppError, isAppError } from '@/lib/app-error';
import { logger as rootLogger, toError, type Logger } from '@/lib/logger';

/**
 * Receives committed events for live delivery. Must not block: returns false
 * when the event was dropped instead of queued.
 */
export interface EventBroadcaster {
  broadcast(event: LoggedEvent): boolean;
}

export interface OutboxWrite<T> {
  /** Step 1: persist the ticket or comment row. */
  persist(scope: RepositoryScope): Promise<T>;
  /** Step 2: build the immutable event (snapshot payload) for what was persisted. */
  describe(persisted: T): NewLoggedEvent;
}

export interface CommittedWrite<T> {
  result: T;
  event: LoggedEvent;
}

/**
 * Outbox coordinator: commits a mutation together with its event row, then
 * hands the event to the broadcaster strictly after commit.
 *
 * A committed event stays in the log even if its broadcast is dropped; a
 * rolled-back one is never broadcast.
 */
export class OutboxCoordinator {
  private readonly log: Logger;

  constructor(
    private readonly runner: TransactionRunner,
    private readonly broadcaster: EventBroadcaster,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: 'outbox' });
  }

  get repositories(): RepositoryScope {
    return this.runner.repositories;
  }

  /**
   * Run `fn` in one transaction. AppErrors raised by `fn` pass through;
   * anything else is an infrastructure failure and becomes TRANSIENT_INFRA.
   * Nothing is retried here.
   */
  async withTransaction<T>(fn: (scope: RepositoryScope) => Promise<T>): Promise<T> {
    try {
      return await this.runner.run(fn);
    } catch (error) {
      if (isAppError(error)) throw error;
      this.log.error('Transaction rolled back', toError(error));
      throw AppError.transient('Could not commit the change, please retry', error);
    }
  }

  /**
   * Persist, snapshot and append in one transaction, then broadcast.
   * Callers see a single failure whichever step failed.
   */
  async record<T>(write: OutboxWrite<T>): Promise<CommittedWrite<T>> {
    const committed = await this.withTransaction(async (scope) => {
      const result = await write.persist(scope);
      const event = await scope.events.append(write.describe(result));
      return { result, event };
    });

    this.publish(committed.event);
    return committed;
  }

  private publish(event: LoggedEvent): void {
    try {
      const queued = this.broadcaster.broadcast(event);
      if (!queued) {
        this.log.debug('Committed event not queued for live delivery', {
          eventId: event.id,
          ticketId: event.ticketId,
        });
      }
    } catch (error) {
      // The commit already happened; delivery failures stop here.
      this.log.error('Broadcast failed after commit', toError(error), {
        eventId: event.id,
        ticketId: event.ticketId,
      });
    }
  }
}
