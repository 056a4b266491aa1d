import { eq } from 'drizzle-orm';
import { users, type DbExecutor } from '@/lib/db';
import { logger as rootLogger, toError, type Logger } from '@/lib/logger';
import type { TicketId, UserId } from '@domain/tickets';

export interface NotificationParams {
  recipientUserId: UserId;
  subject: string;
  message: string;
  ticketId: TicketId;
}

/** Out-of-band messages (email today). Best-effort only. */
export interface Notifier {
  notify(params: NotificationParams): Promise<void>;
}

/**
 * Writes the would-be email to the log instead of sending it. Stands in
 * until a mail provider is wired up.
 */
export class LogNotifier implements Notifier {
  private readonly log: Logger;

  constructor(private readonly db: DbExecutor, log: Logger = rootLogger) {
    this.log = log.child({ component: 'notifier' });
  }

  async notify(params: NotificationParams): Promise<void> {
    const recipient = await this.db.query.users.findFirst({
      where: eq(users.id, params.recipientUserId),
      columns: { email: true, fullName: true },
    });

    if (!recipient) {
      throw new Error(`Notification recipient ${params.recipientUserId} not found`);
    }

    this.log.info('Email notification', {
      to: `${recipient.fullName} <${recipient.email}>`,
      subject: params.subject,
      body: params.message,
      ticketId: params.ticketId,
    });
  }
}

/**
 * Fire-and-forget delivery. Failures are logged and never reach the caller;
 * drain() waits for whatever is still in flight during shutdown.
 */
export class BackgroundNotifications {
  private readonly pending = new Set<Promise<void>>();
  private readonly log: Logger;

  constructor(private readonly notifier: Notifier, log: Logger = rootLogger) {
    this.log = log.child({ component: 'notifications' });
  }

  send(params: NotificationParams): void {
    const delivery = this.notifier.notify(params).catch((error: unknown) => {
      this.log.warn('Notification failed', {
        ticketId: params.ticketId,
        recipientUserId: params.recipientUserId,
        error: toError(error).message,
      });
    });
    this.pending.add(delivery);
    void delivery.finally(() => this.pending.delete(delivery));
  }

  get inFlight(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}
