import type { TicketId, UserId } from '@domain/tickets';
import { isAppError } from '@/lib/app-error';
import type { TicketService } from '@/services/TicketService';
import type { SubscriptionGuard } from '@/realtime/clientSession';

/**
 * A user may watch a ticket they may read. Denials and missing tickets are
 * a plain "no"; anything else propagates.
 */
export class TicketAccessGuard implements SubscriptionGuard {
  constructor(private readonly tickets: Pick<TicketService, 'getTicket'>) {}

  async canSubscribe(userId: UserId, ticketId: TicketId): Promise<boolean> {
    try {
      await this.tickets.getTicket(userId, ticketId);
      return true;
    } catch (error) {
      if (isAppError(error) && (error.code === 'FORBIDDEN' || error.code === 'NOT_FOUND')) {
        return false;
      }
      throw error;
    }
  }
}
