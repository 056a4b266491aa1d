/**
 * Subscription hub: in-process router from committed ticket events to the
 * sessions watching that ticket.
 *
 * Registry updates run synchronously on the event loop, so they never
 * interleave with each other or with a delivery pass. Delivery itself runs
 * in one async loop fed by a bounded dispatch queue.
 */

import type { LoggedEvent, TicketId, UserId } from '@domain/tickets';
import { logger as rootLogger, toError, type Logger } from '@/lib/logger';
import type { EventBroadcaster } from '@/services/outboxService';
import { BoundedQueue } from '@/realtime/boundedQueue';
import { toEventMessage, type ServerMessage } from '@/realtime/messages';
import type { SessionControl } from '@/realtime/clientSession';

/** What the hub needs from a session. */
export interface HubMember {
  readonly id: number;
  readonly userId: UserId;
  /** Non-blocking; false when the outbound queue is full or closed. */
  enqueue(message: ServerMessage): boolean;
  /** Returns true only the first time. */
  closeOutbound(): boolean;
  addSubscription(ticketId: TicketId): void;
  removeSubscription(ticketId: TicketId): void;
  subscribedTickets(): TicketId[];
}

export interface SubscriptionHubOptions {
  dispatchQueueSize: number;
  logger?: Logger;
}

export class SubscriptionHub implements EventBroadcaster {
  private readonly members = new Set<HubMember>();
  private readonly usersToSessions = new Map<UserId, Set<HubMember>>();
  private readonly roomsToSessions = new Map<TicketId, Set<HubMember>>();
  private readonly dispatchQueue: BoundedQueue<LoggedEvent>;
  private readonly log: Logger;
  private dispatchLoop: Promise<void> | null = null;

  constructor(options: SubscriptionHubOptions) {
    this.dispatchQueue = new BoundedQueue<LoggedEvent>(options.dispatchQueueSize);
    this.log = (options.logger ?? rootLogger).child({ component: 'subscription_hub' });
  }

  // --- Lifecycle ---

  start(): void {
    if (this.dispatchLoop) return;
    this.dispatchLoop = this.runDispatch();
    this.log.info('Hub started');
  }

  /**
   * Stop accepting events, let the loop deliver what is already queued,
   * then unregister every session.
   */
  async stop(): Promise<void> {
    this.dispatchQueue.close();
    if (this.dispatchLoop) {
      await this.dispatchLoop;
    }
    for (const member of [...this.members]) {
      this.unregister(member);
    }
    this.log.info('Hub stopped');
  }

  // --- Registration ---

  register(member: HubMember): SessionControl {
    if (!this.members.has(member)) {
      this.members.add(member);

      let userSessions = this.usersToSessions.get(member.userId);
      if (!userSessions) {
        userSessions = new Set();
        this.usersToSessions.set(member.userId, userSessions);
      }
      userSessions.add(member);

      this.log.info('Client registered', {
        sessionId: member.id,
        userId: member.userId,
        userConnections: userSessions.size,
        totalConnections: this.members.size,
      });
    }
    return this.controlFor(member);
  }

  /**
   * Remove a session from every room and from the user index, and close
   * its outbound queue. Returns false when it was not registered.
   */
  unregister(member: HubMember): boolean {
    if (!this.members.delete(member)) return false;

    for (const ticketId of member.subscribedTickets()) {
      this.leaveRoom(member, ticketId);
    }

    const userSessions = this.usersToSessions.get(member.userId);
    if (userSessions) {
      userSessions.delete(member);
      if (userSessions.size === 0) {
        this.usersToSessions.delete(member.userId);
      }
    }

    member.closeOutbound();

    this.log.info('Client unregistered', {
      sessionId: member.id,
      userId: member.userId,
      totalConnections: this.members.size,
    });
    return true;
  }

  // --- Rooms ---

  subscribe(member: HubMember, ticketId: TicketId): void {
    if (!this.members.has(member)) return;

    let room = this.roomsToSessions.get(ticketId);
    if (!room) {
      room = new Set();
      this.roomsToSessions.set(ticketId, room);
    }
    room.add(member);
    member.addSubscription(ticketId);

    this.log.debug('Subscribed to ticket', { sessionId: member.id, ticketId, roomSize: room.size });
  }

  unsubscribe(member: HubMember, ticketId: TicketId): void {
    if (!this.members.has(member)) return;
    this.leaveRoom(member, ticketId);
    this.log.debug('Unsubscribed from ticket', { sessionId: member.id, ticketId });
  }

  private leaveRoom(member: HubMember, ticketId: TicketId): void {
    member.removeSubscription(ticketId);
    const room = this.roomsToSessions.get(ticketId);
    if (!room) return;
    room.delete(member);
    if (room.size === 0) {
      this.roomsToSessions.delete(ticketId);
    }
  }

  controlFor(member: HubMember): SessionControl {
    return {
      subscribe: (ticketId) => this.subscribe(member, ticketId),
      unsubscribe: (ticketId) => this.unsubscribe(member, ticketId),
      leave: () => {
        this.unregister(member);
      },
    };
  }

  // --- Delivery ---

  broadcast(event: LoggedEvent): boolean {
    if (this.dispatchQueue.offer(event)) return true;

    if (this.dispatchQueue.isClosed) {
      this.log.warn('Hub stopped, dropping event', { eventId: event.id, ticketId: event.ticketId });
      return false;
    }
    this.log.warn('Dispatch queue full, dropping event', {
      eventId: event.id,
      ticketId: event.ticketId,
      type: event.type,
      queueSize: this.dispatchQueue.size,
    });
    return false;
  }

  /**
   * Best-effort direct message to every session of one user. Full queues
   * are skipped, not evicted. Returns how many sessions took it.
   */
  sendToUser(userId: UserId, message: ServerMessage): number {
    const userSessions = this.usersToSessions.get(userId);
    if (!userSessions) return 0;

    let delivered = 0;
    for (const member of userSessions) {
      if (member.enqueue(message)) delivered++;
    }
    return delivered;
  }

  private async runDispatch(): Promise<void> {
    for await (const event of this.dispatchQueue) {
      try {
        this.deliver(event);
      } catch (error) {
        this.log.error('Delivery pass failed', toError(error), { eventId: event.id });
      }
    }
  }

  private deliver(event: LoggedEvent): void {
    const room = this.roomsToSessions.get(event.ticketId);
    if (!room) return;

    const message = toEventMessage(event);
    // Evictions below mutate the room
    for (const member of [...room]) {
      if (!member.enqueue(message)) {
        this.log.warn('Evicting slow consumer', {
          sessionId: member.id,
          userId: member.userId,
          ticketId: event.ticketId,
        });
        this.unregister(member);
      }
    }
  }

  // --- Introspection ---

  clientCount(): number {
    return this.members.size;
  }

  roomCount(): number {
    return this.roomsToSessions.size;
  }

  roomMembership(ticketId: TicketId): number {
    return this.roomsToSessions.get(ticketId)?.size ?? 0;
  }

  isUserConnected(userId: UserId): boolean {
    return this.usersToSessions.has(userId);
  }
}
