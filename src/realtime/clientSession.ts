import { isErr } from '@domain/shared/result';
import type { TicketId, UserId } from '@domain/tickets';
import { logger as rootLogger, toError, type Logger } from '@/lib/logger';
import { BoundedQueue } from '@/realtime/boundedQueue';
import { encodeServerMessage, parseClientMessage, PONG, type ServerMessage } from '@/realtime/messages';
import { CLOSE_MESSAGE_TOO_BIG, CLOSE_NORMAL, type SessionTransport } from '@/realtime/transport';
import type { HubMember } from '@/realtime/hub';

/**
 * What a session may ask of the hub on its own behalf. Handed out at
 * registration; a session never sees the registries.
 */
export interface SessionControl {
  subscribe(ticketId: TicketId): void;
  unsubscribe(ticketId: TicketId): void;
  /** Unregister this session. Safe to call more than once. */
  leave(): void;
}

export interface SubscriptionGuard {
  canSubscribe(userId: UserId, ticketId: TicketId): Promise<boolean>;
}

export interface ClientSessionOptions {
  userId: UserId;
  transport: SessionTransport;
  guard: SubscriptionGuard;
  queueSize: number;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  /** Must be shorter than readTimeoutMs */
  pingIntervalMs: number;
  maxMessageBytes: number;
  logger?: Logger;
}

class WriteTimeoutError extends Error {
  constructor(ms: number) {
    super(`Write did not complete within ${ms}ms`);
    this.name = 'WriteTimeoutError';
  }
}

function withDeadline<T>(work: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new WriteTimeoutError(ms)), ms);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

let nextSessionId = 1;

/**
 * One live connection. The inbound side reacts to frames under a rolling
 * read deadline; the outbound side is a single async loop draining the
 * bounded queue to the socket under a write deadline.
 */
export class ClientSession implements HubMember {
  readonly id: number;
  readonly userId: UserId;

  private readonly transport: SessionTransport;
  private readonly guard: SubscriptionGuard;
  private readonly outbound: BoundedQueue<ServerMessage>;
  private readonly subscriptions = new Set<TicketId>();
  private readonly options: ClientSessionOptions;
  private readonly log: Logger;

  private control: SessionControl | null = null;
  private readTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private outboundLoop: Promise<void> = Promise.resolve();
  /** Room changes apply in arrival order, each after the previous settles. */
  private roomChanges: Promise<void> = Promise.resolve();
  private disconnected = false;
  private closeSent = false;

  constructor(options: ClientSessionOptions) {
    this.id = nextSessionId++;
    this.userId = options.userId;
    this.transport = options.transport;
    this.guard = options.guard;
    this.options = options;
    this.outbound = new BoundedQueue<ServerMessage>(options.queueSize);
    this.log = (options.logger ?? rootLogger).child({
      component: 'client_session',
      sessionId: this.id,
      userId: options.userId,
    });
  }

  // --- Hub-facing ---

  enqueue(message: ServerMessage): boolean {
    return this.outbound.offer(message);
  }

  closeOutbound(): boolean {
    return this.outbound.close();
  }

  addSubscription(ticketId: TicketId): void {
    this.subscriptions.add(ticketId);
  }

  removeSubscription(ticketId: TicketId): void {
    this.subscriptions.delete(ticketId);
  }

  subscribedTickets(): TicketId[] {
    return [...this.subscriptions];
  }

  hasSubscription(ticketId: TicketId): boolean {
    return this.subscriptions.has(ticketId);
  }

  get isDisconnected(): boolean {
    return this.disconnected;
  }

  // --- Lifecycle ---

  start(control: SessionControl): void {
    if (this.control) {
      throw new Error(`Session ${this.id} already started`);
    }
    this.control = control;

    this.transport.onMessage((data, byteLength) => this.handleFrame(data, byteLength));
    this.transport.onPong(() => this.refreshReadDeadline());
    this.transport.onClose((code) => {
      this.log.debug('Peer closed connection', { code });
      this.disconnect('closed');
    });
    this.transport.onError((error) => {
      this.log.warn('Socket error', { error: error.message });
      this.disconnect('socket error');
    });

    this.refreshReadDeadline();
    this.pingTimer = setInterval(() => this.sendPing(), this.options.pingIntervalMs);
    this.outboundLoop = this.runOutbound();
  }

  /** Resolves once the outbound loop has exited. */
  whenClosed(): Promise<void> {
    return this.outboundLoop;
  }

  // --- Inbound ---

  private handleFrame(data: string, byteLength: number): void {
    if (this.disconnected) return;

    if (byteLength > this.options.maxMessageBytes) {
      this.log.warn('Frame exceeds size limit', { byteLength, limit: this.options.maxMessageBytes });
      this.closeTransport(CLOSE_MESSAGE_TOO_BIG, 'Message too big');
      this.disconnect('oversize frame');
      return;
    }

    this.refreshReadDeadline();

    const parsed = parseClientMessage(data);
    if (isErr(parsed)) {
      this.log.warn('Ignoring malformed message', { reason: parsed.error });
      return;
    }

    const message = parsed.value;
    switch (message.type) {
      case 'SUBSCRIBE_TO_TICKET': {
        const { ticketId } = message;
        this.queueRoomChange(() => this.applySubscription(ticketId));
        break;
      }
      case 'UNSUBSCRIBE_FROM_TICKET': {
        const { ticketId } = message;
        this.queueRoomChange(async () => {
          if (this.disconnected) return;
          this.control?.unsubscribe(ticketId);
        });
        break;
      }
      case 'PING':
        if (!this.outbound.offer(PONG)) {
          this.log.debug('Pong skipped, outbound queue full');
        }
        break;
    }
  }

  private queueRoomChange(change: () => Promise<void>): void {
    this.roomChanges = this.roomChanges.then(change).catch((error: unknown) => {
      this.log.error('Room change failed', toError(error));
    });
  }

  private async applySubscription(ticketId: TicketId): Promise<void> {
    let allowed: boolean;
    try {
      allowed = await this.guard.canSubscribe(this.userId, ticketId);
    } catch (error) {
      this.log.error('Subscription check failed', toError(error), { ticketId });
      return;
    }
    if (this.disconnected) return;
    if (!allowed) {
      this.log.warn('Subscription denied', { ticketId });
      return;
    }
    this.control?.subscribe(ticketId);
  }

  private refreshReadDeadline(): void {
    if (this.readTimer) clearTimeout(this.readTimer);
    this.readTimer = setTimeout(() => {
      this.log.info('Read deadline exceeded');
      this.terminateTransport();
      this.disconnect('read timeout');
    }, this.options.readTimeoutMs);
  }

  // --- Outbound ---

  private sendPing(): void {
    try {
      this.transport.ping();
    } catch (error) {
      this.log.debug('Ping failed', { error: toError(error).message });
      this.terminateTransport();
      this.disconnect('ping failed');
    }
  }

  private async runOutbound(): Promise<void> {
    try {
      for await (const message of this.outbound) {
        try {
          await withDeadline(this.transport.send(encodeServerMessage(message)), this.options.writeTimeoutMs);
        } catch (error) {
          this.log.warn('Write failed', { error: toError(error).message });
          this.terminateTransport();
          this.disconnect('write failed');
          return;
        }
      }
      // Queue closed by the hub: say goodbye properly
      this.closeTransport(CLOSE_NORMAL, '');
    } finally {
      this.stopTimers();
      this.disconnected = true;
    }
  }

  // --- Teardown ---

  /**
   * First disconnect signal wins; later ones are no-ops. Leaving the hub
   * closes the outbound queue, which ends the outbound loop.
   */
  private disconnect(reason: string): void {
    if (this.disconnected) return;
    this.disconnected = true;
    this.stopTimers();
    this.log.info('Session disconnected', { reason });
    this.control?.leave();
    // Not registered (or already evicted): make sure the loop still ends
    this.outbound.close();
  }

  private stopTimers(): void {
    if (this.readTimer) {
      clearTimeout(this.readTimer);
      this.readTimer = null;
    }
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private closeTransport(code: number, reason: string): void {
    if (this.closeSent) return;
    this.closeSent = true;
    this.transport.close(code, reason);
  }

  private terminateTransport(): void {
    if (this.closeSent) return;
    this.closeSent = true;
    this.transport.terminate();
  }
}
