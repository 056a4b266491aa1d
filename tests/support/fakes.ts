import type { LoggedEvent, UserId } from '@domain/tickets';
import type { EventBroadcaster } from '@/services/outboxService';
import type { Authorizer, Permission } from '@/services/authorizationService';
import type { NotificationParams, Notifier } from '@/services/notificationService';
import type { Logger } from '@/lib/logger';
import { toUserId } from '@domain/tickets';

export const AGENT_ID = toUserId('aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa');
export const CUSTOMER_ID = toUserId('cccccccc-cccc-4ccc-8ccc-cccccccccccc');
export const OTHER_CUSTOMER_ID = toUserId('dddddddd-dddd-4ddd-8ddd-dddddddddddd');

export const AGENT_PERMISSIONS: readonly Permission[] = [
  'tickets:create',
  'tickets:read',
  'tickets:read:all',
  'tickets:update:status',
  'tickets:assign',
  'comments:create',
  'comments:read',
];

export const CUSTOMER_PERMISSIONS: readonly Permission[] = [
  'tickets:create',
  'tickets:read',
  'comments:create',
  'comments:read',
];

/** Grants from a fixed table; unknown users hold nothing. */
export class StaticAuthorizer implements Authorizer {
  private readonly grants: Map<UserId, readonly Permission[]>;

  constructor(grants: Array<[UserId, readonly Permission[]]> = [
    [AGENT_ID, AGENT_PERMISSIONS],
    [CUSTOMER_ID, CUSTOMER_PERMISSIONS],
    [OTHER_CUSTOMER_ID, CUSTOMER_PERMISSIONS],
  ]) {
    this.grants = new Map(grants);
  }

  async can(actorId: UserId, permission: Permission): Promise<boolean> {
    return this.grants.get(actorId)?.includes(permission) ?? false;
  }
}

export class RecordingBroadcaster implements EventBroadcaster {
  readonly events: LoggedEvent[] = [];
  accept = true;

  broadcast(event: LoggedEvent): boolean {
    if (!this.accept) return false;
    this.events.push(event);
    return true;
  }
}

export class RecordingNotifier implements Notifier {
  readonly sent: NotificationParams[] = [];
  failWith: Error | null = null;

  async notify(params: NotificationParams): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push(params);
  }
}

export interface LogLine {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
}

/** Logger whose children all append to one shared list. */
export function createRecordingLogger(lines: LogLine[] = []): Logger & { lines: LogLine[] } {
  const logger: Logger = {
    debug: (message) => lines.push({ level: 'debug', message }),
    info: (message) => lines.push({ level: 'info', message }),
    warn: (message) => lines.push({ level: 'warn', message }),
    error: (message) => lines.push({ level: 'error', message }),
    child: () => logger,
  };
  return { ...logger, lines };
}
