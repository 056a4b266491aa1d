import { eq } from 'drizzle-orm';
import { users, userRoleEnum, type DbExecutor } from '@/lib/db';
import { AppError } from '@/lib/app-error';
import type { Ticket, UserId } from '@domain/tickets';

export const PERMISSIONS = [
  'tickets:create',
  'tickets:read',
  'tickets:read:all',
  'tickets:update:status',
  'tickets:assign',
  'comments:create',
  'comments:read',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

export type UserRole = (typeof userRoleEnum.enumValues)[number];

/** Capability check consumed by every mutation and read path. */
export interface Authorizer {
  can(actorId: UserId, permission: Permission): Promise<boolean>;
}

export const ROLE_PERMISSIONS: Record<UserRole, readonly Permission[]> = {
  admin: PERMISSIONS,
  agent: PERMISSIONS,
  customer: ['tickets:create', 'tickets:read', 'comments:create', 'comments:read'],
};

/**
 * Resolves the actor's role from the users table and checks the static
 * role grant. Unknown users hold no permissions.
 */
export class RoleAuthorizer implements Authorizer {
  constructor(private readonly db: DbExecutor) {}

  async can(actorId: UserId, permission: Permission): Promise<boolean> {
    const user = await this.db.query.users.findFirst({
      where: eq(users.id, actorId),
      columns: { role: true },
    });
    if (!user) return false;
    return ROLE_PERMISSIONS[user.role].includes(permission);
  }
}

export async function requirePermission(
  authorizer: Authorizer,
  actorId: UserId,
  permission: Permission
): Promise<void> {
  if (!(await authorizer.can(actorId, permission))) {
    throw AppError.forbidden(`Missing permission ${permission}`);
  }
}

/**
 * A viewer sees a ticket they requested or are assigned to; anyone else
 * needs tickets:read:all.
 */
export async function canViewTicket(
  authorizer: Authorizer,
  ticket: Ticket,
  viewerId: UserId
): Promise<boolean> {
  if (!(await authorizer.can(viewerId, 'tickets:read'))) {
    return false;
  }
  if (ticket.requesterId === viewerId || ticket.assigneeId === viewerId) {
    return true;
  }
  return authorizer.can(viewerId, 'tickets:read:all');
}
