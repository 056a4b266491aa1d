import { asc, eq } from 'drizzle-orm';
import { ticketComments, type DbExecutor } from '@/lib/db';
import { toCommentId, toTicketId, toUserId, type TicketComment, type TicketId } from '@domain/tickets';
import type { CommentRepository, NewComment } from '@/repositories/types';

function toComment(row: typeof ticketComments.$inferSelect): TicketComment {
  return {
    id: toCommentId(row.id),
    ticketId: toTicketId(row.ticketId),
    authorId: toUserId(row.authorId),
    body: row.body,
    createdAt: row.createdAt.toISOString(),
  };
}

export class DrizzleCommentRepository implements CommentRepository {
  constructor(private readonly db: DbExecutor) {}

  async create(comment: NewComment): Promise<TicketComment> {
    const [row] = await this.db.insert(ticketComments).values({
      ticketId: comment.ticketId,
      authorId: comment.authorId,
      body: comment.body,
      createdAt: new Date(comment.createdAt),
    }).returning();

    return toComment(row);
  }

  async listByTicket(ticketId: TicketId): Promise<TicketComment[]> {
    const rows = await this.db.select().from(ticketComments)
      .where(eq(ticketComments.ticketId, ticketId))
      .orderBy(asc(ticketComments.createdAt), asc(ticketComments.id));
    return rows.map(toComment);
  }
}
