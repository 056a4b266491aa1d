import type { Database, DbExecutor } from '@/lib/db';
import { DrizzleTicketRepository } from '@/repositories/TicketRepository';
import { DrizzleCommentRepository } from '@/repositories/CommentRepository';
import { DrizzleTicketEventRepository } from '@/repositories/TicketEventRepository';
import type { RepositoryScope, TransactionRunner } from '@/repositories/types';

export function createRepositoryScope(executor: DbExecutor): RepositoryScope {
  return {
    tickets: new DrizzleTicketRepository(executor),
    comments: new DrizzleCommentRepository(executor),
    events: new DrizzleTicketEventRepository(executor),
  };
}

/**
 * Transaction runner over drizzle's db.transaction(). A throw inside `fn`
 * rolls the transaction back and is rethrown as-is; a resolved `fn` commits.
 */
export class DrizzleTransactionRunner implements TransactionRunner {
  readonly repositories: RepositoryScope;

  constructor(private readonly db: Database) {
    this.repositories = createRepositoryScope(db);
  }

  run<T>(fn: (scope: RepositoryScope) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(createRepositoryScope(tx)));
  }
}
