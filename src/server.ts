#!/usr/bin/env node
/**
 * Process entry point.
 *
 * Startup:
 * 1. Load .env and validate configuration
 * 2. Wire repositories, outbox, hub and services
 * 3. Start the HTTP server with the realtime endpoint and /health
 * 4. On SIGINT/SIGTERM: stop accepting sockets, stop the hub, wait for
 *    pending notifications, close the database pool
 */

import 'dotenv/config';
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { env, realtimeConfig } from '@/lib/env';
import { logger, toError } from '@/lib/logger';
import { JwtVerifier } from '@/lib/auth';
import { closeDb, getDb } from '@/lib/db';
import { DrizzleTransactionRunner } from '@/services/transactionManager';
import { OutboxCoordinator } from '@/services/outboxService';
import { RoleAuthorizer } from '@/services/authorizationService';
import { BackgroundNotifications, LogNotifier } from '@/services/notificationService';
import { TicketService } from '@/services/TicketService';
import { CommentService } from '@/services/CommentService';
import { EventService } from '@/services/eventService';
import { SubscriptionHub } from '@/realtime/hub';
import { TicketAccessGuard } from '@/realtime/subscriptionGuard';
import { attachRealtimeServer } from '@/realtime/server';

const SHUTDOWN_TIMEOUT_MS = 10_000;

export function createApp() {
  const db = getDb();
  const hub = new SubscriptionHub({ dispatchQueueSize: realtimeConfig.dispatchQueueSize });
  const outbox = new OutboxCoordinator(new DrizzleTransactionRunner(db), hub);
  const authorizer = new RoleAuthorizer(db);
  const notifications = new BackgroundNotifications(new LogNotifier(db));

  const tickets = new TicketService({ outbox, authorizer, notifications });
  const comments = new CommentService({ outbox, authorizer, notifications });
  const events = new EventService(outbox.repositories.events, tickets);

  return { hub, notifications, tickets, comments, events };
}

export type App = ReturnType<typeof createApp>;

function main(): void {
  const app = createApp();

  const httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
    if (req.method === 'GET' && req.url === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({
        status: 'ok',
        clients: app.hub.clientCount(),
        rooms: app.hub.roomCount(),
      }));
      return;
    }
    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ success: false, error: 'Not found' }));
  });

  const realtime = attachRealtimeServer({
    httpServer,
    hub: app.hub,
    verifier: new JwtVerifier(env.AUTH_SECRET),
    guard: new TicketAccessGuard(app.tickets),
    settings: realtimeConfig,
  });

  app.hub.start();
  httpServer.listen(env.PORT, () => {
    logger.info('Server listening', { port: env.PORT, realtimePath: realtimeConfig.path });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    const forceExit = setTimeout(() => {
      logger.warn('Shutdown timed out, exiting');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    await realtime.close();
    await app.hub.stop();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    await app.notifications.drain();
    await closeDb();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', toError(error));
          process.exit(1);
        }
      );
    });
  }
}

if (require.main === module) {
  main();
}
