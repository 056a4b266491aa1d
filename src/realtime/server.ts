import type { IncomingMessage, Server as HttpServer } from 'node:http';
import type { Duplex } from 'node:stream';
import { STATUS_CODES } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import type { UserId } from '@domain/tickets';
import { extractToken, type TokenVerifier } from '@/lib/auth';
import { isAppError } from '@/lib/app-error';
import { logger as rootLogger, toError, type Logger } from '@/lib/logger';
import { ClientSession, type SubscriptionGuard } from '@/realtime/clientSession';
import type { SubscriptionHub } from '@/realtime/hub';
import { WsTransport } from '@/realtime/transport';

export interface RealtimeSettings {
  path: string;
  sessionQueueSize: number;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  pingIntervalMs: number;
  maxMessageBytes: number;
}

export interface RealtimeServerDeps {
  httpServer: HttpServer;
  hub: SubscriptionHub;
  verifier: TokenVerifier;
  guard: SubscriptionGuard;
  settings: RealtimeSettings;
  logger?: Logger;
}

export interface RealtimeServer {
  readonly wss: WebSocketServer;
  close(): Promise<void>;
}

function rejectUpgrade(socket: Duplex, status: number): void {
  const reason = STATUS_CODES[status] ?? 'Error';
  socket.once('finish', () => socket.destroy());
  socket.end(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}

/**
 * Serve the realtime endpoint on an existing HTTP server. Credentials are
 * checked before the upgrade, so an unauthenticated caller gets a plain 401
 * and never a socket.
 */
export function attachRealtimeServer(deps: RealtimeServerDeps): RealtimeServer {
  const { httpServer, hub, verifier, guard, settings } = deps;
  const log = (deps.logger ?? rootLogger).child({ component: 'realtime_server' });

  const wss = new WebSocketServer({ noServer: true, maxPayload: settings.maxMessageBytes });

  const openSession = (ws: WebSocket, userId: UserId): void => {
    const session = new ClientSession({
      userId,
      transport: new WsTransport(ws),
      guard,
      queueSize: settings.sessionQueueSize,
      readTimeoutMs: settings.readTimeoutMs,
      writeTimeoutMs: settings.writeTimeoutMs,
      pingIntervalMs: settings.pingIntervalMs,
      maxMessageBytes: settings.maxMessageBytes,
      logger: deps.logger,
    });
    session.start(hub.register(session));
  };

  const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname !== settings.path) {
      rejectUpgrade(socket, 404);
      return;
    }

    const token = extractToken(req.headers.authorization, url);
    if (!token) {
      log.debug('Upgrade without credentials', { remoteAddress: req.socket.remoteAddress });
      rejectUpgrade(socket, 401);
      return;
    }

    verifier
      .verify(token)
      .then((userId) => {
        wss.handleUpgrade(req, socket, head, (ws) => openSession(ws, userId));
      })
      .catch((error: unknown) => {
        if (isAppError(error)) {
          log.debug('Upgrade rejected', { reason: error.message });
          rejectUpgrade(socket, error.statusCode);
          return;
        }
        log.error('Upgrade failed', toError(error));
        rejectUpgrade(socket, 500);
      });
  };

  httpServer.on('upgrade', onUpgrade);
  wss.on('error', (error) => log.error('WebSocket server error', error));

  log.info('Realtime endpoint ready', { path: settings.path });

  return {
    wss,
    close: () =>
      new Promise<void>((resolve, reject) => {
        httpServer.off('upgrade', onUpgrade);
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
