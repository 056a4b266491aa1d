import type { RawData, WebSocket } from 'ws';

export const CLOSE_NORMAL = 1000;
export const CLOSE_MESSAGE_TOO_BIG = 1009;

/**
 * The slice of a WebSocket a ClientSession drives. Kept small so sessions
 * can run against an in-process fake.
 */
export interface SessionTransport {
  /** Resolves once the frame is handed to the OS, rejects on a write error. */
  send(data: string): Promise<void>;
  ping(): void;
  close(code: number, reason: string): void;
  /** Drop the connection without a closing handshake. */
  terminate(): void;
  onMessage(listener: (data: string, byteLength: number) => void): void;
  onPong(listener: () => void): void;
  onClose(listener: (code: number, reason: string) => void): void;
  onError(listener: (error: Error) => void): void;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class WsTransport implements SessionTransport {
  constructor(private readonly socket: WebSocket) {}

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== this.socket.OPEN) {
        reject(new Error('Socket is not open'));
        return;
      }
      this.socket.send(data, (error) => (error ? reject(error) : resolve()));
    });
  }

  ping(): void {
    if (this.socket.readyState === this.socket.OPEN) {
      this.socket.ping();
    }
  }

  close(code: number, reason: string): void {
    this.socket.close(code, reason);
  }

  terminate(): void {
    this.socket.terminate();
  }

  onMessage(listener: (data: string, byteLength: number) => void): void {
    this.socket.on('message', (raw: RawData) => {
      const buffer = toBuffer(raw);
      listener(buffer.toString('utf8'), buffer.byteLength);
    });
  }

  onPong(listener: () => void): void {
    this.socket.on('pong', () => listener());
  }

  onClose(listener: (code: number, reason: string) => void): void {
    this.socket.on('close', (code: number, reason: Buffer) => listener(code, reason.toString('utf8')));
  }

  onError(listener: (error: Error) => void): void {
    this.socket.on('error', listener);
  }
}
