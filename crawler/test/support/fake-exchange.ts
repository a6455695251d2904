import { once } from 'node:events';
import type WebSocket from 'ws';
import { WebSocketServer } from 'ws';
import { frameText } from '../../src/adapters/exchange-stream.js';

export type MessageHandler = (text: string, socket: WebSocket, connection: number) => void;

/** Local WebSocket server standing in for an exchange endpoint. */
export class FakeExchange {
  readonly received: string[] = [];
  connections = 0;
  private readonly server: WebSocketServer;
  private readonly sockets = new Set<WebSocket>();
  private handler: MessageHandler;

  private constructor(server: WebSocketServer, handler: MessageHandler) {
    this.server = server;
    this.handler = handler;
    server.on('connection', (socket) => {
      const connection = ++this.connections;
      this.sockets.add(socket);
      socket.on('close', () => this.sockets.delete(socket));
      socket.on('message', (data) => {
        const text = frameText(data);
        this.received.push(text);
        this.handler(text, socket, connection);
      });
    });
  }

  static async start(handler: MessageHandler = () => undefined): Promise<FakeExchange> {
    const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    await once(server, 'listening');
    return new FakeExchange(server, handler);
  }

  get url(): string {
    const address = this.server.address();
    if (address === null || typeof address === 'string') throw new Error('fake exchange is not listening on TCP');
    return `ws://127.0.0.1:${address.port}`;
  }

  onMessage(handler: MessageHandler): void {
    this.handler = handler;
  }

  get openSockets(): number {
    return this.sockets.size;
  }

  /** Kill every client connection without a close handshake. */
  dropAll(): void {
    for (const socket of this.sockets) socket.terminate();
  }

  async close(): Promise<void> {
    this.dropAll();
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
