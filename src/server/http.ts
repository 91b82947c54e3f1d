import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { WebSocketServer, type WebSocket } from 'ws';
import { createLogger, errorMessage, type Logger } from '../logger.js';
import { WebSocketChannel, fromWebSocket } from '../protocol/io.js';
import type { AcpServer } from './AcpServer.js';

export const WS_PATH = '/ws';

export type HttpReply = { status: number; body: Record<string, unknown> };

/** Answers the plain HTTP routes: `/health`, `/` and a 404 for everything else. */
export function routeHttp(server: AcpServer, method: string | undefined, url: string | undefined): HttpReply {
  const path = new URL(url ?? '/', 'http://localhost').pathname;
  if (method !== 'GET' && method !== 'HEAD') {
    return { status: 405, body: { error: 'method not allowed' } };
  }
  switch (path) {
    case '/health':
      return { status: 200, body: server.health() };
    case '/':
      return {
        status: 200,
        body: {
          service: server.health().service,
          description: 'Agent Client Protocol gateway: JSON-RPC 2.0 over newline-delimited JSON',
          endpoints: {
            websocket: WS_PATH,
            health: '/health',
          },
          methods: server.engine.methods,
        },
      };
    default:
      return { status: 404, body: { error: 'not found', path } };
  }
}

export interface WebSocketGateway {
  readonly server: Server;
  readonly wss: WebSocketServer;
  address(): AddressInfo;
  close(): Promise<void>;
}

export interface ListenOptions {
  host: string;
  port: number;
  logger?: Logger;
}

/** HTTP server carrying the WebSocket transport on `/ws` plus the introspection routes. */
export function listenWebSocket(acp: AcpServer, { host, port, logger }: ListenOptions): Promise<WebSocketGateway> {
  const log = logger ?? createLogger('http');
  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    const reply = routeHttp(acp, req.method, req.url);
    res.writeHead(reply.status, { 'content-type': 'application/json' });
    res.end(req.method === 'HEAD' ? undefined : JSON.stringify(reply.body));
  });
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (req, socket, head) => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (path !== WS_PATH) {
      log.warn('ws.upgrade.refused', { path });
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => wss.emit('connection', ws, req));
  });

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    const connection = acp.attach(new WebSocketChannel(fromWebSocket(ws), log.child('io')));
    log.info('ws.connected', { connection: connection.id, remote: req.socket.remoteAddress });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      server.on('error', (error) => log.error('http.error', { error: errorMessage(error) }));
      const info = server.address();
      log.info('http.listening', { host, port: typeof info === 'object' && info ? info.port : port, ws: WS_PATH });
      resolve({
        server,
        wss,
        address: () => {
          const current = server.address();
          if (current && typeof current === 'object') return current;
          return { address: host, family: 'IPv4', port };
        },
        close: () =>
          new Promise<void>((done) => {
            for (const client of wss.clients) client.terminate();
            wss.close();
            server.close(() => done());
          }),
      });
    });
  });
}
