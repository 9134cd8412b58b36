import type { IncomingMessage } from 'node:http';
import { createServer, type Server as HttpServer } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocket, WebSocketServer } from 'ws';
import { toMessageString } from '@/backend/routers/websocket/message-utils';

export type UpgradeHandler = (
  request: IncomingMessage,
  socket: Duplex,
  head: Buffer,
  url: URL,
  wss: WebSocketServer,
  wsAliveMap: WeakMap<WebSocket, boolean>
) => void;

export interface WebSocketTestServer {
  close: () => Promise<void>;
  port: number;
}

export async function createWebSocketTestServer(
  handler: UpgradeHandler,
  acceptsPath: (pathname: string) => boolean
): Promise<WebSocketTestServer> {
  const wss = new WebSocketServer({ noServer: true });
  const wsAliveMap = new WeakMap<WebSocket, boolean>();
  const server: HttpServer = createServer();

  server.on('upgrade', (request, socket, head) => {
    const url = new URL(request.url || '', `http://${request.headers.host || 'localhost'}`);
    if (!acceptsPath(url.pathname)) {
      socket.destroy();
      return;
    }
    handler(request, socket, head, url, wss, wsAliveMap);
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Failed to resolve test server port');
  }

  return {
    port: address.port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close((wssError) => {
          if (wssError) {
            reject(wssError);
            return;
          }
          server.close((serverError) => {
            if (serverError) {
              reject(serverError);
              return;
            }
            resolve();
          });
        });
      }),
  };
}

export async function connectWebSocket(
  url: string,
  headers: Record<string, string> = {}
): Promise<WebSocket> {
  const ws = new WebSocket(url, { headers });

  await new Promise<void>((resolve, reject) => {
    const onOpen = () => {
      cleanup();
      resolve();
    };
    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };
    const cleanup = () => {
      ws.off('open', onOpen);
      ws.off('error', onError);
    };

    ws.on('open', onOpen);
    ws.on('error', onError);
  });

  return ws;
}

/**
 * Attempt an upgrade that the server is expected to refuse.
 * @returns the HTTP status the server answered with
 */
export async function expectUpgradeRefused(
  url: string,
  headers: Record<string, string> = {}
): Promise<number> {
  const ws = new WebSocket(url, { headers });

  return await new Promise<number>((resolve, reject) => {
    ws.on('unexpected-response', (_request, response) => {
      resolve(response.statusCode ?? 0);
      ws.terminate();
    });
    ws.on('open', () => {
      ws.terminate();
      reject(new Error('Upgrade unexpectedly succeeded'));
    });
    ws.on('error', (error) => {
      reject(error);
    });
  });
}

export async function waitForWebSocketMessage(ws: WebSocket, timeoutMs = 2000): Promise<unknown> {
  return await new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      reject(new Error(`Timed out waiting for WebSocket message after ${timeoutMs}ms`));
    }, timeoutMs);

    const onMessage = (data: WebSocket.RawData) => {
      cleanup();
      try {
        resolve(JSON.parse(toMessageString(data)));
      } catch (error) {
        reject(error);
      }
    };

    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };

    const cleanup = () => {
      clearTimeout(timer);
      ws.off('message', onMessage);
      ws.off('error', onError);
    };

    ws.on('message', onMessage);
    ws.on('error', onError);
  });
}

/**
 * Record every parsed frame a socket receives from now on.
 */
export function recordWebSocketMessages(ws: WebSocket): unknown[] {
  const received: unknown[] = [];
  ws.on('message', (data: WebSocket.RawData) => {
    received.push(JSON.parse(toMessageString(data)));
  });
  return received;
}

export async function closeWebSocket(ws: WebSocket): Promise<void> {
  if (ws.readyState === WebSocket.CLOSED) {
    return;
  }

  await new Promise<void>((resolve) => {
    const timer = setTimeout(() => resolve(), 1000);

    ws.once('close', () => {
      clearTimeout(timer);
      resolve();
    });

    if (ws.readyState === WebSocket.OPEN) {
      ws.close(1000, 'test complete');
      return;
    }

    ws.terminate();
  });
}
