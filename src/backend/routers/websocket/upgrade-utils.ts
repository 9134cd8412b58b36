import { STATUS_CODES } from 'node:http';
import type { Duplex } from 'node:stream';
import type { WebSocket } from 'ws';

export type UpgradeRefusalStatus = 400 | 401 | 404 | 500;

/**
 * Answer an upgrade request with a plain HTTP status line and drop the socket.
 */
export function rejectUpgrade(socket: Duplex, status: UpgradeRefusalStatus, message?: string): void {
  if (socket.destroyed) {
    return;
  }
  const reason = STATUS_CODES[status] ?? 'Error';
  const body = message ?? reason;
  socket.once('finish', () => socket.destroy());
  socket.end(
    `HTTP/1.1 ${status} ${reason}\r\n` +
      'Connection: close\r\n' +
      'Content-Type: text/plain\r\n' +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      `\r\n${body}`
  );
}

export function sendBadRequest(socket: Duplex, message?: string): void {
  rejectUpgrade(socket, 400, message);
}

export function markWebSocketAlive(ws: WebSocket, wsAliveMap: WeakMap<WebSocket, boolean>): void {
  wsAliveMap.set(ws, true);
  ws.on('pong', () => wsAliveMap.set(ws, true));
}
