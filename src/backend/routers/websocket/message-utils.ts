import type { WebSocket } from 'ws';
import { WS_READY_STATE } from '@/backend/constants';

export function toMessageString(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString();
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data.filter((chunk) => Buffer.isBuffer(chunk))).toString();
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString();
  }
  return String(data);
}

export interface ErrorFrame {
  error: string;
  code: string;
}

/**
 * Report a frame-level failure to the sending socket only.
 */
export function sendErrorFrame(ws: WebSocket, error: string, code: string): void {
  if (ws.readyState !== WS_READY_STATE.OPEN) {
    return;
  }
  ws.send(JSON.stringify({ error, code } satisfies ErrorFrame));
}
