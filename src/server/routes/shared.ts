import { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import logger from '../../logger.js';

export type RouteHandler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

export interface Router {
  handle(req: IncomingMessage, res: ServerResponse, url: URL): boolean;
}

export function sendJson(res: ServerResponse, status: number, payload: Record<string, unknown>) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}

/** Runs an async route body; a rejection becomes a 500 response. */
export function respondAsync(res: ServerResponse, task: () => Promise<void>) {
  void task().catch(error => {
    logger.error({ err: error }, 'HTTP request failed');
    sendJson(res, 500, { error: 'Internal server error' });
  });
}
