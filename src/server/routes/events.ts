import { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import { listEvents } from '../../db.js';
import type { EventQuery } from '../../types.js';
import metricsModule, { type MetricsRegistry } from '../../metrics/index.js';
import type { EventSeverity } from '../../types.js';
import { sendJson, type RouteHandler, type Router } from './shared.js';

interface EventsRouterOptions {
  metrics?: MetricsRegistry;
  list?: typeof listEvents;
}

const SEVERITIES: readonly EventSeverity[] = ['info', 'warning', 'critical'];

export class EventsRouter implements Router {
  private readonly handlers: RouteHandler[];
  private readonly metrics: MetricsRegistry;
  private readonly list: typeof listEvents;

  constructor(options: EventsRouterOptions = {}) {
    this.metrics = options.metrics ?? metricsModule;
    this.list = options.list ?? listEvents;
    this.handlers = [
      (req, res, url) => this.handleList(req, res, url),
      (req, res, url) => this.handlePrometheus(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    return this.handlers.some(handler => handler(req, res, url));
  }

  private handleList(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/events') {
      return false;
    }

    const options = parseListOptions(url);
    const result = this.list(options);
    sendJson(res, 200, {
      items: result.items,
      total: result.total
    });
    return true;
  }

  private handlePrometheus(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/metrics') {
      return false;
    }

    const body = this.metrics.exportForPrometheus();
    res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4; charset=utf-8' });
    res.end(body);
    return true;
  }
}

export function parseListOptions(url: URL): EventQuery {
  const options: EventQuery = {};

  const limit = Number.parseInt(url.searchParams.get('limit') ?? '', 10);
  if (Number.isFinite(limit)) {
    options.limit = limit;
  }

  const offset = Number.parseInt(url.searchParams.get('offset') ?? '', 10);
  if (Number.isFinite(offset)) {
    options.offset = offset;
  }

  const detector = url.searchParams.get('detector');
  if (detector) {
    options.detector = detector;
  }

  const severity = url.searchParams.get('severity');
  const matchedSeverity = SEVERITIES.find(candidate => candidate === severity);
  if (matchedSeverity) {
    options.severity = matchedSeverity;
  }

  const since = Number.parseInt(url.searchParams.get('since') ?? '', 10);
  if (Number.isFinite(since)) {
    options.since = since;
  }

  return options;
}

export function createEventsRouter(options: EventsRouterOptions = {}) {
  return new EventsRouter(options);
}
