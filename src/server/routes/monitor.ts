import { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import { buildHealthPayload } from '../../app.js';
import type { MonitorConfig } from '../../config/index.js';
import type { MonitorLoop } from '../../monitor/monitorLoop.js';
import { respondAsync, sendJson, type RouteHandler, type Router } from './shared.js';

interface MonitorRouterOptions {
  loop: MonitorLoop;
}

export class MonitorRouter implements Router {
  private readonly loop: MonitorLoop;
  private readonly handlers: RouteHandler[];

  constructor(options: MonitorRouterOptions) {
    this.loop = options.loop;
    this.handlers = [
      (req, res, url) => this.handleStatus(req, res, url),
      (req, res, url) => this.handleProbe(req, res, url),
      (req, res, url) => this.handleStart(req, res, url),
      (req, res, url) => this.handleStop(req, res, url),
      (req, res, url) => this.handleHealth(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    return this.handlers.some(handler => handler(req, res, url));
  }

  private handleStatus(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/status') {
      return false;
    }

    sendJson(res, 200, {
      status: this.loop.status(),
      config: summarizeConfig(this.loop.getActiveConfig())
    });
    return true;
  }

  private handleProbe(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/probe') {
      return false;
    }

    respondAsync(res, async () => {
      const inspection = await this.loop.testProbeNow();
      sendJson(res, 200, { health: inspection.health, response: inspection.response });
    });
    return true;
  }

  private handleStart(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/api/monitor/start') {
      return false;
    }

    const started = this.loop.start();
    const status = this.loop.status();
    if (started) {
      sendJson(res, 200, { started, status });
    } else {
      sendJson(res, 409, {
        started,
        status,
        error: status.configError ?? 'Connection monitoring is disabled'
      });
    }
    return true;
  }

  private handleStop(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/api/monitor/stop') {
      return false;
    }

    respondAsync(res, async () => {
      await this.loop.stop();
      sendJson(res, 200, { stopped: true, status: this.loop.status() });
    });
    return true;
  }

  private handleHealth(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/healthz') {
      return false;
    }

    respondAsync(res, async () => {
      const payload = await buildHealthPayload();
      sendJson(res, payload.status === 'ok' ? 200 : 503, payload);
    });
    return true;
  }
}

function summarizeConfig(config: MonitorConfig | null) {
  if (!config) {
    return null;
  }
  return {
    endpoint: config.statsEndpoint.href,
    checkIntervalSec: config.checkIntervalSec,
    timeoutThresholdSec: config.timeoutThresholdSec,
    fallbackScene: config.fallbackScene,
    returnBehavior: config.returnBehavior,
    thresholds: {
      bitrateKbps: config.bitrateThresholdKbps,
      rttMs: config.rttThresholdMs,
      dropped: config.droppedThreshold
    },
    notificationsEnabled: config.notificationsEnabled
  };
}

export function createMonitorRouter(options: MonitorRouterOptions) {
  return new MonitorRouter(options);
}
