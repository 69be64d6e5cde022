import http from 'node:http';
import { URL } from 'node:url';
import logger from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { MonitorLoop } from '../monitor/monitorLoop.js';
import { createEventsRouter } from './routes/events.js';
import { createMonitorRouter } from './routes/monitor.js';
import { sendJson, type Router } from './routes/shared.js';

export interface HttpServerOptions {
  loop: MonitorLoop;
  port?: number;
  host?: string;
  metrics?: MetricsRegistry;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 4610;
  const host = options.host ?? '127.0.0.1';

  const routers: Router[] = [
    createMonitorRouter({ loop: options.loop }),
    createEventsRouter({ metrics: options.metrics ?? metrics })
  ];

  const server = http.createServer((req, res) => {
    try {
      const url = new URL(req.url ?? '/', 'http://localhost');
      if (routers.some(router => router.handle(req, res, url))) {
        return;
      }

      sendJson(res, 404, { error: 'Not found' });
    } catch (error) {
      logger.error({ err: error }, 'HTTP request failed');
      sendJson(res, 500, { error: 'Internal server error' });
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      })
  };
}

export default startHttpServer;
