import { fileURLToPath } from 'node:url';
import loggerModule, { setLogLevel, type MonitorLogger } from './logger.js';
import defaultBus, { type EventBus } from './eventBus.js';
import defaultMetrics, { type MetricsRegistry } from './metrics/index.js';
import configManager, {
  type ConfigManager,
  type ConfigReloadEvent,
  type LinkwatchConfig
} from './config/index.js';
import { registerHealthIndicator, registerShutdownHook, runShutdownHooks } from './app.js';
import { closeDatabase } from './db.js';
import { MonitorLoop, type MonitorLoopOptions } from './monitor/monitorLoop.js';
import { EventBusNotifier, type NotificationSink } from './notify/index.js';
import { DryRunSceneSwitcher, type SceneSwitcher } from './scenes/index.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';

export interface MonitorServiceOptions {
  sceneSwitcher: SceneSwitcher;
  configManager?: ConfigManager;
  bus?: EventBus;
  notifier?: NotificationSink;
  logger?: MonitorLogger;
  metrics?: MetricsRegistry;
  /** Overrides `http` from the config document; false disables the server. */
  http?: false | { port?: number; host?: string };
  watchConfig?: boolean;
  loop?: Pick<MonitorLoopOptions, 'fetch' | 'now' | 'createProbe'>;
}

export type MonitorService = {
  loop: MonitorLoop;
  http: HttpServerRuntime | null;
  /** Resolves once the current reload (if any) has been applied. */
  settled: () => Promise<void>;
  stop: () => Promise<void>;
};

function monitorFingerprint(config: LinkwatchConfig) {
  return JSON.stringify({ monitor: config.monitor, telemetry: config.telemetry });
}

export async function startMonitorService(options: MonitorServiceOptions): Promise<MonitorService> {
  const manager = options.configManager ?? configManager;
  const bus = options.bus ?? defaultBus;
  const logger = options.logger ?? loggerModule;
  const metrics = options.metrics ?? defaultMetrics;

  const initial = manager.getConfig();
  bus.configureSuppression(initial.events?.suppression?.rules ?? []);

  const loop = new MonitorLoop({
    config: manager,
    sceneSwitcher: options.sceneSwitcher,
    notifier: options.notifier ?? new EventBusNotifier({ bus }),
    bus,
    logger,
    metrics,
    ...options.loop
  });

  let syncPromise: Promise<void> = Promise.resolve();
  let stopWatching: (() => void) | null = null;

  const applyConfiguredLogLevel = (value: string) => {
    try {
      setLogLevel(value);
    } catch (error) {
      logger.warn({ err: error, level: value }, 'Failed to apply configured log level');
    }
  };

  const restartLoop = async (next: LinkwatchConfig) => {
    await loop.stop();
    if (next.monitor.enabled) {
      loop.start();
    }
  };

  const handleReload = ({ previous, next }: ConfigReloadEvent) => {
    bus.configureSuppression(next.events?.suppression?.rules ?? []);
    if (previous.logging.level !== next.logging.level) {
      applyConfiguredLogLevel(next.logging.level);
    }

    const monitorChanged = monitorFingerprint(previous) !== monitorFingerprint(next);
    logger.info(
      {
        monitorChanged,
        suppressionRules: next.events?.suppression?.rules.length ?? 0
      },
      'configuration reloaded'
    );

    if (monitorChanged) {
      syncPromise = syncPromise
        .then(() => restartLoop(next))
        .catch(error => {
          logger.error({ err: error }, 'Failed to apply monitor configuration');
        });
    }
  };

  const handleManagerError = (error: Error) => {
    logger.warn(
      { err: error, configPath: manager.getPath(), action: 'reload', restored: true },
      'configuration reload failed'
    );
  };

  if (options.watchConfig ?? true) {
    stopWatching = manager.watch();
  }
  manager.on('reload', handleReload);
  manager.on('error', handleManagerError);

  if (initial.monitor.enabled) {
    loop.start();
  }

  let httpRuntime: HttpServerRuntime | null = null;
  const httpSettings = options.http ?? (initial.http?.enabled === false ? false : initial.http ?? {});
  if (httpSettings !== false) {
    httpRuntime = await startHttpServer({
      loop,
      port: httpSettings.port,
      host: httpSettings.host,
      metrics
    });
  }

  const unregisterIndicator = registerHealthIndicator('monitor', () => {
    const status = loop.status();
    const degraded = status.configError !== null || status.phase === 'failed';
    return {
      status: degraded ? 'degraded' : 'ok',
      details: {
        running: status.running,
        phase: status.phase,
        fallbackActive: status.fallbackActive,
        configError: status.configError
      }
    };
  });

  let stopped = false;
  const stop = async () => {
    if (stopped) {
      return;
    }
    stopped = true;
    manager.off('reload', handleReload);
    manager.off('error', handleManagerError);
    stopWatching?.();
    stopWatching = null;
    await syncPromise;
    await loop.stop();
    if (httpRuntime) {
      await httpRuntime.close();
    }
    unregisterIndicator();
    unregisterHook();
  };

  const unregisterHook = registerShutdownHook('monitor', async () => {
    await stop();
  });

  return {
    loop,
    http: httpRuntime,
    settled: () => syncPromise,
    stop
  };
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  const runtimePromise = startMonitorService({ sceneSwitcher: new DryRunSceneSwitcher() }).catch(error => {
    loggerModule.error({ err: error }, 'Failed to start connection monitor');
    process.exitCode = 1;
    return null;
  });

  const shutdown = (signal: NodeJS.Signals) => {
    loggerModule.info({ signal }, 'Stopping connection monitor');
    runtimePromise
      .then(() => runShutdownHooks({ reason: 'signal', signal }))
      .then(results => {
        for (const result of results) {
          if (result.status === 'error') {
            loggerModule.error({ hook: result.name, err: result.error }, 'Shutdown hook failed');
          }
        }
      })
      .catch(error => {
        loggerModule.error({ err: error }, 'Failed to stop connection monitor');
      })
      .finally(() => {
        closeDatabase();
        process.exit(0);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
