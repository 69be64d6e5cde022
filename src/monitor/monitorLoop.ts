import { EventEmitter } from 'node:events';
import logger, { type MonitorLogger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import eventBus, { type EventBus } from '../eventBus.js';
import {
  resolveMonitorConfig,
  resolveProbeSettings,
  type ConfigProvider,
  type MonitorConfig,
  type ProbeSettings
} from '../config/index.js';
import { ConfigError } from '../errors.js';
import { EventBusNotifier, type NotificationSink } from '../notify/index.js';
import type { SceneSwitcher } from '../scenes/index.js';
import { FailureDetector } from './failureDetector.js';
import { FailoverController, type FailoverState } from './failoverController.js';
import { HealthProbe, offlineHealth, type FetchLike } from './healthProbe.js';
import {
  createInitialState,
  type EncoderHealth,
  type HealthCheck,
  type MonitorPhase,
  type MonitorState,
  type MonitorStatus,
  type PhaseTransition,
  type ProbeInspection
} from './types.js';

export type MonitorLoopOptions = {
  config: ConfigProvider;
  sceneSwitcher: SceneSwitcher;
  notifier?: NotificationSink;
  bus?: EventBus;
  logger?: MonitorLogger;
  metrics?: MetricsRegistry;
  now?: () => number;
  fetch?: FetchLike;
  createProbe?: (settings: ProbeSettings) => HealthCheck;
};

export type MonitorTransitionEvent = {
  from: MonitorPhase;
  to: MonitorPhase;
  transition: PhaseTransition | null;
  health: EncoderHealth;
  state: MonitorState;
};

type Session = {
  config: MonitorConfig;
  probe: HealthCheck;
  detector: FailureDetector;
  controller: FailoverController;
  cancelled: boolean;
};

/**
 * The periodic probe → detect → fail over task. Only the cycle writes
 * {@link MonitorState}, and it does so with one assignment of a frozen value.
 *
 * Emits `started`, `stopped`, `cycle` (new state) and `transition`
 * ({@link MonitorTransitionEvent}) whenever the phase changes.
 */
export class MonitorLoop extends EventEmitter {
  private readonly configProvider: ConfigProvider;
  private readonly sceneSwitcher: SceneSwitcher;
  private readonly notifier: NotificationSink;
  private readonly bus: EventBus;
  private readonly log: MonitorLogger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private readonly createProbe: (settings: ProbeSettings) => HealthCheck;

  private state: MonitorState = createInitialState();
  private session: Session | null = null;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private configError: ConfigError | null = null;

  constructor(options: MonitorLoopOptions) {
    super();
    this.configProvider = options.config;
    this.sceneSwitcher = options.sceneSwitcher;
    this.bus = options.bus ?? eventBus;
    this.notifier = options.notifier ?? new EventBusNotifier({ bus: this.bus });
    this.log = options.logger ?? logger;
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? Date.now;
    const fetchImpl = options.fetch;
    this.createProbe =
      options.createProbe ??
      (settings =>
        new HealthProbe(settings, { fetch: fetchImpl, logger: this.log, metrics: this.metrics, now: this.now }));
  }

  isRunning(): boolean {
    return this.session !== null;
  }

  /** The configuration the running session resolved at start, if any. */
  getActiveConfig(): MonitorConfig | null {
    return this.session?.config ?? null;
  }

  /**
   * Begins monitoring. Returns false when monitoring is disabled or the
   * configuration is incomplete; a {@link ConfigError} is reported once and
   * never thrown.
   */
  start(): boolean {
    if (this.session) {
      return true;
    }

    const document = this.configProvider.getConfig();
    if (!document.monitor.enabled) {
      this.configError = null;
      this.log.info({ component: 'monitor' }, 'Connection monitoring is disabled in config');
      return false;
    }

    let config: MonitorConfig;
    try {
      config = resolveMonitorConfig(document);
    } catch (error) {
      if (error instanceof ConfigError) {
        this.reportConfigError(error);
        return false;
      }
      throw error;
    }

    this.configError = null;
    const session: Session = {
      config,
      probe: this.createProbe(config),
      detector: new FailureDetector({
        timeoutThresholdMs: config.timeoutThresholdSec * 1000,
        sampleWindowMs: config.checkIntervalSec * 1000
      }),
      controller: new FailoverController(config, {
        sceneSwitcher: this.sceneSwitcher,
        notifier: this.notifier,
        logger: this.log,
        metrics: this.metrics
      }),
      cancelled: false
    };
    this.session = session;
    this.state = createInitialState();
    this.metrics.setMonitorRunning(true);
    this.log.info(
      {
        component: 'monitor',
        endpoint: config.statsEndpoint.href,
        checkIntervalSec: config.checkIntervalSec,
        timeoutThresholdSec: config.timeoutThresholdSec,
        fallbackScene: config.fallbackScene
      },
      'Connection monitoring started'
    );
    this.emit('started', config);

    const previous = this.inFlight;
    if (previous) {
      // A cycle from a stopped session is still settling; probe only after it.
      void previous.then(() => this.scheduleNext(session, 0));
    } else {
      this.scheduleNext(session, 0);
    }
    return true;
  }

  /**
   * Resolves once the in-flight cycle has finished; no scene switch happens
   * afterwards. State resets immediately, so a `start()` issued meanwhile
   * begins from a fresh session.
   */
  async stop(): Promise<void> {
    const session = this.session;
    const pending = this.inFlight;

    if (session) {
      session.cancelled = true;
      this.session = null;
      if (this.timer) {
        clearTimeout(this.timer);
        this.timer = null;
      }
      this.state = createInitialState();
      this.metrics.setMonitorRunning(false);
      this.log.info({ component: 'monitor' }, 'Connection monitoring stopped');
      this.emit('stopped');
    }

    if (pending) {
      await pending;
    }
  }

  status(): MonitorStatus {
    const state = this.state;
    return Object.freeze({
      running: this.session !== null,
      phase: state.phase,
      pendingSince: state.pendingSince,
      lastKnownGoodScene: state.lastKnownGoodScene,
      fallbackActive: state.phase === 'failed' && state.fallbackEngaged,
      lastHealth: state.lastHealth,
      cycles: state.cycles,
      lastCycleAt: state.lastCycleAt,
      configError: this.configError?.message ?? null
    });
  }

  /** Diagnostic probe outside the cycle; never touches {@link MonitorState}. */
  async testProbeNow(): Promise<ProbeInspection> {
    let probe = this.session?.probe ?? null;
    if (!probe) {
      try {
        probe = this.createProbe(resolveProbeSettings(this.configProvider.getConfig()));
      } catch (error) {
        if (!(error instanceof ConfigError)) {
          throw error;
        }
        return Object.freeze({
          health: offlineHealth(`config error: ${error.message}`, this.now()),
          response: Object.freeze({ status: null, body: null, durationMs: 0 })
        });
      }
    }
    return probe.inspect();
  }

  private scheduleNext(session: Session, delayMs: number) {
    if (session.cancelled) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      const cycle = this.runCycle(session).finally(() => {
        if (this.inFlight === cycle) {
          this.inFlight = null;
        }
      });
      this.inFlight = cycle;
    }, delayMs);
  }

  private async runCycle(session: Session) {
    try {
      const health = await session.probe.checkHealth();
      if (session.cancelled) {
        return;
      }
      const now = this.now();
      const current = this.state;
      const stepped = session.detector.advance(current, health, now);

      let failover: FailoverState = {
        lastKnownGoodScene: current.lastKnownGoodScene,
        fallbackEngaged: current.fallbackEngaged
      };
      if (stepped.transition === 'enter-failed') {
        failover = await session.controller.enterFailed(failover, health);
      } else if (stepped.transition === 'enter-healthy') {
        failover = await session.controller.enterHealthy(failover);
      } else if (stepped.phase === 'failed') {
        failover = await session.controller.reconcile(failover, health);
      }

      const next: MonitorState = Object.freeze({
        phase: stepped.phase,
        pendingSince: stepped.pendingSince,
        lastKnownGoodScene: failover.lastKnownGoodScene,
        fallbackEngaged: stepped.phase === 'failed' && failover.fallbackEngaged,
        lastHealth: health,
        cycles: current.cycles + 1,
        lastCycleAt: now
      });

      if (this.session !== session) {
        return;
      }
      this.state = next;
      this.metrics.recordCycle(next.phase);

      if (current.phase !== next.phase) {
        this.metrics.recordTransition(current.phase, next.phase);
        this.logTransition(current.phase, next, health);
        this.emit('transition', {
          from: current.phase,
          to: next.phase,
          transition: stepped.transition,
          health,
          state: next
        } satisfies MonitorTransitionEvent);
      }
      this.emit('cycle', next);
    } catch (error) {
      this.log.error({ component: 'monitor', err: error }, 'Monitor cycle failed');
    } finally {
      this.scheduleNext(session, session.config.checkIntervalSec * 1000);
    }
  }

  private logTransition(from: MonitorPhase, next: MonitorState, health: EncoderHealth) {
    const context = { component: 'monitor', from, to: next.phase, error: health.error };
    if (next.phase === 'failed') {
      this.log.warn({ ...context, fallbackEngaged: next.fallbackEngaged }, 'Encoder connection lost');
    } else if (next.phase === 'pending-failure') {
      this.log.info(context, 'Encoder unhealthy, waiting for timeout threshold');
    } else if (from === 'failed') {
      this.log.info(context, 'Encoder connection restored');
    } else {
      this.log.info(context, 'Encoder recovered before timeout threshold');
    }
  }

  private reportConfigError(error: ConfigError) {
    const repeated = this.configError?.message === error.message;
    this.configError = error;
    if (repeated) {
      return;
    }

    this.metrics.recordConfigError();
    this.log.error({ component: 'monitor', field: error.field }, error.message);
    this.bus.emitEvent({
      source: 'monitor',
      detector: 'config',
      severity: 'critical',
      message: `Connection monitoring not started: ${error.message}`,
      meta: { field: error.field }
    });
  }
}
