import pino from 'pino';
import type { EventRecord } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type LatencyState = Omit<LatencyStats, 'averageMs'>;

const SWITCH_PURPOSES = ['fallback', 'restore'] as const;

export type SwitchPurpose = (typeof SWITCH_PURPOSES)[number];

type SwitchCounters = {
  attempts: number;
  succeeded: number;
  failed: number;
};

type SwitchFailureRecord = {
  scene: string;
  purpose: SwitchPurpose;
  reason: string;
  at: number;
};

export type ProbeSample = {
  online: boolean;
  error?: string;
  checkedAt: number;
};

export type SuppressedEventMetric = {
  ruleId: string;
  reason: string;
  detector: string;
  type: 'window' | 'rate-limit';
};

export type PrometheusLogLevelOptions = {
  labels?: Record<string, string>;
  levelMetricName?: string;
  levelHelp?: string;
  stateMetricName?: string;
  stateHelp?: string;
};

export type PrometheusExportOptions = {
  labels?: Record<string, string>;
  prefix?: string;
};

type PrometheusGaugeSample = {
  value: number;
  labels?: Record<string, string>;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    byComponent: Record<string, CounterMap>;
    currentLevel: string;
    levelChanges: CounterMap;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  events: {
    total: number;
    bySeverity: CounterMap;
    byDetector: CounterMap;
    lastEventAt: string | null;
    suppressed: number;
    suppressedByRule: CounterMap;
  };
  probes: {
    total: number;
    online: number;
    offline: number;
    byError: CounterMap;
    consecutiveOffline: number;
    lastCheckedAt: string | null;
    lastError: string | null;
  };
  switches: {
    attempts: number;
    succeeded: number;
    failed: number;
    byPurpose: Record<SwitchPurpose, SwitchCounters>;
    lastFailure: (Omit<SwitchFailureRecord, 'at'> & { at: string }) | null;
  };
  monitor: {
    running: boolean;
    phase: string | null;
    transitions: CounterMap;
    lastTransitionAt: string | null;
    configErrors: number;
    cycles: number;
  };
  latencies: Record<string, LatencyStats>;
};

const LOG_LEVEL_ORDER = Object.entries(pino.levels.values)
  .sort(([, a], [, b]) => a - b)
  .map(([label]) => label);

class MetricsRegistry {
  private logLevelCounters = new Map<string, number>();
  private logLevelByComponent = new Map<string, Map<string, number>>();
  private logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private totalEvents = 0;
  private lastEventTimestamp: number | null = null;
  private severityCounters = new Map<string, number>();
  private detectorCounters = new Map<string, number>();
  private suppressedTotal = 0;
  private suppressedByRule = new Map<string, number>();
  private probeTotal = 0;
  private probeOnline = 0;
  private probeOffline = 0;
  private probeErrors = new Map<string, number>();
  private consecutiveOffline = 0;
  private lastProbeAt: number | null = null;
  private lastProbeError: string | null = null;
  private switchCounters: Record<SwitchPurpose, SwitchCounters> = createSwitchCounters();
  private lastSwitchFailure: SwitchFailureRecord | null = null;
  private monitorRunning = false;
  private monitorPhase: string | null = null;
  private transitionCounters = new Map<string, number>();
  private lastTransitionAt: number | null = null;
  private configErrors = 0;
  private cycles = 0;
  private latencyStats = new Map<string, LatencyState>();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByComponent.clear();
    this.logLevelChangeCounters.clear();
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.totalEvents = 0;
    this.lastEventTimestamp = null;
    this.severityCounters.clear();
    this.detectorCounters.clear();
    this.suppressedTotal = 0;
    this.suppressedByRule.clear();
    this.probeTotal = 0;
    this.probeOnline = 0;
    this.probeOffline = 0;
    this.probeErrors.clear();
    this.consecutiveOffline = 0;
    this.lastProbeAt = null;
    this.lastProbeError = null;
    this.switchCounters = createSwitchCounters();
    this.lastSwitchFailure = null;
    this.monitorRunning = false;
    this.monitorPhase = null;
    this.transitionCounters.clear();
    this.lastTransitionAt = null;
    this.configErrors = 0;
    this.cycles = 0;
    this.latencyStats.clear();
  }

  incrementLogLevel(level: string, context?: { message?: string; component?: string }) {
    const normalized = level.toLowerCase();
    increment(this.logLevelCounters, normalized);

    if (context?.component) {
      const componentMap = this.logLevelByComponent.get(context.component) ?? new Map<string, number>();
      increment(componentMap, normalized);
      this.logLevelByComponent.set(context.component, componentMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (previousNormalized && previousNormalized !== normalized) {
      increment(this.logLevelChangeCounters, normalized);
    }
  }

  recordEvent(event: EventRecord) {
    this.totalEvents += 1;
    this.lastEventTimestamp = event.ts;
    increment(this.detectorCounters, event.detector);
    increment(this.severityCounters, event.severity);
  }

  recordSuppressedEvent(detail: SuppressedEventMetric) {
    this.suppressedTotal += 1;
    increment(this.suppressedByRule, detail.ruleId);
  }

  recordProbe(sample: ProbeSample, durationMs: number) {
    this.probeTotal += 1;
    this.lastProbeAt = sample.checkedAt;
    if (sample.online) {
      this.probeOnline += 1;
      this.consecutiveOffline = 0;
      this.lastProbeError = null;
    } else {
      this.probeOffline += 1;
      this.consecutiveOffline += 1;
      const reason = categorizeProbeError(sample.error);
      increment(this.probeErrors, reason);
      this.lastProbeError = sample.error ?? null;
    }
    this.observeLatency('probe.duration.ms', durationMs);
  }

  recordSceneSwitch(purpose: SwitchPurpose, scene: string, ok: boolean, reason?: string) {
    const counters = this.switchCounters[purpose];
    counters.attempts += 1;
    if (ok) {
      counters.succeeded += 1;
      return;
    }
    counters.failed += 1;
    this.lastSwitchFailure = { scene, purpose, reason: reason ?? 'rejected', at: Date.now() };
  }

  recordTransition(from: string, to: string) {
    increment(this.transitionCounters, `${from}->${to}`);
    this.monitorPhase = to;
    this.lastTransitionAt = Date.now();
  }

  recordCycle(phase: string) {
    this.cycles += 1;
    this.monitorPhase = phase;
  }

  setMonitorRunning(running: boolean) {
    this.monitorRunning = running;
    if (!running) {
      this.monitorPhase = null;
    }
  }

  recordConfigError() {
    this.configErrors += 1;
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  snapshot(): MetricsSnapshot {
    const switchTotals = Object.values(this.switchCounters).reduce<SwitchCounters>(
      (acc, counters) => ({
        attempts: acc.attempts + counters.attempts,
        succeeded: acc.succeeded + counters.succeeded,
        failed: acc.failed + counters.failed
      }),
      { attempts: 0, succeeded: 0, failed: 0 }
    );

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: mapFrom(this.logLevelCounters),
        byComponent: Object.fromEntries(
          Array.from(this.logLevelByComponent.entries()).map(([component, counters]) => [
            component,
            mapFrom(counters)
          ])
        ),
        currentLevel: this.currentLogLevel,
        levelChanges: mapFrom(this.logLevelChangeCounters),
        lastErrorAt: toIso(this.lastErrorAt),
        lastErrorMessage: this.lastErrorMessage
      },
      events: {
        total: this.totalEvents,
        bySeverity: mapFrom(this.severityCounters),
        byDetector: mapFrom(this.detectorCounters),
        lastEventAt: toIso(this.lastEventTimestamp),
        suppressed: this.suppressedTotal,
        suppressedByRule: mapFrom(this.suppressedByRule)
      },
      probes: {
        total: this.probeTotal,
        online: this.probeOnline,
        offline: this.probeOffline,
        byError: mapFrom(this.probeErrors),
        consecutiveOffline: this.consecutiveOffline,
        lastCheckedAt: toIso(this.lastProbeAt),
        lastError: this.lastProbeError
      },
      switches: {
        ...switchTotals,
        byPurpose: {
          fallback: { ...this.switchCounters.fallback },
          restore: { ...this.switchCounters.restore }
        },
        lastFailure: this.lastSwitchFailure
          ? { ...this.lastSwitchFailure, at: new Date(this.lastSwitchFailure.at).toISOString() }
          : null
      },
      monitor: {
        running: this.monitorRunning,
        phase: this.monitorPhase,
        transitions: mapFrom(this.transitionCounters),
        lastTransitionAt: toIso(this.lastTransitionAt),
        configErrors: this.configErrors,
        cycles: this.cycles
      },
      latencies: Object.fromEntries(
        Array.from(this.latencyStats.entries()).map(([metric, stats]) => [
          metric,
          {
            ...stats,
            minMs: Number.isFinite(stats.minMs) ? stats.minMs : 0,
            averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
          }
        ])
      )
    };
  }

  exportLogLevelCountersForPrometheus(options: PrometheusLogLevelOptions = {}) {
    const baseLabels = options.labels ?? {};
    const lines: string[] = [];

    const levelSamples = Array.from(this.logLevelCounters.entries())
      .sort(([a], [b]) => compareLogLevels(a, b))
      .map(([level, value]) => ({ value, labels: { level } }));
    const levelMetric = formatPrometheusGauge(levelSamples, {
      metricName: options.levelMetricName ?? 'linkwatch_log_level_total',
      help: options.levelHelp ?? 'Total log events grouped by Pino level',
      labels: baseLabels
    });
    if (levelMetric) {
      lines.push(levelMetric);
    }

    const stateMetric = formatPrometheusGauge([{ value: 1, labels: { level: this.currentLogLevel } }], {
      metricName: options.stateMetricName ?? 'linkwatch_log_level_state',
      help: options.stateHelp ?? 'Current active Pino log level',
      labels: baseLabels
    });
    if (stateMetric) {
      lines.push(stateMetric);
    }

    return lines.join('\n\n');
  }

  exportForPrometheus(options: PrometheusExportOptions = {}): string {
    const prefix = options.prefix ?? 'linkwatch';
    const labels = options.labels ?? {};
    const sections: string[] = [];
    const push = (section: string) => {
      if (section) {
        sections.push(section);
      }
    };

    push(
      this.exportLogLevelCountersForPrometheus({
        labels,
        levelMetricName: `${prefix}_log_level_total`,
        stateMetricName: `${prefix}_log_level_state`
      })
    );

    push(
      formatPrometheusGauge(
        [
          { value: this.probeOnline, labels: { outcome: 'online' } },
          { value: this.probeOffline, labels: { outcome: 'offline' } }
        ],
        { metricName: `${prefix}_probes_total`, help: 'Telemetry probes grouped by verdict', labels }
      )
    );

    push(
      formatPrometheusGauge(
        Array.from(this.probeErrors.entries()).map(([reason, value]) => ({ value, labels: { reason } })),
        { metricName: `${prefix}_probe_failures_total`, help: 'Offline verdicts grouped by cause', labels }
      )
    );

    push(
      formatPrometheusGauge(
        SWITCH_PURPOSES.flatMap(purpose => [
          { value: this.switchCounters[purpose].succeeded, labels: { purpose, result: 'ok' } },
          { value: this.switchCounters[purpose].failed, labels: { purpose, result: 'error' } }
        ]),
        { metricName: `${prefix}_scene_switches_total`, help: 'Scene switch attempts by purpose and result', labels }
      )
    );

    push(
      formatPrometheusGauge(
        Array.from(this.transitionCounters.entries()).map(([transition, value]) => ({
          value,
          labels: { transition }
        })),
        { metricName: `${prefix}_phase_transitions_total`, help: 'Failure detector phase transitions', labels }
      )
    );

    push(
      formatPrometheusGauge([{ value: this.monitorRunning ? 1 : 0 }], {
        metricName: `${prefix}_monitor_running`,
        help: 'Whether the monitor loop is running',
        labels
      })
    );

    push(
      formatPrometheusGauge(
        Array.from(this.severityCounters.entries()).map(([severity, value]) => ({ value, labels: { severity } })),
        { metricName: `${prefix}_events_total`, help: 'Events emitted on the bus by severity', labels }
      )
    );

    return sections.length > 0 ? `${sections.join('\n\n')}\n` : '';
  }
}

function createSwitchCounters(): Record<SwitchPurpose, SwitchCounters> {
  return {
    fallback: { attempts: 0, succeeded: 0, failed: 0 },
    restore: { attempts: 0, succeeded: 0, failed: 0 }
  };
}

function increment(map: Map<string, number>, key: string, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function mapFrom(map: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(map.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function toIso(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString();
}

function compareLogLevels(a: string, b: string): number {
  const indexA = LOG_LEVEL_ORDER.indexOf(a);
  const indexB = LOG_LEVEL_ORDER.indexOf(b);
  if (indexA === -1 || indexB === -1) {
    return a.localeCompare(b);
  }
  return indexA - indexB;
}

/**
 * Collapses verdict errors into a bounded label set so threshold summaries and
 * transport messages do not explode metric cardinality.
 */
export function categorizeProbeError(error: string | undefined): string {
  if (!error) {
    return 'unknown';
  }
  if (error === 'timeout') {
    return 'timeout';
  }
  if (error.startsWith('HTTP ')) {
    return 'http';
  }
  if (error.startsWith('parse error')) {
    return 'parse';
  }
  if (error === 'publisher not connected') {
    return 'disconnected';
  }
  if (error.startsWith('transport error')) {
    return 'transport';
  }
  return 'threshold';
}

function formatPrometheusGauge(
  samples: PrometheusGaugeSample[],
  options: { metricName: string; help?: string; labels?: Record<string, string> }
): string {
  const filtered = samples.filter(sample => Number.isFinite(sample.value));
  if (filtered.length === 0) {
    return '';
  }

  const metricName = sanitizePrometheusMetricName(options.metricName);
  const lines: string[] = [];
  if (options.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(options.help)}`);
  }
  lines.push(`# TYPE ${metricName} gauge`);

  for (const sample of filtered) {
    const labelString = formatPrometheusLabels({ ...options.labels, ...sample.labels });
    lines.push(`${metricName}${labelString} ${sample.value}`);
  }

  return lines.join('\n');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const rendered = entries.map(
    ([key, value]) => `${sanitizePrometheusLabelName(key)}="${escapePrometheusLabelValue(value)}"`
  );
  return `{${rendered.join(',')}}`;
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'linkwatch_metric';
  }
  if (/^[0-9]/.test(lower)) {
    return `linkwatch_${lower}`;
  }
  return lower;
}

function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'label';
  }
  if (/^[0-9]/.test(lower)) {
    return `_${lower}`;
  }
  return lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
