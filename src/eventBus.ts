import { EventEmitter } from 'node:events';
import logger, { type MonitorLogger } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { storeEvent } from './db.js';
import {
  EventPayload,
  EventRecord,
  EventSeverity,
  EventSuppressionRule,
  RateLimitConfig
} from './types.js';

const EVENT_CHANNEL = 'event';

interface EventBusDependencies {
  store: (event: EventRecord) => void;
  log: MonitorLogger;
  metrics?: MetricsRegistry;
}

interface InternalSuppressionRule {
  id: string;
  detectors?: string[];
  severities?: EventSeverity[];
  suppressForMs?: number;
  rateLimit?: RateLimitConfig;
  reason: string;
  suppressedUntil: number;
  history: number[];
}

type SuppressionHit = {
  rule: InternalSuppressionRule;
  type: 'window' | 'rate-limit';
};

class EventBus extends EventEmitter {
  private suppressionRules: InternalSuppressionRule[] = [];
  private readonly store: (event: EventRecord) => void;
  private readonly log: MonitorLogger;
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: EventBusDependencies = { store: storeEvent, log: logger }) {
    super();
    this.store = dependencies.store;
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;

    this.on(EVENT_CHANNEL, (event: EventRecord) => {
      try {
        this.store(event);
      } catch (error) {
        this.log.error({ err: error, detector: event.detector }, 'Failed to persist event');
      }
      this.metrics.recordEvent(event);
      this.log.info(
        {
          detector: event.detector,
          source: event.source,
          severity: event.severity,
          meta: event.meta
        },
        event.message
      );
    });
  }

  configureSuppression(rules: EventSuppressionRule[]) {
    this.suppressionRules = rules.map(rule => normalizeSuppressionRule(rule));
  }

  resetSuppressionState() {
    for (const rule of this.suppressionRules) {
      rule.suppressedUntil = 0;
      rule.history.length = 0;
    }
  }

  emitEvent(payload: EventPayload): boolean {
    const normalized: EventRecord = {
      ts: normalizeTimestamp(payload.ts),
      source: payload.source,
      detector: payload.detector,
      severity: payload.severity,
      message: payload.message,
      meta: payload.meta
    };

    const hit = this.evaluateSuppression(normalized);
    if (hit) {
      this.metrics.recordSuppressedEvent({
        ruleId: hit.rule.id,
        reason: hit.rule.reason,
        detector: normalized.detector,
        type: hit.type
      });
      this.log.info(
        {
          detector: normalized.detector,
          source: normalized.source,
          severity: normalized.severity,
          suppressionRuleId: hit.rule.id,
          suppressionType: hit.type,
          suppressionReason: hit.rule.reason
        },
        'Event suppressed'
      );
      return false;
    }

    this.emit(EVENT_CHANNEL, normalized);
    return true;
  }

  private evaluateSuppression(event: EventRecord): SuppressionHit | null {
    for (const rule of this.suppressionRules) {
      if (!ruleMatchesEvent(rule, event)) {
        continue;
      }

      if (event.ts < rule.suppressedUntil) {
        return { rule, type: 'window' };
      }

      if (rule.rateLimit) {
        const cutoff = event.ts - rule.rateLimit.perMs;
        while (rule.history.length > 0 && rule.history[0] <= cutoff) {
          rule.history.shift();
        }
        if (rule.history.length >= rule.rateLimit.count) {
          if (rule.suppressForMs) {
            rule.suppressedUntil = event.ts + rule.suppressForMs;
          }
          return { rule, type: 'rate-limit' };
        }
        rule.history.push(event.ts);
        continue;
      }

      if (rule.suppressForMs) {
        rule.suppressedUntil = event.ts + rule.suppressForMs;
      }
    }

    return null;
  }
}

function normalizeTimestamp(ts?: number | Date): number {
  if (typeof ts === 'undefined' || ts === null) {
    return Date.now();
  }

  if (ts instanceof Date) {
    return ts.getTime();
  }

  return ts;
}

function normalizeSuppressionRule(rule: EventSuppressionRule): InternalSuppressionRule {
  return {
    id: rule.id,
    detectors: asArray(rule.detector),
    severities: asArray(rule.severity),
    suppressForMs: rule.suppressForMs && rule.suppressForMs > 0 ? Math.floor(rule.suppressForMs) : undefined,
    rateLimit: rule.rateLimit
      ? {
          count: Math.max(1, Math.floor(rule.rateLimit.count)),
          perMs: Math.max(1, Math.floor(rule.rateLimit.perMs))
        }
      : undefined,
    reason: rule.reason,
    suppressedUntil: 0,
    history: []
  };
}

function asArray<T>(value: T | T[] | undefined): T[] | undefined {
  if (typeof value === 'undefined') {
    return undefined;
  }
  return Array.isArray(value) ? value : [value];
}

function ruleMatchesEvent(rule: InternalSuppressionRule, event: EventRecord): boolean {
  if (rule.detectors && !rule.detectors.includes(event.detector)) {
    return false;
  }

  if (rule.severities && !rule.severities.includes(event.severity)) {
    return false;
  }

  return true;
}

const eventBus = new EventBus();

export default eventBus;
export { EventBus };
export type { EventRecord };
