import eventBus, { type EventBus } from '../eventBus.js';
import type { EventSeverity } from '../types.js';

export type NotificationSeverity = 'info' | 'warning' | 'error';

export interface NotificationSink {
  notify(message: string, severity: NotificationSeverity, meta?: Record<string, unknown>): void | Promise<void>;
}

const SEVERITY_MAP: Record<NotificationSeverity, EventSeverity> = {
  info: 'info',
  warning: 'warning',
  error: 'critical'
};

export type EventBusNotifierOptions = {
  bus?: EventBus;
  source?: string;
  detector?: string;
};

/** Publishes notifications as bus events so they are stored, counted and logged. */
export class EventBusNotifier implements NotificationSink {
  private readonly bus: EventBus;
  private readonly source: string;
  private readonly detector: string;

  constructor(options: EventBusNotifierOptions = {}) {
    this.bus = options.bus ?? eventBus;
    this.source = options.source ?? 'monitor';
    this.detector = options.detector ?? 'failover';
  }

  notify(message: string, severity: NotificationSeverity, meta?: Record<string, unknown>) {
    this.bus.emitEvent({
      source: this.source,
      detector: this.detector,
      severity: SEVERITY_MAP[severity],
      message,
      meta
    });
  }
}
