export type EventSeverity = 'info' | 'warning' | 'critical';

/** Event as emitted; `ts` defaults to the bus clock. */
export interface EventPayload {
  ts?: number | Date;
  source: string;
  detector: string;
  severity: EventSeverity;
  message: string;
  meta?: Record<string, unknown>;
}

export interface EventRecord {
  ts: number;
  source: string;
  detector: string;
  severity: EventSeverity;
  message: string;
  meta: Record<string, unknown> | undefined;
}

export type StoredEvent = EventRecord & { id: number };

/** Filters for the event history; ranges are inclusive epoch milliseconds. */
export interface EventQuery {
  limit?: number;
  offset?: number;
  detector?: string;
  source?: string;
  severity?: EventSeverity;
  since?: number;
  until?: number;
}

export interface EventPage {
  items: StoredEvent[];
  total: number;
}

export interface RateLimitConfig {
  count: number;
  perMs: number;
}

export interface EventSuppressionRule {
  id: string;
  detector?: string | string[];
  severity?: EventSeverity | EventSeverity[];
  suppressForMs?: number;
  rateLimit?: RateLimitConfig;
  reason: string;
}
