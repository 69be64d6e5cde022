import logger, { type MonitorLogger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { ProbeSettings } from '../config/index.js';
import { ProtocolError, TransportError, describeError } from '../errors.js';
import type { EncoderHealth, HealthCheck, ProbeInspection } from './types.js';

export type FetchLike = (input: URL, init: { signal: AbortSignal }) => Promise<Response>;

export type HealthProbeOptions = {
  fetch?: FetchLike;
  logger?: MonitorLogger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

type LiveSample = {
  connected: boolean;
  bitrate: number;
  rtt: number;
  droppedPackets: number;
};

type RawResponse = {
  status: number;
  body: string;
};

const MAX_BODY_CHARS = 4_000;

const NO_CHECKS = Object.freeze({ bitrate: false, rtt: false, dropped: false });

/**
 * Reads the relay's publisher statistics and reduces them to an
 * {@link EncoderHealth} verdict. Neither method rejects: transport and
 * protocol failures come back as `online: false` with an error string.
 */
export class HealthProbe implements HealthCheck {
  private readonly fetchImpl: FetchLike;
  private readonly log: MonitorLogger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;

  constructor(
    private readonly settings: ProbeSettings,
    options: HealthProbeOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.log = options.logger ?? logger;
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? Date.now;
  }

  async checkHealth(): Promise<EncoderHealth> {
    const { health } = await this.inspect();
    return health;
  }

  async inspect(): Promise<ProbeInspection> {
    const startedAt = performance.now();
    let raw: RawResponse | null = null;
    let health: EncoderHealth;

    try {
      raw = await this.request();
      health = this.evaluate(raw);
    } catch (error) {
      health = offlineHealth(describeFailure(error), this.now());
    }

    const durationMs = Math.max(0, performance.now() - startedAt);
    this.metrics.recordProbe(health, durationMs);
    this.log.debug(
      {
        component: 'health-probe',
        online: health.online,
        bitrateKbps: health.bitrateKbps,
        rttMs: health.rttMs,
        droppedPackets: health.droppedPackets,
        error: health.error,
        durationMs: Math.round(durationMs)
      },
      'Encoder health probed'
    );

    return Object.freeze({
      health,
      response: Object.freeze({
        status: raw?.status ?? null,
        body: raw ? truncate(raw.body) : null,
        durationMs
      })
    });
  }

  private async request(): Promise<RawResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.settings.requestTimeoutMs);

    try {
      const response = await this.fetchImpl(this.settings.statsEndpoint, { signal: controller.signal });
      const body = await response.text();
      return { status: response.status, body };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError('timeout', true);
      }
      throw new TransportError(describeError(error));
    } finally {
      clearTimeout(timer);
    }
  }

  private evaluate(raw: RawResponse): EncoderHealth {
    const checkedAt = this.now();

    if (raw.status < 200 || raw.status >= 300) {
      throw new ProtocolError(`HTTP ${raw.status}`, raw.status);
    }

    const sample = parseSample(raw.body);

    if (!sample.connected) {
      return Object.freeze({
        online: false,
        connected: false,
        bitrateKbps: sample.bitrate,
        rttMs: sample.rtt,
        droppedPackets: sample.droppedPackets,
        checks: NO_CHECKS,
        error: 'publisher not connected',
        checkedAt
      });
    }

    const { bitrateThresholdKbps, rttThresholdMs, droppedThreshold } = this.settings;
    const checks = Object.freeze({
      bitrate: sample.bitrate >= bitrateThresholdKbps,
      rtt: sample.rtt <= rttThresholdMs,
      dropped: sample.droppedPackets <= droppedThreshold
    });

    const breaches: string[] = [];
    if (!checks.bitrate) {
      breaches.push(`bitrate ${sample.bitrate} kbps < ${bitrateThresholdKbps} kbps`);
    }
    if (!checks.rtt) {
      breaches.push(`rtt ${sample.rtt} ms > ${rttThresholdMs} ms`);
    }
    if (!checks.dropped) {
      breaches.push(`dropped ${sample.droppedPackets} pkts > ${droppedThreshold} pkts`);
    }

    const health: EncoderHealth = {
      online: breaches.length === 0,
      connected: true,
      bitrateKbps: sample.bitrate,
      rttMs: sample.rtt,
      droppedPackets: sample.droppedPackets,
      checks,
      checkedAt
    };

    return Object.freeze(breaches.length > 0 ? { ...health, error: breaches.join('; ') } : health);
  }
}

export function parseSample(body: string): LiveSample {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new ProtocolError(`parse error: ${describeError(error)}`);
  }

  const publishers = field(data, 'publishers');
  const live = field(publishers, 'live');
  if (!isRecord(live)) {
    throw new ProtocolError('parse error: publishers.live is missing');
  }

  const connected = live.connected;
  if (typeof connected !== 'boolean') {
    throw new ProtocolError('parse error: publishers.live.connected must be a boolean');
  }

  return {
    connected,
    bitrate: readNumber(live, 'bitrate'),
    rtt: readNumber(live, 'rtt'),
    droppedPackets: readInteger(live, 'dropped_pkts')
  };
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function readNumber(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ProtocolError(`parse error: publishers.live.${key} must be a number`);
  }
  return value;
}

function readInteger(record: Record<string, unknown>, key: string): number {
  const value = readNumber(record, key);
  if (!Number.isInteger(value)) {
    throw new ProtocolError(`parse error: publishers.live.${key} must be an integer`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeFailure(error: unknown): string {
  if (error instanceof TransportError) {
    return error.timedOut ? 'timeout' : `transport error: ${error.message}`;
  }
  if (error instanceof ProtocolError) {
    return error.message;
  }
  return `transport error: ${describeError(error)}`;
}

export function offlineHealth(error: string, checkedAt: number): EncoderHealth {
  return Object.freeze({
    online: false,
    connected: false,
    bitrateKbps: 0,
    rttMs: 0,
    droppedPackets: 0,
    checks: NO_CHECKS,
    error,
    checkedAt
  });
}

function truncate(body: string): string {
  return body.length > MAX_BODY_CHARS ? `${body.slice(0, MAX_BODY_CHARS)}…` : body;
}
