import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { EventPayload, EventRecord } from '../src/types.js';
import { createTestLogger } from './helpers/monitor.js';

describe('EventBus', () => {
  let store: Mock<(event: EventRecord) => void>;
  let log: ReturnType<typeof createTestLogger>;
  let metrics: MetricsRegistry;
  let bus: EventBus;

  const basePayload: EventPayload = {
    source: 'monitor',
    detector: 'failover',
    severity: 'warning',
    message: 'Connection lost'
  };

  beforeEach(() => {
    store = vi.fn<(event: EventRecord) => void>();
    log = createTestLogger();
    metrics = new MetricsRegistry();
    bus = new EventBus({ store, log, metrics });
  });

  function suppressedLogs() {
    return log.info.mock.calls.filter(([, message]) => message === 'Event suppressed').map(([fields]) => fields);
  }

  it('EventBusPersist stores, counts and logs emitted events', () => {
    expect(bus.emitEvent({ ...basePayload, ts: new Date(5_000), meta: { scene: 'BRB' } })).toBe(true);

    expect(store).toHaveBeenCalledWith({
      ts: 5_000,
      source: 'monitor',
      detector: 'failover',
      severity: 'warning',
      message: 'Connection lost',
      meta: { scene: 'BRB' }
    });
    expect(log.info).toHaveBeenCalledWith(
      { detector: 'failover', source: 'monitor', severity: 'warning', meta: { scene: 'BRB' } },
      'Connection lost'
    );
    const snapshot = metrics.snapshot();
    expect(snapshot.events.total).toBe(1);
    expect(snapshot.events.bySeverity).toEqual({ warning: 1 });
    expect(snapshot.events.byDetector).toEqual({ failover: 1 });
  });

  it('EventBusStoreFailure keeps delivering when persistence throws', () => {
    store.mockImplementationOnce(() => {
      throw new Error('disk full');
    });

    expect(bus.emitEvent({ ...basePayload, ts: 0 })).toBe(true);

    expect(log.error).toHaveBeenCalledWith(
      { err: expect.any(Error), detector: 'failover' },
      'Failed to persist event'
    );
    expect(metrics.snapshot().events.total).toBe(1);
  });

  it('SuppressionWindow drops matching events until the window closes', () => {
    bus.configureSuppression([
      { id: 'failover-window', detector: 'failover', suppressForMs: 1_000, reason: 'deduplicate failover alerts' }
    ]);

    expect(bus.emitEvent({ ...basePayload, ts: 0 })).toBe(true);
    expect(bus.emitEvent({ ...basePayload, ts: 500 })).toBe(false);
    expect(bus.emitEvent({ ...basePayload, ts: 1_000 })).toBe(true);

    expect(store).toHaveBeenCalledTimes(2);
    expect(suppressedLogs()).toEqual([
      {
        detector: 'failover',
        source: 'monitor',
        severity: 'warning',
        suppressionRuleId: 'failover-window',
        suppressionType: 'window',
        suppressionReason: 'deduplicate failover alerts'
      }
    ]);
    expect(metrics.snapshot().events.suppressed).toBe(1);
    expect(metrics.snapshot().events.suppressedByRule).toEqual({ 'failover-window': 1 });
  });

  it('SuppressionRateLimit allows a burst per sliding window', () => {
    bus.configureSuppression([{ id: 'burst', rateLimit: { count: 2, perMs: 1_000 }, reason: 'burst limit' }]);

    const results = [0, 100, 200, 1_000, 1_050].map(ts => bus.emitEvent({ ...basePayload, ts }));

    expect(results).toEqual([true, true, false, true, false]);
    expect(suppressedLogs().map(fields => fields.suppressionType)).toEqual(['rate-limit', 'rate-limit']);
  });

  it('SuppressionRateLimitCooldown opens a window after the limit trips', () => {
    bus.configureSuppression([
      { id: 'cooldown', rateLimit: { count: 1, perMs: 1_000 }, suppressForMs: 500, reason: 'cooldown' }
    ]);

    expect(bus.emitEvent({ ...basePayload, ts: 0 })).toBe(true);
    expect(bus.emitEvent({ ...basePayload, ts: 100 })).toBe(false);
    expect(bus.emitEvent({ ...basePayload, ts: 500 })).toBe(false);
    expect(bus.emitEvent({ ...basePayload, ts: 1_100 })).toBe(true);

    expect(suppressedLogs().map(fields => fields.suppressionType)).toEqual(['rate-limit', 'window']);
  });

  it('SuppressionFilters only apply rules to matching detectors and severities', () => {
    bus.configureSuppression([
      { id: 'info-only', severity: 'info', suppressForMs: 10_000, reason: 'quiet info' },
      { id: 'config-only', detector: ['config'], suppressForMs: 10_000, reason: 'quiet config' }
    ]);

    expect(bus.emitEvent({ ...basePayload, ts: 0 })).toBe(true);
    expect(bus.emitEvent({ ...basePayload, ts: 1 })).toBe(true);
    expect(bus.emitEvent({ ...basePayload, severity: 'info', ts: 2 })).toBe(true);
    expect(bus.emitEvent({ ...basePayload, severity: 'info', ts: 3 })).toBe(false);
    expect(bus.emitEvent({ ...basePayload, detector: 'config', severity: 'critical', ts: 4 })).toBe(true);
    expect(bus.emitEvent({ ...basePayload, detector: 'config', severity: 'critical', ts: 5 })).toBe(false);
  });

  it('SuppressionReset clears open windows and history', () => {
    bus.configureSuppression([{ id: 'window', suppressForMs: 1_000, reason: 'window' }]);

    expect(bus.emitEvent({ ...basePayload, ts: 0 })).toBe(true);
    expect(bus.emitEvent({ ...basePayload, ts: 10 })).toBe(false);

    bus.resetSuppressionState();

    expect(bus.emitEvent({ ...basePayload, ts: 20 })).toBe(true);
  });
});
