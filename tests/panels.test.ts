import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { PanelRegistry, renderProbePanel, type PanelContent, type Updatable } from '../src/panels/index.js';
import { PANEL_ACTION_IDS, dispatchPanelAction, isPanelAction } from '../src/panels/actions.js';
import { MonitorLoop } from '../src/monitor/monitorLoop.js';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { TargetUnreachableError } from '../src/errors.js';
import {
  FakeSceneSwitcher,
  ScriptedProbe,
  StaticConfigProvider,
  createConfig,
  createTestLogger,
  healthyVerdict
} from './helpers/monitor.js';

class RecordingPanel implements Updatable {
  readonly display: Mock<(content: PanelContent) => Promise<void>> = vi.fn<(content: PanelContent) => Promise<void>>(
    async () => {}
  );

  lastContent(): PanelContent | undefined {
    return this.display.mock.calls.at(-1)?.[0];
  }
}

const CONTENT: PanelContent = { title: 'Connection Monitor', body: 'Phase: healthy', updatedAt: 0 };

describe('PanelRegistry', () => {
  let logger: ReturnType<typeof createTestLogger>;
  let registry: PanelRegistry;

  beforeEach(() => {
    logger = createTestLogger();
    registry = new PanelRegistry({ logger });
  });

  it('PanelEviction removes only panels whose target is unreachable', async () => {
    const live = new RecordingPanel();
    const gone = new RecordingPanel();
    const flaky = new RecordingPanel();
    gone.display.mockRejectedValueOnce(new TargetUnreachableError('gone', 'message deleted'));
    flaky.display.mockRejectedValueOnce(new Error('rate limited'));
    registry.register('live', live);
    registry.register('gone', gone);
    registry.register('flaky', flaky);

    const outcome = await registry.refreshAll(CONTENT);

    expect(outcome).toEqual({ delivered: ['live'], evicted: ['gone'], failed: ['flaky'] });
    expect(registry.ids()).toEqual(['live', 'flaky']);
    expect(live.display).toHaveBeenCalledWith(CONTENT);
    expect(logger.info).toHaveBeenCalledWith(
      { component: 'panels', panel: 'gone' },
      'Panel no longer reachable; removed'
    );
    expect(logger.warn).toHaveBeenCalledWith(
      { component: 'panels', panel: 'flaky', err: 'rate limited' },
      'Panel refresh failed'
    );

    const retry = await registry.refreshAll(CONTENT);
    expect(retry).toEqual({ delivered: ['live', 'flaky'], evicted: [], failed: [] });
  });

  it('PanelRegistration replaces handles per id', () => {
    const first = new RecordingPanel();
    const second = new RecordingPanel();

    const unregisterFirst = registry.register('status', first);
    registry.register('status', second);
    unregisterFirst();

    expect(registry.has('status')).toBe(true);
    expect(registry.size).toBe(1);
    expect(registry.unregister('status')).toBe(true);
    expect(registry.unregister('status')).toBe(false);
  });

  it('renders probe results for quick tests', () => {
    const content = renderProbePanel({
      health: healthyVerdict({ checkedAt: 42 }),
      response: { status: 200, body: '{}', durationMs: 1 }
    });

    expect(content).toEqual({
      title: 'Connection Test',
      body: 'Encoder online: connected, 1500 kbps, 50 ms RTT, 0 pkts dropped',
      updatedAt: 42
    });
  });
});

describe('panel actions', () => {
  let provider: StaticConfigProvider;
  let probe: ScriptedProbe;
  let loop: MonitorLoop;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    provider = new StaticConfigProvider(createConfig());
    probe = new ScriptedProbe([healthyVerdict()]);
    const metrics = new MetricsRegistry();
    loop = new MonitorLoop({
      config: provider,
      sceneSwitcher: new FakeSceneSwitcher(),
      notifier: { notify: vi.fn() },
      bus: new EventBus({ store: vi.fn(), log: createTestLogger(), metrics }),
      logger: createTestLogger(),
      metrics,
      now: () => Date.now(),
      createProbe: () => probe
    });
  });

  afterEach(async () => {
    await loop.stop();
    vi.useRealTimers();
  });

  it('exposes a fixed action table', () => {
    expect(PANEL_ACTION_IDS).toEqual(['refresh', 'test', 'debug', 'toggle']);
    expect(isPanelAction('toggle')).toBe(true);
    expect(isPanelAction('toString')).toBe(false);
  });

  it('refresh renders the status onto the target', async () => {
    const target = new RecordingPanel();

    const content = await dispatchPanelAction('refresh', { loop, config: provider }, target);

    expect(target.display).toHaveBeenCalledWith(content);
    expect(content.title).toBe('Connection Monitor');
    expect(content.body.split('\n')[0]).toBe('Connection monitor: stopped');
  });

  it('test and debug run a diagnostic probe', async () => {
    const quick = await dispatchPanelAction('test', { loop, config: provider });
    const debug = await dispatchPanelAction('debug', { loop, config: provider });

    expect(quick.title).toBe('Connection Test');
    expect(debug.title).toBe('Telemetry Debug');
    expect(debug.body.split('\n')[0]).toBe('Probe: online');
    expect(probe.inspect).toHaveBeenCalledTimes(2);
    expect(loop.status().cycles).toBe(0);
  });

  it('toggle starts and stops monitoring', async () => {
    const started = await dispatchPanelAction('toggle', { loop, config: provider });
    expect(loop.isRunning()).toBe(true);
    expect(started.body.split('\n')[0]).toBe('Connection monitor: active');

    const stopped = await dispatchPanelAction('toggle', { loop, config: provider });
    expect(loop.isRunning()).toBe(false);
    expect(stopped.body.split('\n')[0]).toBe('Connection monitor: stopped');
  });

  it('rejects unknown actions', async () => {
    await expect(dispatchPanelAction('zoom', { loop, config: provider })).rejects.toThrow(
      'Unknown panel action "zoom" (available: refresh, test, debug, toggle)'
    );
  });

  it('PanelAttach refreshes registered panels after cycles and on stop', async () => {
    const registry = new PanelRegistry({ logger: createTestLogger() });
    const panel = new RecordingPanel();
    registry.register('status', panel);
    const detach = registry.attach(loop, () => provider.getConfig());

    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    await registry.idle();

    expect(panel.display).toHaveBeenCalledTimes(1);
    expect(panel.lastContent()?.body.split('\n')[0]).toBe('Connection monitor: active');

    await loop.stop();
    await registry.idle();

    expect(panel.display).toHaveBeenCalledTimes(2);
    expect(panel.lastContent()?.body.split('\n')[0]).toBe('Connection monitor: stopped');

    detach();
    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    await registry.idle();
    expect(panel.display).toHaveBeenCalledTimes(2);
  });
});
