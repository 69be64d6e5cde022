import logger, { type MonitorLogger } from '../logger.js';
import metrics, { type MetricsRegistry, type SwitchPurpose } from '../metrics/index.js';
import type { MonitorConfig } from '../config/index.js';
import { SwitchError, describeError } from '../errors.js';
import type { NotificationSeverity, NotificationSink } from '../notify/index.js';
import type { SceneSwitcher } from '../scenes/index.js';
import type { EncoderHealth, MonitorState } from './types.js';

export type FailoverState = Pick<MonitorState, 'lastKnownGoodScene' | 'fallbackEngaged'>;

export type FailoverSettings = Pick<MonitorConfig, 'fallbackScene' | 'returnBehavior' | 'notificationsEnabled'>;

export type FailoverControllerDependencies = {
  sceneSwitcher: SceneSwitcher;
  notifier: NotificationSink;
  logger?: MonitorLogger;
  metrics?: MetricsRegistry;
};

export class FailoverController {
  private readonly switcher: SceneSwitcher;
  private readonly notifier: NotificationSink;
  private readonly log: MonitorLogger;
  private readonly metrics: MetricsRegistry;

  constructor(
    private readonly settings: FailoverSettings,
    dependencies: FailoverControllerDependencies
  ) {
    this.switcher = dependencies.sceneSwitcher;
    this.notifier = dependencies.notifier;
    this.log = dependencies.logger ?? logger;
    this.metrics = dependencies.metrics ?? metrics;
  }

  /**
   * Remembers the scene that was live before the failure and cuts to the
   * fallback scene. A failed switch leaves `fallbackEngaged` false so
   * {@link reconcile} retries it on the next cycle.
   */
  async enterFailed(state: FailoverState, health: EncoderHealth): Promise<FailoverState> {
    const { fallbackScene } = this.settings;
    const current = await this.readCurrentScene();
    const lastKnownGoodScene = current !== null && current !== fallbackScene ? current : state.lastKnownGoodScene;

    if (lastKnownGoodScene !== state.lastKnownGoodScene) {
      this.log.info({ component: 'failover', scene: lastKnownGoodScene }, 'Captured scene before failover');
    }

    const fallbackEngaged = await this.engageFallback(health);
    return { lastKnownGoodScene, fallbackEngaged };
  }

  async reconcile(state: FailoverState, health: EncoderHealth): Promise<FailoverState> {
    if (state.fallbackEngaged) {
      return state;
    }

    const current = await this.readCurrentScene();
    if (current === this.settings.fallbackScene) {
      this.log.info({ component: 'failover', scene: current }, 'Fallback scene already active');
      return { lastKnownGoodScene: state.lastKnownGoodScene, fallbackEngaged: true };
    }

    const fallbackEngaged = await this.engageFallback(health);
    return { lastKnownGoodScene: state.lastKnownGoodScene, fallbackEngaged };
  }

  async enterHealthy(state: FailoverState): Promise<FailoverState> {
    const behavior = this.settings.returnBehavior;

    if (behavior.kind === 'manual') {
      await this.notify('Connection restored. Manual scene control is enabled; no scene was switched.', 'info');
      return { lastKnownGoodScene: null, fallbackEngaged: false };
    }

    const target = behavior.kind === 'scene' ? behavior.scene : state.lastKnownGoodScene;
    if (target === null) {
      await this.notify(
        'Connection restored. No previous scene was recorded; manual scene control required.',
        'info'
      );
      return { lastKnownGoodScene: null, fallbackEngaged: false };
    }

    if (await this.switchTo(target, 'restore')) {
      await this.notify(`Connection restored. Switched back to "${target}".`, 'info', { scene: target });
      return { lastKnownGoodScene: null, fallbackEngaged: false };
    }

    return { lastKnownGoodScene: state.lastKnownGoodScene, fallbackEngaged: false };
  }

  private async engageFallback(health: EncoderHealth): Promise<boolean> {
    const { fallbackScene } = this.settings;
    if (!(await this.switchTo(fallbackScene, 'fallback'))) {
      return false;
    }

    const reason = health.error ?? 'encoder offline';
    await this.notify(`Connection lost (${reason}). Switched to "${fallbackScene}".`, 'warning', {
      scene: fallbackScene,
      reason
    });
    return true;
  }

  private async switchTo(scene: string, purpose: SwitchPurpose): Promise<boolean> {
    let failure: SwitchError | null = null;
    try {
      if (!(await this.switcher.switchScene(scene))) {
        failure = new SwitchError(scene, purpose);
      }
    } catch (error) {
      failure = new SwitchError(scene, purpose, describeError(error));
    }

    if (failure) {
      this.metrics.recordSceneSwitch(purpose, scene, false, failure.message);
      this.log.error({ component: 'failover', scene, purpose }, failure.message);
      return false;
    }

    this.metrics.recordSceneSwitch(purpose, scene, true);
    this.log.info({ component: 'failover', scene, purpose }, `Switched to scene "${scene}"`);
    return true;
  }

  private async readCurrentScene(): Promise<string | null> {
    try {
      return await this.switcher.getCurrentScene();
    } catch (error) {
      this.log.warn({ component: 'failover', err: describeError(error) }, 'Unable to read current scene');
      return null;
    }
  }

  private async notify(message: string, severity: NotificationSeverity, meta?: Record<string, unknown>) {
    if (!this.settings.notificationsEnabled) {
      return;
    }
    try {
      await this.notifier.notify(message, severity, meta);
    } catch (error) {
      this.log.warn({ component: 'failover', err: describeError(error) }, 'Notification delivery failed');
    }
  }
}
