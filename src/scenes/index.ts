import logger, { type MonitorLogger } from '../logger.js';

/**
 * Broadcast software control surface. Hosts supply an implementation; the
 * monitor never speaks a switcher's wire protocol itself.
 */
export interface SceneSwitcher {
  /** Resolves false (or rejects) when the switch was not applied. */
  switchScene(name: string): Promise<boolean>;
  /** Resolves null when the active scene cannot be determined. */
  getCurrentScene(): Promise<string | null>;
}

/**
 * Records scene changes in memory and logs them. Used when the service runs
 * without a broadcast integration.
 */
export class DryRunSceneSwitcher implements SceneSwitcher {
  private current: string | null;
  private readonly log: MonitorLogger;

  constructor(options: { initialScene?: string | null; logger?: MonitorLogger } = {}) {
    this.current = options.initialScene ?? null;
    this.log = options.logger ?? logger;
  }

  async switchScene(name: string): Promise<boolean> {
    this.log.info({ component: 'scenes', from: this.current, to: name }, 'Dry-run scene switch');
    this.current = name;
    return true;
  }

  async getCurrentScene(): Promise<string | null> {
    return this.current;
  }
}
