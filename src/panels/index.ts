import logger, { type MonitorLogger } from '../logger.js';
import type { LinkwatchConfig } from '../config/index.js';
import { TargetUnreachableError, describeError } from '../errors.js';
import type { MonitorLoop } from '../monitor/monitorLoop.js';
import { describeHealth, formatMonitorStatus, formatProbeReport } from '../monitor/status.js';
import type { MonitorStatus, ProbeInspection } from '../monitor/types.js';

export type PanelContent = Readonly<{
  title: string;
  body: string;
  updatedAt: number;
}>;

/** A display surface that can be overwritten in place (a chat message, a dashboard tile). */
export interface Updatable {
  display(content: PanelContent): Promise<void>;
}

export type RefreshOutcome = {
  delivered: string[];
  evicted: string[];
  failed: string[];
};

export function renderStatusPanel(status: MonitorStatus, config: LinkwatchConfig, now = Date.now()): PanelContent {
  return Object.freeze({
    title: 'Connection Monitor',
    body: formatMonitorStatus(status, config),
    updatedAt: now
  });
}

export function renderProbePanel(inspection: ProbeInspection, options: { raw?: boolean } = {}): PanelContent {
  const { health } = inspection;
  const body = options.raw
    ? formatProbeReport(inspection)
    : `${health.online ? 'Encoder online' : 'Encoder offline'}: ${describeHealth(health)}`;
  return Object.freeze({
    title: options.raw ? 'Telemetry Debug' : 'Connection Test',
    body,
    updatedAt: health.checkedAt
  });
}

/**
 * Open panels by id. A panel is evicted only when its `display` rejects with
 * {@link TargetUnreachableError}; any other failure keeps it registered.
 */
export class PanelRegistry {
  private readonly panels = new Map<string, Updatable>();
  private readonly log: MonitorLogger;
  private pending: Promise<RefreshOutcome | null> = Promise.resolve(null);

  constructor(options: { logger?: MonitorLogger } = {}) {
    this.log = options.logger ?? logger;
  }

  register(id: string, target: Updatable): () => void {
    this.panels.set(id, target);
    return () => {
      if (this.panels.get(id) === target) {
        this.panels.delete(id);
      }
    };
  }

  unregister(id: string): boolean {
    return this.panels.delete(id);
  }

  has(id: string): boolean {
    return this.panels.has(id);
  }

  ids(): string[] {
    return Array.from(this.panels.keys());
  }

  get size(): number {
    return this.panels.size;
  }

  async refreshAll(content: PanelContent): Promise<RefreshOutcome> {
    const outcome: RefreshOutcome = { delivered: [], evicted: [], failed: [] };

    for (const [id, target] of Array.from(this.panels.entries())) {
      try {
        await target.display(content);
        outcome.delivered.push(id);
      } catch (error) {
        if (error instanceof TargetUnreachableError) {
          this.panels.delete(id);
          outcome.evicted.push(id);
          this.log.info({ component: 'panels', panel: id }, 'Panel no longer reachable; removed');
        } else {
          outcome.failed.push(id);
          this.log.warn({ component: 'panels', panel: id, err: describeError(error) }, 'Panel refresh failed');
        }
      }
    }

    return outcome;
  }

  /** Refreshes every panel with the rendered status after each monitor cycle. */
  attach(loop: MonitorLoop, config: () => LinkwatchConfig): () => void {
    const handler = () => {
      const content = renderStatusPanel(loop.status(), config());
      this.pending = this.pending.then(() => this.refreshAll(content));
    };
    loop.on('cycle', handler);
    loop.on('stopped', handler);
    return () => {
      loop.off('cycle', handler);
      loop.off('stopped', handler);
    };
  }

  /** Resolves with the outcome of the most recent attached refresh. */
  idle(): Promise<RefreshOutcome | null> {
    return this.pending;
  }
}
