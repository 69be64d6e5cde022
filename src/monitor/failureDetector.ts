import type { EncoderHealth, MonitorPhase, PhaseTransition } from './types.js';

export type DetectorState = {
  phase: MonitorPhase;
  pendingSince: number | null;
};

export type DetectorStep = Readonly<
  DetectorState & {
    transition: PhaseTransition | null;
  }
>;

export type FailureDetectorOptions = {
  timeoutThresholdMs: number;
  /** Time each unhealthy verdict accounts for; defaults to the check interval. */
  sampleWindowMs: number;
};

/**
 * Debounced failure entry, immediate recovery. An unhealthy run enters
 * `failed` once `now - pendingSince + sampleWindowMs` reaches the threshold.
 */
export class FailureDetector {
  private readonly timeoutThresholdMs: number;
  private readonly sampleWindowMs: number;

  constructor(options: FailureDetectorOptions) {
    this.timeoutThresholdMs = Math.max(0, options.timeoutThresholdMs);
    this.sampleWindowMs = Math.max(0, options.sampleWindowMs);
  }

  advance(state: DetectorState, health: EncoderHealth, now: number): DetectorStep {
    switch (state.phase) {
      case 'healthy':
        if (health.online) {
          return step('healthy', null, null);
        }
        return step('pending-failure', now, null);

      case 'pending-failure':
        if (health.online) {
          return step('healthy', null, null);
        }
        return this.evaluatePending(state.pendingSince ?? now, now);

      case 'failed':
        if (health.online) {
          return step('healthy', null, 'enter-healthy');
        }
        return step('failed', null, null);
    }
  }

  elapsedMs(pendingSince: number, now: number): number {
    return now - pendingSince + this.sampleWindowMs;
  }

  private evaluatePending(pendingSince: number, now: number): DetectorStep {
    if (this.elapsedMs(pendingSince, now) >= this.timeoutThresholdMs) {
      return step('failed', null, 'enter-failed');
    }
    return step('pending-failure', pendingSince, null);
  }
}

function step(phase: MonitorPhase, pendingSince: number | null, transition: PhaseTransition | null): DetectorStep {
  return Object.freeze({ phase, pendingSince, transition });
}
