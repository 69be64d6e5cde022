export type HealthChecks = Readonly<{
  bitrate: boolean;
  rtt: boolean;
  dropped: boolean;
}>;

/** One probe verdict. `error` is set whenever `online` is false and a cause is known. */
export type EncoderHealth = Readonly<{
  online: boolean;
  connected: boolean;
  bitrateKbps: number;
  rttMs: number;
  droppedPackets: number;
  checks: HealthChecks;
  error?: string;
  checkedAt: number;
}>;

export type ProbeResponse = Readonly<{
  status: number | null;
  body: string | null;
  durationMs: number;
}>;

export type ProbeInspection = Readonly<{
  health: EncoderHealth;
  response: ProbeResponse;
}>;

/** What the loop needs from a probe; {@link HealthProbe} is the HTTP implementation. */
export interface HealthCheck {
  checkHealth(): Promise<EncoderHealth>;
  inspect(): Promise<ProbeInspection>;
}

export type MonitorPhase = 'healthy' | 'pending-failure' | 'failed';

export type MonitorState = Readonly<{
  phase: MonitorPhase;
  pendingSince: number | null;
  lastKnownGoodScene: string | null;
  fallbackEngaged: boolean;
  lastHealth: EncoderHealth | null;
  cycles: number;
  lastCycleAt: number | null;
}>;

export type PhaseTransition = 'enter-failed' | 'enter-healthy';

export type MonitorStatus = Readonly<{
  running: boolean;
  phase: MonitorPhase;
  pendingSince: number | null;
  lastKnownGoodScene: string | null;
  fallbackActive: boolean;
  lastHealth: EncoderHealth | null;
  cycles: number;
  lastCycleAt: number | null;
  configError: string | null;
}>;

export function createInitialState(): MonitorState {
  return Object.freeze({
    phase: 'healthy',
    pendingSince: null,
    lastKnownGoodScene: null,
    fallbackEngaged: false,
    lastHealth: null,
    cycles: 0,
    lastCycleAt: null
  });
}
