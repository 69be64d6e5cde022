import type { LinkwatchConfig } from '../config/index.js';
import type { EncoderHealth, MonitorStatus, ProbeInspection } from './types.js';

function describeState(status: MonitorStatus, config: LinkwatchConfig) {
  if (status.running) {
    return 'active';
  }
  return config.monitor.enabled ? 'stopped' : 'disabled';
}

function describeEndpoint(statsUrl: string | undefined) {
  const raw = statsUrl?.trim() ?? '';
  if (!raw) {
    return 'not configured';
  }
  try {
    return new URL(raw).host;
  } catch {
    return raw;
  }
}

export function describeHealth(health: EncoderHealth | null): string {
  if (!health) {
    return 'no sample yet';
  }
  if (health.online) {
    return `connected, ${health.bitrateKbps} kbps, ${health.rttMs} ms RTT, ${health.droppedPackets} pkts dropped`;
  }
  return `offline (${health.error ?? 'unknown error'})`;
}

export function formatMonitorStatus(status: MonitorStatus, config: LinkwatchConfig): string {
  const { monitor, telemetry } = config;
  const lines = [
    `Connection monitor: ${describeState(status, config)}`,
    `Phase: ${status.phase}`,
    `Fallback scene: ${monitor.fallbackScene}`,
    `Check interval: ${monitor.checkIntervalSec}s`,
    `Timeout: ${monitor.timeoutThresholdSec}s`,
    `Return behavior: ${monitor.returnBehavior}`,
    `Thresholds: bitrate >= ${telemetry.bitrateThresholdKbps} kbps, rtt <= ${telemetry.rttThresholdMs} ms, dropped <= ${telemetry.droppedThreshold} pkts`,
    `Endpoint: ${describeEndpoint(telemetry.statsUrl)}`,
    `Notifications: ${monitor.notifications === false ? 'disabled' : 'enabled'}`,
    `Encoder: ${describeHealth(status.lastHealth)}`
  ];

  if (status.pendingSince !== null) {
    lines.push(`Unhealthy since: ${new Date(status.pendingSince).toISOString()}`);
  }
  if (status.fallbackActive) {
    lines.push(`Fallback active: ${monitor.fallbackScene}`);
  }
  if (status.lastKnownGoodScene) {
    lines.push(`Scene before failover: ${status.lastKnownGoodScene}`);
  }
  if (status.configError) {
    lines.push(`Config error: ${status.configError}`);
  }

  return lines.join('\n');
}

function mark(ok: boolean) {
  return ok ? 'ok' : 'failed';
}

/** Diagnostic report including the raw endpoint response. */
export function formatProbeReport(inspection: ProbeInspection): string {
  const { health, response } = inspection;
  const lines = [`Probe: ${health.online ? 'online' : 'offline'}`];

  if (health.error) {
    lines.push(`Error: ${health.error}`);
  }
  lines.push(`HTTP status: ${response.status ?? 'none'}`);
  lines.push(`Duration: ${Math.round(response.durationMs)} ms`);

  if (health.connected || health.error === 'publisher not connected') {
    lines.push(
      `Parsed: connected=${health.connected} bitrate=${health.bitrateKbps} kbps rtt=${health.rttMs} ms dropped=${health.droppedPackets} pkts`
    );
  }
  if (health.connected) {
    lines.push(
      `Checks: bitrate ${mark(health.checks.bitrate)}, rtt ${mark(health.checks.rtt)}, dropped ${mark(health.checks.dropped)}`
    );
  }

  lines.push('Raw response:');
  lines.push(response.body === null || response.body === '' ? '(none)' : response.body);

  return lines.join('\n');
}
