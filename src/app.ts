import metrics, { type MetricsSnapshot } from './metrics/index.js';
import { describeError } from './errors.js';

export type HealthStatus = 'ok' | 'degraded';

export type HealthIndicatorContext = {
  metrics?: MetricsSnapshot;
  metricsCreatedAt?: string;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type HealthCheckResult = {
  name: string;
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthPayload = {
  status: HealthStatus;
  checkedAt: string;
  checks: HealthCheckResult[];
};

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredIndicator = {
  name: string;
  indicator: HealthIndicator;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const healthIndicators: RegisteredIndicator[] = [];
const shutdownHooks: RegisteredHook[] = [];

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  const existingIndex = healthIndicators.findIndex(entry => entry.name === name);
  const entry: RegisteredIndicator = { name, indicator };
  if (existingIndex >= 0) {
    healthIndicators[existingIndex] = entry;
  } else {
    healthIndicators.push(entry);
  }

  return () => {
    const index = healthIndicators.findIndex(item => item.name === name);
    if (index >= 0) {
      healthIndicators.splice(index, 1);
    }
  };
}

export async function collectHealthChecks(context: HealthIndicatorContext = {}): Promise<HealthCheckResult[]> {
  const results: HealthCheckResult[] = [];
  const metricsSnapshot = context.metrics ?? metrics.snapshot();
  const enrichedContext: HealthIndicatorContext = {
    ...context,
    metrics: metricsSnapshot,
    metricsCreatedAt: metricsSnapshot.createdAt
  };
  for (const entry of healthIndicators) {
    try {
      const result = await entry.indicator(enrichedContext);
      results.push({ name: entry.name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'degraded',
        details: {
          error: describeError(error)
        }
      });
    }
  }
  return results;
}

export async function buildHealthPayload(context: HealthIndicatorContext = {}): Promise<HealthPayload> {
  const checks = await collectHealthChecks(context);
  return {
    status: checks.some(check => check.status !== 'ok') ? 'degraded' : 'ok',
    checkedAt: new Date().toISOString(),
    checks
  };
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: string }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({ name: entry.name, status: 'error', error: describeError(error) });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
}
