/**
 * Failures the monitor distinguishes. Transport and protocol errors never leave
 * the health probe: they are folded into an unhealthy verdict.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    readonly timedOut = false
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export class ProtocolError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null
  ) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class SwitchError extends Error {
  constructor(
    readonly scene: string,
    readonly purpose: 'fallback' | 'restore',
    detail?: string
  ) {
    super(detail ? `Switch to "${scene}" failed: ${detail}` : `Switch to "${scene}" was rejected`);
    this.name = 'SwitchError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly field: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Raised by a display target that no longer exists (deleted message, closed socket). */
export class TargetUnreachableError extends Error {
  constructor(readonly targetId: string, detail?: string) {
    super(detail ? `Target ${targetId} unreachable: ${detail}` : `Target ${targetId} unreachable`);
    this.name = 'TargetUnreachableError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
