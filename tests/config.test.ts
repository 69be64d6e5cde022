import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ConfigManager,
  loadConfigFromFile,
  parseConfig,
  parseReturnBehavior,
  resolveMonitorConfig,
  validateConfig,
  type ConfigReloadEvent,
  type LinkwatchConfig
} from '../src/config/index.js';
import { ConfigError } from '../src/errors.js';
import { createConfig } from './helpers/monitor.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('ConfigValidation', () => {
  it('ConfigDefaultFile loads the shipped defaults', () => {
    const config = loadConfigFromFile(path.resolve('config/default.json'));

    expect(config.monitor).toEqual({
      enabled: false,
      checkIntervalSec: 15,
      timeoutThresholdSec: 60,
      fallbackScene: 'BRB',
      returnBehavior: 'previous',
      notifications: true
    });
    expect(config.telemetry.statsUrl).toBe('');
  });

  it('ConfigSchemaErrors reports missing sections and unknown keys', () => {
    const { monitor: _monitor, ...withoutMonitor } = createConfig();
    expect(() => validateConfig(withoutMonitor)).toThrow('config.monitor is required');

    const withExtra = { ...createConfig(), monitor: { ...createConfig().monitor, pollEvery: 5 } };
    expect(() => validateConfig(withExtra)).toThrow('config.monitor.pollEvery is not allowed');

    const tooFast = createConfig({ monitor: { checkIntervalSec: 0 } });
    expect(() => validateConfig(tooFast)).toThrow('config.monitor.checkIntervalSec must be >= 1');
  });

  it('ConfigLogicalErrors rejects fractional intervals and blank scenes', () => {
    const config = createConfig({ monitor: { checkIntervalSec: 1.5, fallbackScene: '  ' } });

    expect(() => validateConfig(config)).toThrow(
      'config.monitor.checkIntervalSec must be a positive integer; config.monitor.fallbackScene must be a non-empty string'
    );
  });

  it('ConfigSuppressionRules requires a window or a rate limit', () => {
    const config = createConfig({
      events: { suppression: { rules: [{ id: 'quiet', reason: 'no limits' }] } }
    });

    expect(() => validateConfig(config)).toThrow(
      'config.events.suppression.rules[0] must define suppressForMs or rateLimit'
    );
  });

  it('ConfigParse surfaces JSON syntax errors', () => {
    expect(() => parseConfig('{ "app": ')).toThrow(/^Failed to parse configuration: /);
  });
});

describe('parseReturnBehavior', () => {
  it('recognizes the keywords case-insensitively and treats anything else as a scene', () => {
    expect(parseReturnBehavior(' Previous ')).toEqual({ kind: 'previous' });
    expect(parseReturnBehavior('MANUAL')).toEqual({ kind: 'manual' });
    expect(parseReturnBehavior(' Starting Soon ')).toEqual({ kind: 'scene', scene: 'Starting Soon' });
  });
});

describe('resolveMonitorConfig', () => {
  it('builds an immutable monitor configuration', () => {
    const resolved = resolveMonitorConfig(
      createConfig({ monitor: { fallbackScene: ' BRB ', returnBehavior: 'manual', notifications: false } })
    );

    expect(resolved.statsEndpoint.href).toBe('http://relay.test/stats');
    expect(resolved.requestTimeoutMs).toBe(10_000);
    expect(resolved.fallbackScene).toBe('BRB');
    expect(resolved.returnBehavior).toEqual({ kind: 'manual' });
    expect(resolved.notificationsEnabled).toBe(false);
    expect(resolved.checkIntervalSec).toBe(15);
    expect(resolved.timeoutThresholdSec).toBe(60);
    expect(Object.isFrozen(resolved)).toBe(true);
  });

  it.each([
    ['', 'No telemetry stats URL configured'],
    ['   ', 'No telemetry stats URL configured'],
    ['not a url', 'Telemetry stats URL "not a url" is not a valid URL'],
    ['ftp://relay.test/stats', 'Telemetry stats URL must use http or https (got ftp:)']
  ])('raises a ConfigError for stats URL %j', (statsUrl, message) => {
    const error = captureError(() => resolveMonitorConfig(createConfig({ telemetry: { statsUrl } })));

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ message, field: 'telemetry.statsUrl' });
  });
});

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'linkwatch-config-'));
    configPath = path.join(tempDir, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify(createConfig()));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(config: LinkwatchConfig) {
    fs.writeFileSync(configPath, JSON.stringify(config));
  }

  it('ConfigReload emits the previous and next documents', () => {
    const manager = new ConfigManager(configPath);
    const events: ConfigReloadEvent[] = [];
    manager.on('reload', (event: ConfigReloadEvent) => events.push(event));

    writeConfig(createConfig({ monitor: { fallbackScene: 'Technical Difficulties' } }));
    const next = manager.reload();

    expect(next.monitor.fallbackScene).toBe('Technical Difficulties');
    expect(manager.getConfig()).toBe(next);
    expect(events).toHaveLength(1);
    expect(events[0]?.previous.monitor.fallbackScene).toBe('BRB');
    expect(events[0]?.next).toBe(next);
  });

  it('ConfigReloadInvalid keeps the current document', () => {
    const manager = new ConfigManager(configPath);
    const before = manager.getConfig();

    fs.writeFileSync(configPath, '{ not json');

    expect(() => manager.reload()).toThrow(/^Failed to parse configuration/);
    expect(manager.getConfig()).toBe(before);
  });

  it('ConfigWatch reloads after the file changes', async () => {
    const manager = new ConfigManager(configPath);
    const reloaded = new Promise<ConfigReloadEvent>(resolve => manager.once('reload', resolve));
    const stopWatching = manager.watch();

    try {
      writeConfig(createConfig({ monitor: { checkIntervalSec: 5 } }));
      const event = await reloaded;
      expect(event.next.monitor.checkIntervalSec).toBe(5);
    } finally {
      stopWatching();
    }
  });
});
