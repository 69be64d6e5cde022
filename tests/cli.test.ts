import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import http from 'node:http';
import os from 'node:os';
import path from 'node:path';
import { runCli } from '../src/cli.js';
import { clearEvents, listEvents, storeEvent } from '../src/db.js';
import { getLogLevel, setLogLevel } from '../src/logger.js';
import { createConfig, createTestIo, telemetryBody, type ConfigOverrides } from './helpers/monitor.js';

type TelemetryReply = { status: number; body: string };

describe('linkwatch CLI', () => {
  let server: http.Server;
  let statsUrl: string;
  let reply: TelemetryReply;
  let tempDir: string;
  let configPath: string;

  beforeAll(async () => {
    server = http.createServer((_req, res) => {
      res.writeHead(reply.status, { 'Content-Type': 'application/json' });
      res.end(reply.body);
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('telemetry server has no port');
    }
    statsUrl = `http://127.0.0.1:${address.port}/stats`;
  });

  afterAll(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  beforeEach(() => {
    reply = { status: 200, body: telemetryBody() };
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'linkwatch-cli-'));
    configPath = path.join(tempDir, 'config.json');
    writeConfig();
    clearEvents();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    clearEvents();
    setLogLevel('silent');
  });

  function writeConfig(overrides: ConfigOverrides = {}) {
    const config = createConfig({ ...overrides, telemetry: { statsUrl, ...overrides.telemetry } });
    fs.writeFileSync(configPath, JSON.stringify(config));
  }

  it('CliProbe reports an online encoder', async () => {
    const capture = createTestIo();

    const exitCode = await runCli(['probe', '--config', configPath], capture.io);

    const lines = capture.stdout().trim().split('\n');
    expect(exitCode).toBe(0);
    expect(lines[0]).toBe('Probe: online');
    expect(lines[1]).toBe('HTTP status: 200');
    expect(lines).toContain('Parsed: connected=true bitrate=1500 kbps rtt=50 ms dropped=0 pkts');
    expect(lines).toContain('Checks: bitrate ok, rtt ok, dropped ok');
    expect(lines.at(-1)).toBe(telemetryBody());
  });

  it('CliProbe exits non-zero for an offline encoder', async () => {
    reply = { status: 503, body: 'unavailable' };
    const capture = createTestIo();

    const exitCode = await runCli([`--config=${configPath}`, 'probe'], capture.io);

    const lines = capture.stdout().trim().split('\n');
    expect(exitCode).toBe(1);
    expect(lines.slice(0, 3)).toEqual(['Probe: offline', 'Error: HTTP 503', 'HTTP status: 503']);
    expect(lines.at(-1)).toBe('unavailable');
  });

  it('CliProbe prints JSON on request', async () => {
    reply = { status: 200, body: telemetryBody({ rtt: 2500 }) };
    const capture = createTestIo();

    const exitCode = await runCli(['probe', '--json', '--config', configPath], capture.io);

    const payload = JSON.parse(capture.stdout());
    expect(exitCode).toBe(1);
    expect(payload.health).toMatchObject({
      online: false,
      connected: true,
      rttMs: 2500,
      checks: { bitrate: true, rtt: false, dropped: true },
      error: 'rtt 2500 ms > 2000 ms'
    });
    expect(payload.response).toMatchObject({ status: 200, body: telemetryBody({ rtt: 2500 }) });
  });

  it('CliProbe explains a missing stats URL', async () => {
    writeConfig({ telemetry: { statsUrl: '' } });
    const capture = createTestIo();

    const exitCode = await runCli(['probe', '--config', configPath], capture.io);

    expect(exitCode).toBe(1);
    expect(capture.stderr()).toBe('No telemetry stats URL configured\n');
  });

  it('CliConfigCheck summarizes a valid file', async () => {
    writeConfig({ monitor: { returnBehavior: 'manual' } });
    const capture = createTestIo();

    const exitCode = await runCli(['config', 'check', '--config', configPath], capture.io);

    expect(exitCode).toBe(0);
    expect(capture.stdout()).toBe(
      [
        `Configuration OK (${configPath})`,
        'Monitoring: enabled',
        'Fallback scene: BRB',
        'Return behavior: manual',
        ''
      ].join('\n')
    );
  });

  it('CliConfigCheck rejects invalid files', async () => {
    fs.writeFileSync(configPath, JSON.stringify(createConfig({ monitor: { timeoutThresholdSec: 0 } })));
    const capture = createTestIo();

    const exitCode = await runCli(['config', 'check', '--config', configPath], capture.io);

    expect(exitCode).toBe(1);
    expect(capture.stderr()).toBe(
      `Configuration invalid (${configPath}): config.monitor.timeoutThresholdSec must be >= 1\n`
    );
  });

  it('CliConfigCheck validates the stats URL when monitoring is enabled', async () => {
    fs.writeFileSync(configPath, JSON.stringify(createConfig({ telemetry: { statsUrl: 'ftp://relay.test/stats' } })));
    const capture = createTestIo();

    const exitCode = await runCli(['config', 'check', '--config', configPath], capture.io);

    expect(exitCode).toBe(1);
    expect(capture.stderr()).toBe(
      `Configuration invalid (${configPath}): telemetry.statsUrl: Telemetry stats URL must use http or https (got ftp:)\n`
    );
  });

  it('CliEvents lists recorded events', async () => {
    const empty = createTestIo();
    expect(await runCli(['events', 'list'], empty.io)).toBe(0);
    expect(empty.stdout()).toBe('No events recorded\n');

    storeEvent({ ts: 0, source: 'monitor', detector: 'failover', severity: 'warning', message: 'Switched to "BRB"', meta: undefined });
    storeEvent({ ts: 60_000, source: 'monitor', detector: 'failover', severity: 'info', message: 'Restored "Gameplay"', meta: undefined });

    const capture = createTestIo();
    expect(await runCli(['events', 'list', '--limit', '5'], capture.io)).toBe(0);
    expect(capture.stdout()).toBe(
      [
        '1970-01-01T00:01:00.000Z [info] failover: Restored "Gameplay"',
        '1970-01-01T00:00:00.000Z [warning] failover: Switched to "BRB"',
        ''
      ].join('\n')
    );

    const json = createTestIo();
    expect(await runCli(['events', 'list', '--json', '-n', '1'], json.io)).toBe(0);
    const payload = JSON.parse(json.stdout());
    expect(payload.total).toBe(2);
    expect(payload.items).toHaveLength(1);
  });

  it('CliEvents rejects bad options', async () => {
    const capture = createTestIo();

    const exitCode = await runCli(['events', 'list', '--limit', '0'], capture.io);

    expect(exitCode).toBe(1);
    expect(capture.stderr().split('\n')[0]).toBe('Limit must be a positive integer');
  });

  it('CliEventsPrune removes events past the retention window', async () => {
    const now = Date.now();
    const day = 24 * 60 * 60 * 1000;
    storeEvent({ ts: now - 10 * day, source: 'monitor', detector: 'failover', severity: 'info', message: 'old', meta: undefined });
    storeEvent({ ts: now, source: 'monitor', detector: 'failover', severity: 'info', message: 'fresh', meta: undefined });
    const capture = createTestIo();

    const exitCode = await runCli(['events', 'prune', '--days', '7'], capture.io);

    expect(exitCode).toBe(0);
    expect(capture.stdout()).toBe('Removed 1 events older than 7 days\n');
    expect(listEvents().items.map(event => event.message)).toEqual(['fresh']);

    const invalid = createTestIo();
    expect(await runCli(['events', 'prune'], invalid.io)).toBe(1);
    expect(invalid.stderr().split('\n')[0]).toBe('Retention days must be a positive integer');
  });

  it('CliLogLevel reads and updates the level', async () => {
    const current = createTestIo();
    expect(await runCli(['log-level'], current.io)).toBe(0);
    expect(current.stdout()).toBe(`${getLogLevel()}\n`);

    const updated = createTestIo();
    expect(await runCli(['log-level', 'set', 'WARN'], updated.io)).toBe(0);
    expect(updated.stdout()).toBe('Log level set to warn\n');
    expect(getLogLevel()).toBe('warn');

    const unknown = createTestIo();
    expect(await runCli(['log-level', 'loud'], unknown.io)).toBe(1);
    expect(unknown.stderr()).toMatch(/^Unknown log level "loud" \(available: /);
  });

  it('CliHelp prints usage and rejects unknown commands', async () => {
    const help = createTestIo();
    expect(await runCli(['help'], help.io)).toBe(0);
    expect(help.stdout().split('\n')[0]).toBe('linkwatch CLI');

    const unknown = createTestIo();
    expect(await runCli(['launch'], unknown.io)).toBe(1);
    expect(unknown.stderr().split('\n')[0]).toBe('Unknown command: launch');

    const missing = createTestIo();
    expect(await runCli(['probe', '--config'], missing.io)).toBe(1);
    expect(missing.stderr()).toBe('Missing value for --config\n');
  });
});
