#!/usr/bin/env node
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import {
  loadConfigFromFile,
  resolveDefaultConfigPath,
  resolveMonitorConfig,
  resolveProbeSettings,
  type LinkwatchConfig
} from './config/index.js';
import { listEvents, pruneEventsOlderThan } from './db.js';
import { ConfigError, describeError } from './errors.js';
import { HealthProbe } from './monitor/healthProbe.js';
import { formatProbeReport } from './monitor/status.js';

export type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const USAGE_LINES = [
  'linkwatch CLI',
  '',
  'Usage:',
  '  linkwatch probe [--json]               Probe the configured telemetry endpoint once',
  '  linkwatch config check                 Validate the configuration file',
  '  linkwatch events list [--limit N] [--json]  Show recent monitor events',
  '  linkwatch events prune --days N        Delete events older than N days',
  '  linkwatch log-level                    Get or set the active log level',
  '  linkwatch help                         Show this help',
  '',
  'Options:',
  '  --config <path>   Configuration file (default: config/default.json or $LINKWATCH_CONFIG)'
];

const LOG_LEVEL_USAGE = [
  'linkwatch log level commands',
  '',
  'Usage:',
  '  linkwatch log-level              Show the current log level',
  '  linkwatch log-level get          Show the current log level',
  '  linkwatch log-level set <level>  Change the active log level',
  '  linkwatch log-level <level>      Shortcut for set',
  '',
  `Available levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

const EVENTS_USAGE = [
  'Usage:',
  '  linkwatch events list [--limit N] [--json]',
  '  linkwatch events prune --days N'
].join('\n');

const DAY_MS = 24 * 60 * 60 * 1000;

type GlobalArgs = {
  configPath: string;
  rest: string[];
};

function extractGlobalArgs(argv: string[]): GlobalArgs | { error: string } {
  const rest: string[] = [];
  let configPath = resolveDefaultConfigPath();

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === '--config' || token === '-c') {
      const value = argv[index + 1];
      if (!value) {
        return { error: 'Missing value for --config' };
      }
      configPath = value;
      index += 1;
      continue;
    }
    if (token.startsWith('--config=')) {
      configPath = token.slice('--config='.length);
      continue;
    }
    rest.push(token);
  }

  return { configPath, rest };
}

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const parsed = extractGlobalArgs(argv);
  if ('error' in parsed) {
    io.stderr.write(`${parsed.error}\n`);
    return 1;
  }

  const { configPath, rest } = parsed;
  const command = rest[0] ?? 'help';

  switch (command) {
    case 'probe': {
      const json = rest.includes('--json') || rest.includes('-j');
      return runProbeCommand(configPath, io, { json });
    }
    case 'config': {
      return runConfigCommand(rest.slice(1), configPath, io);
    }
    case 'events': {
      return runEventsCommand(rest.slice(1), io);
    }
    case 'log-level': {
      return runLogLevelCommand(rest.slice(1), io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
  }
}

function loadConfig(configPath: string, io: CliIo): LinkwatchConfig | null {
  try {
    return loadConfigFromFile(configPath);
  } catch (error) {
    io.stderr.write(`Configuration invalid (${configPath}): ${describeError(error)}\n`);
    return null;
  }
}

async function runProbeCommand(configPath: string, io: CliIo, options: { json: boolean }): Promise<number> {
  const config = loadConfig(configPath, io);
  if (!config) {
    return 1;
  }

  let probe: HealthProbe;
  try {
    probe = new HealthProbe(resolveProbeSettings(config));
  } catch (error) {
    io.stderr.write(`${describeError(error)}\n`);
    return 1;
  }

  const inspection = await probe.inspect();
  if (options.json) {
    io.stdout.write(`${JSON.stringify(inspection)}\n`);
  } else {
    io.stdout.write(`${formatProbeReport(inspection)}\n`);
  }
  return inspection.health.online ? 0 : 1;
}

async function runConfigCommand(args: string[], configPath: string, io: CliIo): Promise<number> {
  const [first] = args;
  if (first !== 'check') {
    io.stderr.write(first ? `Unknown config subcommand: ${first}\n` : 'Missing config subcommand\n');
    io.stderr.write('Usage: linkwatch config check [--config path]\n');
    return 1;
  }

  const config = loadConfig(configPath, io);
  if (!config) {
    return 1;
  }

  if (config.monitor.enabled) {
    try {
      resolveMonitorConfig(config);
    } catch (error) {
      if (error instanceof ConfigError) {
        io.stderr.write(`Configuration invalid (${configPath}): ${error.field}: ${error.message}\n`);
        return 1;
      }
      throw error;
    }
  }

  const lines = [
    `Configuration OK (${configPath})`,
    `Monitoring: ${config.monitor.enabled ? 'enabled' : 'disabled'}`,
    `Fallback scene: ${config.monitor.fallbackScene}`,
    `Return behavior: ${config.monitor.returnBehavior}`
  ];
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

type EventsListArgs = {
  limit?: number;
  json: boolean;
  help: boolean;
  error?: string;
};

function parseEventsListArgs(args: string[]): EventsListArgs {
  const parsed: EventsListArgs = { json: false, help: false };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--json' || token === '-j') {
      parsed.json = true;
    } else if (token === '--help' || token === '-h') {
      parsed.help = true;
    } else if (token === '--limit' || token === '-n') {
      const value = Number.parseInt(args[index + 1] ?? '', 10);
      if (!Number.isFinite(value) || value <= 0) {
        parsed.error = 'Limit must be a positive integer';
        return parsed;
      }
      parsed.limit = value;
      index += 1;
    } else {
      parsed.error = `Unknown option: ${token}`;
      return parsed;
    }
  }

  return parsed;
}

async function runEventsCommand(args: string[], io: CliIo): Promise<number> {
  const [first, ...rest] = args;
  if (first === 'prune') {
    return runEventsPrune(rest, io);
  }
  if (first !== 'list') {
    io.stderr.write(first ? `Unknown events subcommand: ${first}\n` : 'Missing events subcommand\n');
    io.stderr.write(`${EVENTS_USAGE}\n`);
    return 1;
  }

  const parsed = parseEventsListArgs(rest);
  if (parsed.help) {
    io.stdout.write(`${EVENTS_USAGE}\n`);
    return 0;
  }
  if (parsed.error) {
    io.stderr.write(`${parsed.error}\n`);
    io.stderr.write(`${EVENTS_USAGE}\n`);
    return 1;
  }

  const result = listEvents({ limit: parsed.limit });
  if (parsed.json) {
    io.stdout.write(`${JSON.stringify(result)}\n`);
    return 0;
  }

  if (result.items.length === 0) {
    io.stdout.write('No events recorded\n');
    return 0;
  }

  const lines = result.items.map(
    event => `${new Date(event.ts).toISOString()} [${event.severity}] ${event.detector}: ${event.message}`
  );
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

function runEventsPrune(args: string[], io: CliIo): number {
  const [flag, value] = args;
  const days = Number.parseInt(value ?? '', 10);
  if (flag !== '--days' || !Number.isFinite(days) || days <= 0) {
    io.stderr.write('Retention days must be a positive integer\n');
    io.stderr.write(`${EVENTS_USAGE}\n`);
    return 1;
  }

  const removed = pruneEventsOlderThan(Date.now() - days * DAY_MS);
  io.stdout.write(`Removed ${removed} events older than ${days} days\n`);
  return 0;
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (first.startsWith('-')) {
    io.stderr.write(`Unknown option: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    io.stderr.write(`${describeError(error)}\n`);
    return 1;
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  runCli()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      process.stderr.write(`${describeError(error)}\n`);
      process.exitCode = 1;
    });
}
