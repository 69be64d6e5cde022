import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import { ConfigError } from '../errors.js';
import type { EventSuppressionRule } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type HttpConfig = {
  enabled?: boolean;
  host?: string;
  port?: number;
};

export type MonitorSettings = {
  enabled: boolean;
  checkIntervalSec: number;
  timeoutThresholdSec: number;
  fallbackScene: string;
  /** "previous", "manual", or the name of the scene to return to. */
  returnBehavior: string;
  notifications?: boolean;
};

export type TelemetrySettings = {
  statsUrl?: string;
  requestTimeoutMs?: number;
  bitrateThresholdKbps: number;
  rttThresholdMs: number;
  droppedThreshold: number;
};

export type EventSuppressionConfig = {
  rules: EventSuppressionRule[];
};

export type EventsConfig = {
  suppression?: EventSuppressionConfig;
};

export type LinkwatchConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  http?: HttpConfig;
  monitor: MonitorSettings;
  telemetry: TelemetrySettings;
  events?: EventsConfig;
};

export type ReturnBehavior =
  | { kind: 'previous' }
  | { kind: 'manual' }
  | { kind: 'scene'; scene: string };

export type ProbeSettings = Readonly<{
  statsEndpoint: URL;
  requestTimeoutMs: number;
  bitrateThresholdKbps: number;
  rttThresholdMs: number;
  droppedThreshold: number;
}>;

export type MonitorConfig = ProbeSettings &
  Readonly<{
    enabled: boolean;
    checkIntervalSec: number;
    timeoutThresholdSec: number;
    fallbackScene: string;
    returnBehavior: ReturnBehavior;
    notificationsEnabled: boolean;
  }>;

/** Anything that can hand out the current validated document. */
export interface ConfigProvider {
  getConfig(): LinkwatchConfig;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const severityListSchema: JsonSchema = {
  type: ['string', 'array'],
  enum: ['info', 'warning', 'critical'],
  items: { type: 'string', enum: ['info', 'warning', 'critical'] }
};

const linkwatchConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'database', 'monitor', 'telemetry'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    database: {
      type: 'object',
      required: ['path'],
      additionalProperties: false,
      properties: {
        path: { type: 'string' }
      }
    },
    http: {
      type: 'object',
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535 }
      }
    },
    monitor: {
      type: 'object',
      required: ['enabled', 'checkIntervalSec', 'timeoutThresholdSec', 'fallbackScene', 'returnBehavior'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        checkIntervalSec: { type: 'number', minimum: 1 },
        timeoutThresholdSec: { type: 'number', minimum: 1 },
        fallbackScene: { type: 'string' },
        returnBehavior: { type: 'string' },
        notifications: { type: 'boolean' }
      }
    },
    telemetry: {
      type: 'object',
      required: ['bitrateThresholdKbps', 'rttThresholdMs', 'droppedThreshold'],
      additionalProperties: false,
      properties: {
        statsUrl: { type: 'string' },
        requestTimeoutMs: { type: 'number', minimum: 1 },
        bitrateThresholdKbps: { type: 'number', minimum: 0 },
        rttThresholdMs: { type: 'number', minimum: 0 },
        droppedThreshold: { type: 'number', minimum: 0 }
      }
    },
    events: {
      type: 'object',
      additionalProperties: false,
      properties: {
        suppression: {
          type: 'object',
          required: ['rules'],
          additionalProperties: false,
          properties: {
            rules: {
              type: 'array',
              items: {
                type: 'object',
                required: ['id', 'reason'],
                additionalProperties: false,
                properties: {
                  id: { type: 'string' },
                  reason: { type: 'string' },
                  detector: {
                    type: ['string', 'array'],
                    items: { type: 'string' }
                  },
                  severity: severityListSchema,
                  suppressForMs: { type: 'number', minimum: 0 },
                  rateLimit: {
                    type: 'object',
                    required: ['count', 'perMs'],
                    additionalProperties: false,
                    properties: {
                      count: { type: 'number', minimum: 1 },
                      perMs: { type: 'number', minimum: 1 }
                    }
                  }
                }
              }
            }
          }
        }
      }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (key in value) {
        errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
      }
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }
  return errors;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateConfig(config: unknown): asserts config is LinkwatchConfig {
  const errors = validateAgainstSchema(linkwatchConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  // Schema validation above guarantees the shape from here on.
  validateLogicalConfig(config as LinkwatchConfig);
}

export function parseConfig(contents: string): LinkwatchConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): LinkwatchConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: LinkwatchConfig) {
  const messages: string[] = [];
  const { monitor } = config;

  if (!Number.isInteger(monitor.checkIntervalSec)) {
    messages.push('config.monitor.checkIntervalSec must be a positive integer');
  }
  if (!Number.isInteger(monitor.timeoutThresholdSec)) {
    messages.push('config.monitor.timeoutThresholdSec must be a positive integer');
  }
  if (monitor.fallbackScene.trim().length === 0) {
    messages.push('config.monitor.fallbackScene must be a non-empty string');
  }
  if (monitor.returnBehavior.trim().length === 0) {
    messages.push('config.monitor.returnBehavior must be "previous", "manual" or a scene name');
  }
  if (!Number.isInteger(config.telemetry.droppedThreshold)) {
    messages.push('config.telemetry.droppedThreshold must be an integer');
  }

  const suppressionRules = config.events?.suppression?.rules ?? [];
  const ruleIds = new Set<string>();
  suppressionRules.forEach((rule, index) => {
    if (ruleIds.has(rule.id)) {
      messages.push(`config.events.suppression.rules[${index}].id duplicates "${rule.id}"`);
    }
    ruleIds.add(rule.id);

    if (typeof rule.suppressForMs === 'undefined' && !rule.rateLimit) {
      messages.push(`config.events.suppression.rules[${index}] must define suppressForMs or rateLimit`);
    }
    if (typeof rule.suppressForMs !== 'undefined') {
      if (!Number.isInteger(rule.suppressForMs) || rule.suppressForMs <= 0) {
        messages.push(`config.events.suppression.rules[${index}].suppressForMs must be a positive integer`);
      }
    }
    const rateLimit = rule.rateLimit;
    if (!rateLimit) {
      return;
    }
    if (!Number.isInteger(rateLimit.count) || rateLimit.count <= 0) {
      messages.push(`config.events.suppression.rules[${index}].rateLimit.count must be a positive integer`);
    }
    if (!Number.isInteger(rateLimit.perMs) || rateLimit.perMs <= 0) {
      messages.push(`config.events.suppression.rules[${index}].rateLimit.perMs must be a positive integer`);
    }
  });

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export function parseReturnBehavior(value: string): ReturnBehavior {
  const trimmed = value.trim();
  const normalized = trimmed.toLowerCase();
  if (normalized === 'previous') {
    return { kind: 'previous' };
  }
  if (normalized === 'manual') {
    return { kind: 'manual' };
  }
  return { kind: 'scene', scene: trimmed };
}

/**
 * Resolves the endpoint and thresholds the health probe needs. An empty or
 * non-http(s) stats URL is a {@link ConfigError}.
 */
export function resolveProbeSettings(config: LinkwatchConfig): ProbeSettings {
  const raw = config.telemetry.statsUrl?.trim() ?? '';
  if (!raw) {
    throw new ConfigError('No telemetry stats URL configured', 'telemetry.statsUrl');
  }

  let endpoint: URL;
  try {
    endpoint = new URL(raw);
  } catch {
    throw new ConfigError(`Telemetry stats URL "${raw}" is not a valid URL`, 'telemetry.statsUrl');
  }
  if (endpoint.protocol !== 'http:' && endpoint.protocol !== 'https:') {
    throw new ConfigError(
      `Telemetry stats URL must use http or https (got ${endpoint.protocol})`,
      'telemetry.statsUrl'
    );
  }

  return Object.freeze({
    statsEndpoint: endpoint,
    requestTimeoutMs: config.telemetry.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    bitrateThresholdKbps: config.telemetry.bitrateThresholdKbps,
    rttThresholdMs: config.telemetry.rttThresholdMs,
    droppedThreshold: config.telemetry.droppedThreshold
  });
}

export function resolveMonitorConfig(config: LinkwatchConfig): MonitorConfig {
  const probe = resolveProbeSettings(config);
  return Object.freeze({
    ...probe,
    enabled: config.monitor.enabled,
    checkIntervalSec: config.monitor.checkIntervalSec,
    timeoutThresholdSec: config.monitor.timeoutThresholdSec,
    fallbackScene: config.monitor.fallbackScene.trim(),
    returnBehavior: parseReturnBehavior(config.monitor.returnBehavior),
    notificationsEnabled: config.monitor.notifications ?? true
  });
}

export type ConfigReloadEvent = {
  previous: LinkwatchConfig;
  next: LinkwatchConfig;
};

export function resolveDefaultConfigPath(env: NodeJS.ProcessEnv = process.env) {
  const override = env.LINKWATCH_CONFIG?.trim();
  return path.resolve(process.cwd(), override || 'config/default.json');
}

export class ConfigManager extends EventEmitter implements ConfigProvider {
  private currentConfig: LinkwatchConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath = resolveDefaultConfigPath()) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): LinkwatchConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): LinkwatchConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private recreateWatcher() {
    this.closeWatcher();
    this.watcher = this.createWatcher();
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.recreateWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: LinkwatchConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    const config = parseConfig(contents);
    return { config, raw: contents };
  }

  private restorePreviousConfig() {
    if (!this.lastGoodRaw) {
      return;
    }

    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit('error', err);
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

const defaultManager = new ConfigManager();

export default defaultManager;
export { linkwatchConfigSchema };
