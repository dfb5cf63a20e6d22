/**
 * core/config.ts
 *
 * Builds the SessionConfig in layers:
 *   1. DEFAULT_SESSION_CONFIG
 *   2. config/session.json (validated, invalid file → ConfigError)
 *   3. MUXBRIDGE_* environment variables (.env is loaded by the server entry)
 *   4. CLI overrides
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { LogLevel, ReleaseHotkeyId, SessionConfig } from './types';
import { ConfigError } from './errors';

const ajv = new Ajv({ allErrors: true });

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  serverUrl: 'ws://localhost:41001',
  autoConnect: false,
  nativeInputBlocked: false,
  releaseHotkey: 'shift+escape',
  controlPort: 41080,
  logLevel: 'info',
  debugCategories: [],
  maxMessageBytes: 64 * 1024,
  motionIntervalMs: 16,                    // ~60 injected moves per second
  rosterRefreshIntervalMs: 2000,
  stuckPipelineMs: 300,
  wheelDeltaScale: 40 / 120,               // 120 raw units per notch → 40px
  ownershipClaimPolicy: 'optimistic',
  clientIdentity: {
    appName: 'Mux Input Bridge',
    appVersion: '2.2.46',
    appBuildDate: '2026-02-05',
    sdkVersion: '2.2.35',
    sdkBuildDate: '2026-02-05'
  }
};

const LOG_LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];
const HOTKEY_IDS: ReleaseHotkeyId[] = [
  'shift+escape', 'ctrl+shift+escape', 'alt+shift+escape', 'shift+f12', 'alt+shift+f12'
];

/** Shape of config/session.json. Every key is optional. */
const sessionFileSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    serverUrl:               { type: 'string', pattern: '^wss?://' },
    autoConnect:             { type: 'boolean' },
    nativeInputBlocked:      { type: 'boolean' },
    releaseHotkey:           { type: 'string', enum: HOTKEY_IDS },
    controlPort:             { type: 'integer', minimum: 0, maximum: 65535 },
    logLevel:                { type: 'string', enum: LOG_LEVELS },
    debugCategories:         { type: 'array', items: { type: 'string' } },
    maxMessageBytes:         { type: 'integer', minimum: 1 },
    motionIntervalMs:        { type: 'number', minimum: 0 },
    rosterRefreshIntervalMs: { type: 'number', minimum: 0 },
    stuckPipelineMs:         { type: 'number', minimum: 0 },
    wheelDeltaScale:         { type: 'number' },
    ownershipClaimPolicy:    { type: 'string', enum: ['optimistic', 'hitTestOnly'] },
    clientIdentity: {
      type: 'object',
      additionalProperties: false,
      properties: {
        appName:      { type: 'string' },
        appVersion:   { type: 'string' },
        appBuildDate: { type: 'string' },
        sdkVersion:   { type: 'string' },
        sdkBuildDate: { type: 'string' }
      }
    }
  }
};

type SessionFile = Partial<Omit<SessionConfig, 'clientIdentity'>> & {
  clientIdentity?: Partial<SessionConfig['clientIdentity']>;
};

const validateSessionFile = ajv.compile<SessionFile>(sessionFileSchema);

export interface CliOverrides {
  serverUrl?: string;
  controlPort?: number;
  autoConnect?: boolean;
}

// ---------------------------------------------------------------------------
// Layers
// ---------------------------------------------------------------------------

export function readSessionFile(configPath: string): SessionFile {
  if (!fs.existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(configPath, [(e as Error).message]);
  }

  if (!validateSessionFile(parsed)) {
    throw new ConfigError(configPath, validateSessionFile.errors ?? []);
  }
  return parsed;
}

function parseBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function isLogLevel(raw: string | undefined): raw is LogLevel {
  return LOG_LEVELS.some(level => level === raw);
}

export function readEnvOverrides(env: NodeJS.ProcessEnv): SessionFile {
  const overrides: SessionFile = {};

  if (env.MUXBRIDGE_SERVER_URL) overrides.serverUrl = env.MUXBRIDGE_SERVER_URL;

  if (env.MUXBRIDGE_CONTROL_PORT) {
    const port = parseInt(env.MUXBRIDGE_CONTROL_PORT, 10);
    if (Number.isNaN(port)) {
      throw new ConfigError('MUXBRIDGE_CONTROL_PORT', [`not a number: ${env.MUXBRIDGE_CONTROL_PORT}`]);
    }
    overrides.controlPort = port;
  }

  const level = env.MUXBRIDGE_LOG_LEVEL;
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new ConfigError('MUXBRIDGE_LOG_LEVEL', [`unknown level: ${level}`]);
    }
    overrides.logLevel = level;
  }

  const autoConnect = parseBoolean(env.MUXBRIDGE_AUTO_CONNECT);
  if (autoConnect !== undefined) overrides.autoConnect = autoConnect;

  return overrides;
}

/**
 * Merge every layer into a complete SessionConfig.
 * `configPath` defaults to config/session.json under the working directory.
 */
export function loadSessionConfig(
  cli: CliOverrides = {},
  options: { configPath?: string; env?: NodeJS.ProcessEnv } = {}
): SessionConfig {
  const configPath = options.configPath ?? path.resolve(process.cwd(), 'config', 'session.json');
  const fileConfig = readSessionFile(configPath);
  const envConfig = readEnvOverrides(options.env ?? process.env);

  return {
    ...DEFAULT_SESSION_CONFIG,
    ...fileConfig,
    ...envConfig,
    serverUrl: cli.serverUrl ?? envConfig.serverUrl ?? fileConfig.serverUrl ?? DEFAULT_SESSION_CONFIG.serverUrl,
    controlPort: cli.controlPort ?? envConfig.controlPort ?? fileConfig.controlPort ?? DEFAULT_SESSION_CONFIG.controlPort,
    autoConnect: cli.autoConnect ?? envConfig.autoConnect ?? fileConfig.autoConnect ?? DEFAULT_SESSION_CONFIG.autoConnect,
    clientIdentity: {
      ...DEFAULT_SESSION_CONFIG.clientIdentity,
      ...fileConfig.clientIdentity
    }
  };
}

/** Parses --url, --port and --connect from argv. */
export function parseCli(argv: string[]): CliOverrides {
  const overrides: CliOverrides = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === '--url' && next) {
      overrides.serverUrl = next;
      i++;
    } else if (arg === '--port' && next) {
      overrides.controlPort = parseInt(next, 10);
      i++;
    } else if (arg === '--connect') {
      overrides.autoConnect = true;
    }
  }

  return overrides;
}
