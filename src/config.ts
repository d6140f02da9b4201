import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_VENDOR_PREFIXES } from './core/parsing/LogLineDecoder.js';

// Load environment variables from .env file
dotenv.config();

// src/ when run from sources, dist/src/ once built
const projectRoot =
  path.basename(path.dirname(__dirname)) === 'dist' ? path.resolve(__dirname, '..', '..') : path.resolve(__dirname, '..');

const ConfigSchema = z
  .object({
    server: z.object({
      name: z.string().min(1, 'Server name must not be empty'),
      version: z.string().min(1, 'Version must not be empty'),
      debug: z.boolean(),
    }),
    houdini: z.object({
      hythonPath: z.string().min(1, 'hython path must not be empty'),
      renderScriptPath: z.string().min(1),
      inspectScriptPath: z.string().min(1),
      inspectEnabled: z.boolean(),
      inspectTimeoutMs: z.number().int().min(1000).max(600000),
      inspectAttempts: z.number().int().min(1).max(5),
      historyFile: z.string().min(1).optional(),
    }),
    monitor: z.object({
      readTimeoutMs: z.number().int().min(10).max(5000),
      refreshIntervalMs: z.number().int().min(50).max(60000),
      inferredTotalMargin: z.number().int().min(0).max(1000),
      flatGuessSecondsPerFrame: z.number().positive(),
      gracefulExitTimeoutMs: z.number().int().min(0).max(600000),
      vendorLogPrefixes: z.array(z.string().min(1)),
    }),
    history: z.object({
      enabled: z.boolean(),
      databasePath: z.string().min(1),
      retentionHours: z.number().int().min(1),
    }),
    web: z.object({
      enabled: z.boolean(),
      port: z.number().int().min(1024).max(65535),
    }),
    mcp: z.object({
      transport: z.enum(['stdio', 'streamable']),
      sessionTimeoutMinutes: z.number().int().min(5).max(1440),
    }),
  })
  .refine((config) => config.mcp.transport !== 'streamable' || config.web.enabled, {
    message: 'Streamable HTTP transport needs the web server (WEB_ENABLED=true)',
    path: ['mcp', 'transport'],
  });

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --hython /opt/hfs20.5/bin/hython --web-port 3001 --debug
 */
export function parseArgs(argv: readonly string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) continue;

    const key = arg.slice(2);
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      args[key] = next;
      i++;
    } else {
      args[key] = true;
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments, then environment variables, then defaults.
 * Throws ConfigError when the result does not validate.
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliArgs[cliKey];
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = cliArgs[cliKey] ?? env[envKey];
    if (typeof value !== 'string' || value.trim() === '') return defaultValue;
    return Number(value);
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || undefined;
  };

  const getStringArray = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const value = cliArgs[cliKey] ?? env[envKey];
    if (typeof value !== 'string' || value.trim() === '') return defaultValue;
    return value
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  };

  const scriptsDir = path.join(projectRoot, 'scripts');
  const rawTransport = getString('mcp-transport', 'MCP_TRANSPORT', 'stdio');

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'rop-render-monitor'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    houdini: {
      hythonPath: getString('hython', 'HYTHON_PATH', 'hython'),
      renderScriptPath: getString('render-script', 'RENDER_SCRIPT_PATH', path.join(scriptsDir, 'render_rop.py')),
      inspectScriptPath: getString('inspect-script', 'INSPECT_SCRIPT_PATH', path.join(scriptsDir, 'inspect_rop.py')),
      inspectEnabled: getBoolean('rop-inspect', 'ROP_INSPECT_ENABLED', true),
      inspectTimeoutMs: getNumber('rop-inspect-timeout', 'ROP_INSPECT_TIMEOUT_MS', 60000),
      inspectAttempts: getNumber('rop-inspect-attempts', 'ROP_INSPECT_ATTEMPTS', 2),
      historyFile: getOptionalString('hip-history', 'HIP_HISTORY_FILE'),
    },
    monitor: {
      readTimeoutMs: getNumber('read-timeout', 'MONITOR_READ_TIMEOUT_MS', 100),
      refreshIntervalMs: getNumber('refresh-interval', 'MONITOR_REFRESH_INTERVAL_MS', 500),
      inferredTotalMargin: getNumber('inferred-total-margin', 'INFERRED_TOTAL_MARGIN', 5),
      flatGuessSecondsPerFrame: getNumber('flat-guess-seconds', 'FLAT_GUESS_SECONDS_PER_FRAME', 0.5),
      gracefulExitTimeoutMs: getNumber('graceful-exit-timeout', 'GRACEFUL_EXIT_TIMEOUT_MS', 10000),
      vendorLogPrefixes: getStringArray('vendor-prefixes', 'VENDOR_LOG_PREFIXES', [...DEFAULT_VENDOR_PREFIXES]),
    },
    history: {
      enabled: getBoolean('history', 'HISTORY_ENABLED', true),
      databasePath: getString('history-db', 'HISTORY_DATABASE_PATH', path.join(projectRoot, 'data', 'render-history.db')),
      retentionHours: getNumber('history-retention', 'HISTORY_RETENTION_HOURS', 720),
    },
    web: {
      enabled: getBoolean('web', 'WEB_ENABLED', false),
      port: getNumber('web-port', 'WEB_PORT', 3001),
    },
    mcp: {
      transport: rawTransport,
      sessionTimeoutMinutes: getNumber('mcp-session-timeout', 'MCP_SESSION_TIMEOUT_MINUTES', 60),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`));
  }
  return result.data;
}

/**
 * Load the configuration for the server process, exiting on invalid settings
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('\nConfiguration Validation Failed!\n');
      console.error('Errors:');
      error.issues.forEach((issue) => console.error(`  • ${issue}`));
      console.error('\nTips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - HYTHON_PATH must point at the hython executable of your Houdini install');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary to stderr
 */
export function printConfigInfo(config: Config): void {
  console.error('='.repeat(68));
  console.error('            ROP Render Monitor MCP Server - Configuration');
  console.error('='.repeat(68));

  console.error(`\nServer: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`hython: ${config.houdini.hythonPath}`);
  console.error(`Render script: ${config.houdini.renderScriptPath}`);
  console.error(
    `ROP inspection: ${config.houdini.inspectEnabled ? `enabled (${config.houdini.inspectTimeoutMs}ms, ${config.houdini.inspectAttempts}x)` : 'disabled'}`
  );
  console.error(`Scene history: ${config.houdini.historyFile ?? 'newest ~/houdiniX.Y/file.history'}`);

  console.error(
    `\nMonitor: read ${config.monitor.readTimeoutMs}ms | refresh ${config.monitor.refreshIntervalMs}ms | exit grace ${config.monitor.gracefulExitTimeoutMs}ms`
  );
  if (config.monitor.vendorLogPrefixes.length > 0) {
    console.error(`Stripped log prefixes: ${config.monitor.vendorLogPrefixes.join(', ')}`);
  }

  if (config.history.enabled) {
    console.error(`\nHistory: ${config.history.databasePath} (kept ${config.history.retentionHours}h)`);
  }

  if (config.web.enabled) {
    console.error(`\nWeb API: http://localhost:${config.web.port}/api`);
  }

  const transportLabel = config.mcp.transport === 'streamable' ? 'STREAMABLE HTTP' : 'STDIO';
  const sessionInfo =
    config.mcp.transport === 'streamable' ? `(session timeout: ${config.mcp.sessionTimeoutMinutes}m)` : '';
  console.error(`\nMCP: ${transportLabel} mode ${sessionInfo}`);

  console.error('\n' + '-'.repeat(68));
}
