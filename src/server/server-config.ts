/**
 * Server Configuration
 *
 * Global configuration combining CLI args, environment variables and
 * defaults, plus the SessionRegistry singleton the tool handlers share.
 *
 * Precedence: CLI flag, then environment variable, then default.
 */

import { z } from 'zod';
import { parseArgs, type ServerArgs } from '../cli/args.js';
import { PuppeteerDriver } from '../browser/puppeteer-driver.js';
import type { AutomationDriver } from '../browser/automation-driver.js';
import {
  SessionRegistry,
  DEFAULT_CAPACITY,
  DEFAULT_IDLE_TIMEOUT_MS,
} from '../session/session-registry.js';
import { DEFAULT_REAP_INTERVAL_MS } from '../session/idle-reaper.js';
import { McpError, ErrorCode, ErrorSeverity } from '../shared/errors/index.js';

/** Default viewport, matching a common desktop resolution */
export const DEFAULT_VIEWPORT = { width: 1920, height: 1080 } as const;

const positiveInt = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be positive`);

export const RuntimeConfigSchema = z.object({
  headless: z.boolean(),
  capacity: positiveInt('capacity'),
  idleTimeoutMs: positiveInt('idleTimeoutMs'),
  reapIntervalMs: positiveInt('reapIntervalMs'),
  viewport: z.object({
    width: positiveInt('width'),
    height: positiveInt('height'),
  }),
  channel: z.enum(['chrome', 'chrome-beta', 'chrome-dev', 'chrome-canary']).optional(),
  executablePath: z.string().min(1).optional(),
  autoCreate: z.boolean(),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

type Env = Record<string, string | undefined>;

// Singleton instances
let serverConfig: RuntimeConfig | null = null;
let sessionRegistry: SessionRegistry | null = null;

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  return raw === undefined || raw === '' ? undefined : Number(raw);
}

function envBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.toLowerCase();
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  return undefined;
}

/**
 * Merge parsed args over environment overrides and defaults, and validate.
 *
 * @throws McpError INVALID_INPUT listing every invalid field
 */
export function resolveConfig(args: ServerArgs, env: Env = process.env): RuntimeConfig {
  const merged = {
    headless: args.headless ?? envBoolean(env, 'HEADLESS') ?? true,
    capacity: args.capacity ?? envNumber(env, 'SESSION_CAPACITY') ?? DEFAULT_CAPACITY,
    idleTimeoutMs:
      args.idleTimeoutMs ?? envNumber(env, 'SESSION_IDLE_TIMEOUT_MS') ?? DEFAULT_IDLE_TIMEOUT_MS,
    reapIntervalMs:
      args.reapIntervalMs ?? envNumber(env, 'SESSION_REAP_INTERVAL_MS') ?? DEFAULT_REAP_INTERVAL_MS,
    viewport: {
      width: args.width ?? DEFAULT_VIEWPORT.width,
      height: args.height ?? DEFAULT_VIEWPORT.height,
    },
    channel: args.channel,
    executablePath: args.executablePath ?? (env.CHROME_PATH || undefined),
    autoCreate: args.autoCreate ?? true,
  };

  const parsed = RuntimeConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new McpError(
      `Invalid configuration: ${issues.join('; ')}`,
      ErrorCode.INVALID_INPUT,
      ErrorSeverity.CRITICAL,
      { issues }
    );
  }
  return parsed.data;
}

/**
 * Initialize server configuration from CLI arguments and environment variables.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function initServerConfig(argv: string[], env: Env = process.env): RuntimeConfig {
  serverConfig = resolveConfig(parseArgs(argv), env);
  return serverConfig;
}

/**
 * Get the current server configuration.
 * Throws if not initialized.
 */
export function getServerConfig(): RuntimeConfig {
  if (!serverConfig) {
    throw new Error('Server config not initialized. Call initServerConfig() first.');
  }
  return serverConfig;
}

/**
 * Get or create the SessionRegistry singleton.
 *
 * @param driver - only used when the registry is created (tests pass a fake)
 */
export function getSessionRegistry(driver?: AutomationDriver): SessionRegistry {
  if (!sessionRegistry) {
    const config = getServerConfig();
    sessionRegistry = new SessionRegistry(driver ?? new PuppeteerDriver(), {
      capacity: config.capacity,
      idleTimeoutMs: config.idleTimeoutMs,
      autoCreate: config.autoCreate,
      session: {
        launch: {
          headless: config.headless,
          viewport: config.viewport,
          channel: config.channel,
          executablePath: config.executablePath,
        },
      },
    });
  }
  return sessionRegistry;
}

/**
 * Reset server state (for testing).
 */
export function resetServerState(): void {
  serverConfig = null;
  sessionRegistry = null;
}
