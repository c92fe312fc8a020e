/**
 * CLI Argument Parsing
 *
 * Parses command-line flags for server configuration. Values left undefined
 * here fall back to environment variables, then to defaults (see
 * server-config.ts).
 */

/**
 * Server configuration from CLI arguments
 */
export interface ServerArgs {
  /** Launch session browsers headless */
  headless?: boolean;

  /** Maximum resident sessions */
  capacity?: number;

  /** Idle time before a session is reaped */
  idleTimeoutMs?: number;

  /** Interval between idle sweeps */
  reapIntervalMs?: number;

  /** Initial viewport width */
  width?: number;

  /** Initial viewport height */
  height?: number;

  /** Chrome channel to use */
  channel?: string;

  /** Path to Chrome executable (overrides channel) */
  executablePath?: string;

  /** Create sessions on first reference to an unknown id */
  autoCreate?: boolean;
}

/** Flags that take a numeric value in the next argument */
const NUMERIC_ARGS = {
  '--capacity': 'capacity',
  '--idleTimeoutMs': 'idleTimeoutMs',
  '--reapIntervalMs': 'reapIntervalMs',
  '--width': 'width',
  '--height': 'height',
} as const satisfies Record<string, keyof ServerArgs>;

/** Known CLI argument base names for validation */
const KNOWN_ARG_NAMES = new Set([
  'headless',
  'capacity',
  'idleTimeoutMs',
  'reapIntervalMs',
  'width',
  'height',
  'channel',
  'executablePath',
  'autoCreate',
  'no-autoCreate',
]);

function isNumericArg(arg: string): arg is keyof typeof NUMERIC_ARGS {
  return Object.prototype.hasOwnProperty.call(NUMERIC_ARGS, arg);
}

/**
 * Check if an argument is a known CLI flag (handles --arg and --arg=value forms).
 */
function isKnownArg(arg: string): boolean {
  if (!arg.startsWith('--')) return true; // Not a flag, skip validation
  const baseName = arg.slice(2).split('=')[0];
  return KNOWN_ARG_NAMES.has(baseName);
}

/**
 * Parse command-line arguments into ServerArgs.
 *
 * Numeric flags accept `--flag N` and `--flag=N`. Malformed numbers are kept
 * as NaN so config validation can reject them with the flag's name.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ServerArgs {
  const args: ServerArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const [flag, inlineValue] = splitInline(arg);

    if (arg === '--headless=false' || arg === '--headless=0') {
      args.headless = false;
    } else if (arg === '--headless=true' || arg === '--headless=1' || arg === '--headless') {
      args.headless = true;
    } else if (arg === '--autoCreate' || arg === '--autoCreate=true') {
      args.autoCreate = true;
    } else if (arg === '--no-autoCreate' || arg === '--autoCreate=false') {
      args.autoCreate = false;
    } else if (isNumericArg(flag) && (inlineValue !== undefined || argv[i + 1])) {
      args[NUMERIC_ARGS[flag]] = Number(inlineValue ?? argv[++i]);
    } else if (flag === '--channel' && (inlineValue !== undefined || argv[i + 1])) {
      args.channel = inlineValue ?? argv[++i];
    } else if (flag === '--executablePath' && (inlineValue !== undefined || argv[i + 1])) {
      args.executablePath = inlineValue ?? argv[++i];
    } else if (!isKnownArg(arg)) {
      // Warn about unknown arguments to catch typos like --hedless
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
    }
  }

  return args;
}

function splitInline(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  if (!arg.startsWith('--') || eq === -1) {
    return [arg, undefined];
  }
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}
