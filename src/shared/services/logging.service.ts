/**
 * Logging Service
 *
 * Structured logging with MCP protocol support.
 * Entries go to stderr until an MCP server is attached, then are sent as
 * `notifications/message` notifications.
 */

import { ErrorSeverity } from '../errors/error-codes.js';

/**
 * Log level type matching MCP specification (RFC 5424)
 */
export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

/** All log levels, lowest severity first */
export const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
];

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  logger: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * MCP Notification sender interface
 */
export interface McpNotificationSender {
  sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void>;
}

/**
 * Type guard for log level strings (e.g. from LOG_LEVEL)
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * Logging Service
 *
 * Centralized logging with configurable minimum level. Named loggers created
 * through {@link createLogger} share the level, buffer and MCP sink of the
 * global instance.
 */
export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private readonly maxEntries: number;
  private mcpServer: McpNotificationSender | null = null;
  private readonly loggerName: string;

  // Log level hierarchy matching RFC 5424 severity levels
  private static readonly LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    notice: 2,
    warning: 3,
    error: 4,
    critical: 5,
    alert: 6,
    emergency: 7,
  };

  constructor(minLevel: LogLevel = 'info', maxEntries = 1000, loggerName = 'tabkeeper') {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
    this.loggerName = loggerName;
  }

  /**
   * Set the MCP server for sending log notifications
   */
  setMcpServer(server: McpNotificationSender | null): void {
    this.mcpServer = server;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(this.loggerName, 'debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(this.loggerName, 'info', message, context);
  }

  /**
   * Log a notice message (normal but significant)
   */
  notice(message: string, context?: Record<string, unknown>): void {
    this.write(this.loggerName, 'notice', message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.write(this.loggerName, 'warning', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write(this.loggerName, 'error', message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write(this.loggerName, 'critical', message, context, error);
  }

  /**
   * Log at an arbitrary level. Used where the level is computed, e.g. from an
   * error's severity.
   */
  log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    this.write(this.loggerName, level, message, context, error);
  }

  /**
   * Internal logging method shared with named loggers
   */
  write(
    logger: string,
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      logger,
      context,
      error,
    };

    this.logEntries.push(entry);
    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    if (this.mcpServer) {
      void this.sendMcpNotification(this.mcpServer, entry);
    } else {
      this.outputToConsole(entry);
    }
  }

  /**
   * Send log entry as MCP notification
   */
  private async sendMcpNotification(
    server: McpNotificationSender,
    entry: LogEntry
  ): Promise<void> {
    const data: Record<string, unknown> = {
      message: entry.message,
      timestamp: new Date(entry.timestamp).toISOString(),
    };

    if (entry.context && Object.keys(entry.context).length > 0) {
      data.context = entry.context;
    }

    if (entry.error) {
      data.error = {
        message: entry.error.message,
        name: entry.error.name,
        stack: entry.error.stack,
      };
    }

    try {
      await server.sendLoggingMessage({
        level: entry.level,
        logger: entry.logger,
        data,
      });
    } catch (error) {
      // Don't use this.write here: a broken transport would recurse
      console.error('[LoggingService] Failed to send MCP notification:', error);
      this.outputToConsole(entry);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LoggingService.LEVEL_RANK[level] >= LoggingService.LEVEL_RANK[this.minLevel];
  }

  /**
   * Output log entry to stderr (stdout is reserved for MCP protocol)
   */
  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(9);

    let output = `[${timestamp}] ${levelStr} [${entry.logger}] ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  Context: ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  Stack: ${entry.error.stack}`;
      }
    }

    console.error(output);
  }

  /**
   * Get recent log entries, optionally filtered by minimum level
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    let logs = this.logEntries;

    if (minLevel) {
      const minRank = LoggingService.LEVEL_RANK[minLevel];
      logs = logs.filter((entry) => LoggingService.LEVEL_RANK[entry.level] >= minRank);
    }

    return logs.slice(-count);
  }

  clearLogs(): void {
    this.logEntries = [];
  }

  /**
   * Convert ErrorSeverity to LogLevel
   */
  static severityToLogLevel(severity: ErrorSeverity): LogLevel {
    switch (severity) {
      case ErrorSeverity.DEBUG:
        return 'debug';
      case ErrorSeverity.INFO:
        return 'info';
      case ErrorSeverity.WARNING:
        return 'warning';
      case ErrorSeverity.ERROR:
        return 'error';
      case ErrorSeverity.CRITICAL:
        return 'critical';
      default:
        return 'info';
    }
  }
}

/**
 * Named logger writing through the global LoggingService
 */
class NamedLogger implements Logger {
  constructor(private readonly name: string) {}

  debug(message: string, context?: Record<string, unknown>): void {
    getLogger().write(this.name, 'debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    getLogger().write(this.name, 'info', message, context);
  }

  notice(message: string, context?: Record<string, unknown>): void {
    getLogger().write(this.name, 'notice', message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    getLogger().write(this.name, 'warning', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    getLogger().write(this.name, 'error', message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    getLogger().write(this.name, 'critical', message, context, error);
  }
}

let globalLogger: LoggingService | null = null;

/**
 * Get or create global logger instance
 */
export function getLogger(): LoggingService {
  if (!globalLogger) {
    const envLevel = process.env.LOG_LEVEL;
    globalLogger = new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return globalLogger;
}

/**
 * Set global logger instance
 */
export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}

/**
 * Create a logger tagged with a component name.
 */
export function createLogger(name: string): Logger {
  return new NamedLogger(name);
}
