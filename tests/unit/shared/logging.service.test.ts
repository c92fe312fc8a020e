import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  LoggingService,
  createLogger,
  getLogger,
  isLogLevel,
  setLogger,
  type McpNotificationSender,
} from '../../../src/shared/services/logging.service.js';
import { ErrorSeverity } from '../../../src/shared/errors/error-codes.js';

describe('LoggingService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.mocked(console.error).mockRestore();
  });

  it('drops entries below the minimum level', () => {
    const logger = new LoggingService('warning');

    logger.info('quiet');
    logger.warning('loud', { session_id: 's' });

    expect(logger.getRecentLogs().map((entry) => entry.message)).toEqual(['loud']);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('writes to stderr with level, logger name and context', () => {
    const logger = new LoggingService('debug', 10, 'test');

    logger.notice('evicted', { session_id: 'a' });

    const output = vi.mocked(console.error).mock.calls[0][0];
    expect(output).toMatch(/^\[.+\] NOTICE {4}\[test\] evicted\n {2}Context: \{"session_id":"a"\}$/);
  });

  it('keeps a bounded history', () => {
    const logger = new LoggingService('debug', 2);
    logger.info('one');
    logger.info('two');
    logger.info('three');

    expect(logger.getRecentLogs().map((entry) => entry.message)).toEqual(['two', 'three']);
    expect(logger.getRecentLogs(10, 'warning')).toEqual([]);

    logger.clearLogs();
    expect(logger.getRecentLogs()).toEqual([]);
  });

  it('sends entries to an attached MCP server instead of stderr', async () => {
    const logger = new LoggingService('debug', 10, 'test');
    const sender: McpNotificationSender = {
      sendLoggingMessage: vi.fn().mockResolvedValue(undefined),
    };
    logger.setMcpServer(sender);

    logger.error('failed', new Error('boom'), { tool: 'browser_click' });

    await vi.waitFor(() => expect(sender.sendLoggingMessage).toHaveBeenCalledTimes(1));
    expect(sender.sendLoggingMessage).toHaveBeenCalledWith({
      level: 'error',
      logger: 'test',
      data: {
        message: 'failed',
        timestamp: expect.any(String),
        context: { tool: 'browser_click' },
        error: { message: 'boom', name: 'Error', stack: expect.any(String) },
      },
    });
    expect(console.error).not.toHaveBeenCalled();
  });

  it('falls back to stderr when the notification fails', async () => {
    const logger = new LoggingService('debug');
    logger.setMcpServer({ sendLoggingMessage: vi.fn().mockRejectedValue(new Error('closed')) });

    logger.info('hello');

    await vi.waitFor(() => expect(console.error).toHaveBeenCalledTimes(2));
  });

  it('maps error severities to log levels', () => {
    expect(LoggingService.severityToLogLevel(ErrorSeverity.WARNING)).toBe('warning');
    expect(LoggingService.severityToLogLevel(ErrorSeverity.CRITICAL)).toBe('critical');
  });

  it('recognises log level names', () => {
    expect(isLogLevel('notice')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe('createLogger', () => {
  it('writes through the global logger under its own name', () => {
    const original = getLogger();
    const global = new LoggingService('debug');
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogger(global);

    try {
      createLogger('session-registry').warning('capacity reached', { capacity: 2 });

      expect(global.getRecentLogs()).toEqual([
        {
          level: 'warning',
          message: 'capacity reached',
          timestamp: expect.any(Number),
          logger: 'session-registry',
          context: { capacity: 2 },
          error: undefined,
        },
      ]);
    } finally {
      setLogger(original);
      vi.mocked(console.error).mockRestore();
    }
  });
});
