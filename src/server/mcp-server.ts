/**
 * MCP Server
 *
 * Registers the tool definitions with the MCP SDK, converts handler output
 * and thrown errors into tool results, and forwards log entries as MCP
 * notifications.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ServerConfig, ToolDefinition } from './types.js';
import {
  createErrorResponse,
  createSuccessResponse,
  McpError,
  type McpToolResponse,
} from '../shared/errors/index.js';
import {
  getLogger,
  LoggingService,
  type LogLevel,
  type McpNotificationSender,
} from '../shared/services/logging.service.js';
import { isFileResult, isImageResult, type ToolOutput } from '../tools/tool-result.types.js';

/**
 * Convert handler output into an MCP tool result.
 */
export function toToolResponse(output: ToolOutput): McpToolResponse {
  if (isImageResult(output)) {
    return {
      content: [
        { type: 'image', data: output.data, mimeType: output.mimeType },
        { type: 'text', text: `Screenshot (${output.mimeType}, ${output.sizeBytes} bytes)` },
      ],
    };
  }

  if (isFileResult(output)) {
    return {
      content: [
        {
          type: 'text',
          text: `Screenshot saved to ${output.path} (${output.mimeType}, ${output.sizeBytes} bytes)`,
        },
      ],
      structuredContent: {
        path: output.path,
        mimeType: output.mimeType,
        sizeBytes: output.sizeBytes,
      },
    };
  }

  return createSuccessResponse(output);
}

/**
 * Run a tool handler with timing logs. Errors never escape: they become
 * `isError` results.
 */
export async function executeTool(tool: ToolDefinition, rawInput: unknown): Promise<McpToolResponse> {
  const logger = getLogger();
  const startTime = Date.now();

  try {
    logger.debug(`Executing tool: ${tool.name}`);
    const output = await tool.handler(rawInput);
    logger.debug(`Tool ${tool.name} completed in ${Date.now() - startTime}ms`);
    return toToolResponse(output);
  } catch (error) {
    const executionTime = Date.now() - startTime;
    const level: LogLevel =
      error instanceof McpError ? LoggingService.severityToLogLevel(error.severity) : 'error';
    logger.log(
      level,
      `Tool ${tool.name} failed after ${executionTime}ms`,
      { toolName: tool.name },
      error instanceof Error ? error : undefined
    );
    return createErrorResponse(error);
  }
}

/**
 * Browser session MCP server over stdio
 */
export class SessionToolServer implements McpNotificationSender {
  private readonly server: McpServer;
  private readonly transport: StdioServerTransport;

  constructor(
    private readonly config: ServerConfig,
    private readonly tools: readonly ToolDefinition[]
  ) {
    this.server = new McpServer(
      {
        name: config.name,
        version: config.version,
      },
      {
        capabilities: { tools: {}, logging: {} },
      }
    );

    this.transport = new StdioServerTransport();

    this.registerLoggingHandlers();
    this.registerTools();
  }

  /**
   * Send logging message notification via MCP protocol
   */
  async sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void> {
    await this.server.server.notification({
      method: 'notifications/message',
      params: {
        level: params.level,
        logger: params.logger,
        data: params.data,
      },
    });
  }

  private registerLoggingHandlers(): void {
    this.server.server.setRequestHandler(SetLevelRequestSchema, (request) => {
      const logger = getLogger();
      const { level } = request.params;
      logger.setMinLevel(level);
      logger.info(`Log level set to: ${level}`);
      return {};
    });
  }

  private registerTools(): void {
    for (const tool of this.tools) {
      this.server.registerTool(
        tool.name,
        {
          title: tool.title,
          description: tool.description,
          inputSchema: tool.inputSchema.shape,
        },
        (input: unknown) => executeTool(tool, input)
      );
    }
  }

  async start(): Promise<void> {
    await this.server.connect(this.transport);
    // Route logs through MCP only once the transport is up
    getLogger().setMcpServer(this);

    getLogger().info(`${this.config.name} v${this.config.version} started`, {
      tools: this.tools.length,
    });
  }

  async stop(): Promise<void> {
    getLogger().setMcpServer(null);
    await this.server.close();
  }
}
