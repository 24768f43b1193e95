#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { CacheManager } from './CacheManager.js';
import { ConfigManager } from './configManager.js';
import { CacheErrorCode, ErrorHandler } from './errorHandler.js';
import { logger, LoggerDiagnostics } from './logger.js';
import { CacheToolHandlers, RESOURCE_DEFINITIONS, TOOL_DEFINITIONS } from './toolHandlers.js';
import { formatValidationErrors, validateRetentionWeeks } from './validators.js';

const USAGE = 'Usage: digest-cache            start the MCP server on stdio\n' +
  '       digest-cache prune [weeks] run one maintenance pass';

class DigestCacheServer {
  private server: Server;

  constructor(
    private readonly cacheManager: CacheManager,
    private readonly handlers: CacheToolHandlers
  ) {
    this.server = new Server(
      {
        name: 'digest-cache-server',
        version: '0.1.0',
      },
      {
        capabilities: {
          resources: {},
          tools: {},
        },
      }
    );

    this.setupResourceHandlers();
    this.setupToolHandlers();

    // Error handling
    this.server.onerror = (error) => logger.error('[MCP Error]', error);
    process.on('SIGINT', () => {
      this.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Failed to close MCP server:', ErrorHandler.formatError(error));
          process.exit(1);
        }
      );
    });
  }

  private setupResourceHandlers() {
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => ({
      resources: RESOURCE_DEFINITIONS,
    }));

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const { uri } = request.params;
      try {
        return {
          contents: [
            {
              uri,
              mimeType: 'application/json',
              text: this.handlers.readResource(uri),
            },
          ],
        };
      } catch (error) {
        throw new McpError(ErrorCode.InvalidRequest, ErrorHandler.formatError(error));
      }
    });
  }

  private setupToolHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOL_DEFINITIONS,
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      try {
        return await this.handlers.callTool(request.params.name, request.params.arguments);
      } catch (error) {
        if (ErrorHandler.isErrorCode(error, CacheErrorCode.INVALID_INPUT)) {
          throw new McpError(ErrorCode.InvalidParams, ErrorHandler.messageOf(error) ?? String(error));
        }

        logger.error('Tool call failed:', request.params.name, ErrorHandler.formatError(error));
        return {
          content: [
            {
              type: 'text' as const,
              text: ErrorHandler.messageOf(error) ?? String(error),
            },
          ],
          isError: true,
        };
      }
    });
  }

  async run() {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info(`Digest cache MCP server running on stdio (root: ${this.cacheManager.root})`);
  }

  async close() {
    logger.info('Closing MCP server, stats:', this.cacheManager.getStats());
    await this.server.close();
  }
}

async function runPrune(cacheManager: CacheManager, weeksArg: string | undefined, defaultWeeks: number): Promise<void> {
  const weeks = weeksArg === undefined ? defaultWeeks : Number(weeksArg);
  const validation = validateRetentionWeeks(weeks);
  if (validation.value === undefined) {
    logger.error(`Invalid retention window: ${formatValidationErrors(validation.errors)}`);
    logger.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const report = await cacheManager.prune(validation.value);
  logger.info(`Prune finished: ${report.migrated} migrated, ${report.removed} removed, ${report.kept} kept`);
}

async function main(args: string[]): Promise<void> {
  const config = await new ConfigManager().load();
  logger.setLevel(config.logLevel);

  const cacheManager = new CacheManager({
    root: config.cacheRoot,
    diagnostics: new LoggerDiagnostics(logger),
  });

  const [command, weeksArg] = args;
  if (command === undefined) {
    const handlers = new CacheToolHandlers(cacheManager, config.retentionWeeks);
    await new DigestCacheServer(cacheManager, handlers).run();
    return;
  }

  if (command !== 'prune') {
    logger.error(`Unknown command: ${command}`);
    logger.error(USAGE);
    process.exitCode = 2;
    return;
  }

  await runPrune(cacheManager, weeksArg, config.retentionWeeks);
}

main(process.argv.slice(2)).catch((error: unknown) => {
  logger.error(ErrorHandler.formatError(error));
  process.exitCode = 1;
});
