/**
 * MCP 工具与资源的处理逻辑，与传输层无关
 */

import { CacheManager } from './CacheManager.js';
import { CacheError, CacheErrorCode, withErrorHandling } from './errorHandler.js';
import { digestFromHex } from './PathResolver.js';
import {
  formatValidationErrors,
  validateFindArgs,
  validatePruneArgs,
  validateSaveArgs,
  type ValidationResult
} from './validators.js';

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, object>;
    required?: string[];
  };
};

export type ToolResult = {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
};

export type ResourceDefinition = {
  uri: string;
  name: string;
  mimeType: string;
  description: string;
};

const encodingProperty = {
  type: 'string',
  enum: ['utf8', 'base64'],
  description: 'How the content is represented as text (default: utf8)',
};

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'find_entry',
    description: 'Look up a cached artifact by digest. structuredContent.found tells a hit from a miss. A hit refreshes its last-used time, which rewrites the index file',
    inputSchema: {
      type: 'object',
      properties: {
        digest: {
          type: 'string',
          description: 'Hex-encoded digest of the artifact',
        },
        encoding: encodingProperty,
      },
      required: ['digest'],
    },
  },
  {
    name: 'save_entry',
    description: 'Store an artifact under its digest in the sharded file tier',
    inputSchema: {
      type: 'object',
      properties: {
        digest: {
          type: 'string',
          description: 'Hex-encoded digest of the artifact',
        },
        content: {
          type: 'string',
          description: 'Artifact content',
        },
        encoding: encodingProperty,
      },
      required: ['digest', 'content'],
    },
  },
  {
    name: 'prune_cache',
    description: 'Migrate sharded entries into the index and drop entries unused for longer than the retention window',
    inputSchema: {
      type: 'object',
      properties: {
        weeks: {
          type: 'number',
          description: 'Retention window in whole weeks (optional, defaults to the configured value)',
        },
      },
    },
  },
];

export const RESOURCE_DEFINITIONS: ResourceDefinition[] = [
  {
    uri: 'cache://stats',
    name: 'Cache Statistics',
    mimeType: 'application/json',
    description: 'Lookup and save counters since the server started',
  },
];

export class CacheToolHandlers {
  constructor(
    private readonly cacheManager: CacheManager,
    private readonly defaultRetentionWeeks: number
  ) {}

  /**
   * 处理单个工具请求。参数不合法时抛出 INVALID_INPUT
   */
  async callTool(name: string, args: unknown): Promise<ToolResult> {
    return withErrorHandling(async () => {
      switch (name) {
        case 'find_entry': {
          const { digest, encoding } = requireValid(validateFindArgs(args));
          const content = await this.cacheManager.find(digestFromHex(digest));
          // 命中与否看 found，不看文本
          if (content === undefined) {
            return {
              ...textResult(`Cache miss for ${digest}`),
              structuredContent: { digest, found: false }
            };
          }
          return {
            ...textResult(content.toString(encoding)),
            structuredContent: { digest, found: true, encoding }
          };
        }

        case 'save_entry': {
          const { digest, content, encoding } = requireValid(validateSaveArgs(args));
          await this.cacheManager.save(digestFromHex(digest), Buffer.from(content, encoding));
          return textResult(`Successfully stored entry ${digest}`);
        }

        case 'prune_cache': {
          const { weeks = this.defaultRetentionWeeks } = requireValid(validatePruneArgs(args));
          const report = await this.cacheManager.prune(weeks);
          return textResult(JSON.stringify(report, null, 2));
        }

        default:
          throw new CacheError(CacheErrorCode.INVALID_INPUT, `Unknown tool: ${name}`, { tool: name });
      }
    }, { tool: name });
  }

  readResource(uri: string): string {
    switch (uri) {
      case 'cache://stats':
        return JSON.stringify(this.cacheManager.getStats(), null, 2);
      default:
        throw new CacheError(CacheErrorCode.INVALID_INPUT, `Unknown resource: ${uri}`, { uri });
    }
  }
}

function requireValid<T>(result: ValidationResult<T>): T {
  if (!result.isValid || result.value === undefined) {
    throw new CacheError(
      CacheErrorCode.INVALID_INPUT,
      `输入验证失败: ${formatValidationErrors(result.errors)}`,
      { errors: result.errors }
    );
  }
  return result.value;
}

function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}
