import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { isApiRequestError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

export function jsonResult(data: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}

/** 将错误转换为 MCP 工具错误结果 */
export function errorResult(tool: string, error: unknown): CallToolResult {
  const kind = isApiRequestError(error) ? error.kind : 'InternalError';
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`[${tool}] ${kind}`, error);
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify({
          success: false,
          error: { kind, message },
        }),
      },
    ],
    isError: true,
  };
}

export async function runTool(
  tool: string,
  handler: () => Promise<unknown>
): Promise<CallToolResult> {
  try {
    return jsonResult(await handler());
  } catch (error) {
    return errorResult(tool, error);
  }
}
