import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { FetchLike } from './core/dispatch.js';
import type { Settings } from './utils/config.js';
import registerApiRequest from './tools/api_request.js';
import registerInitConfig from './tools/init_config.js';
import registerLocateConfig from './tools/locate_config.js';

export const MCP_NAME = 'api_request_mcp';
export const MCP_VERSION = '1.0.0';

/**
 * 创建 MCP 服务器实例并注册全部工具
 */
export function createServer(settings: Settings, fetchImpl?: FetchLike): McpServer {
  const server = new McpServer(
    {
      name: MCP_NAME,
      version: MCP_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  registerInitConfig(server, settings);
  registerLocateConfig(server, settings);
  registerApiRequest(server, { settings, fetch: fetchImpl });

  return server;
}
