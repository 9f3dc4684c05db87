import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { initConfig } from '../core/init.js';
import type { Settings } from '../utils/config.js';
import { runTool } from './result.js';

export default function (server: McpServer, settings: Settings) {
  server.registerTool(
    'init_config',
    {
      description: `初始化鉴权配置文件，写入到项目根目录。
- 文件名：.mcp_api_request.yml（fmt=json 时为 .mcp_api_request.json）
- 内容：列表，每项 {type, key, value}；type 为 header 或 param，value 为空的项不会被发送
- 未传 tokens 时写入空值模板，需手动填写
- 文件已存在且 overwrite 不为 true 时拒绝覆盖`,
      inputSchema: {
        project_root: z
          .string()
          .nullish()
          .describe('项目根目录，默认取 MCP_API_REQUEST_PROJECT_ROOT 或当前工作目录'),
        overwrite: z.boolean().optional().describe('已存在时是否覆盖，默认 false'),
        tokens: z
          .array(
            z.object({
              type: z.string().describe('header 或 param'),
              key: z.string(),
              value: z.string().optional(),
            })
          )
          .nullish()
          .describe('要写入的配置项，不传则写入模板'),
        fmt: z.string().optional().describe('yaml（默认）或 json'),
      },
    },
    async (args) =>
      runTool('init_config', () =>
        initConfig(
          {
            projectRoot: args.project_root,
            overwrite: args.overwrite ?? false,
            tokens: args.tokens,
            fmt: args.fmt,
          },
          settings
        )
      )
  );
}
