import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { locateConfig } from '../core/inspect.js';
import type { Settings } from '../utils/config.js';
import { runTool } from './result.js';

export default function (server: McpServer, settings: Settings) {
  server.registerTool(
    'locate_config',
    {
      description: '定位鉴权配置文件，返回找到的路径、搜索过的目录以及配置项统计，用于排查配置问题',
      inputSchema: {
        project_root: z.string().nullish().describe('项目根目录，传入时只在该目录查找'),
      },
    },
    async (args) => runTool('locate_config', () => locateConfig(args.project_root, settings))
  );
}
