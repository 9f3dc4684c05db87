import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { apiRequest } from '../core/dispatch.js';
import type { DispatchDeps } from '../core/dispatch.js';
import { runTool } from './result.js';

const keyValueInput = z
  .union([z.record(z.string(), z.unknown()), z.string(), z.array(z.unknown())])
  .nullish();

export default function (server: McpServer, deps: DispatchDeps) {
  server.registerTool(
    'api_request',
    {
      description: `读取鉴权配置并请求指定 API，返回状态码、响应头、耗时、最终地址与响应体。
- 从 .mcp_api_request.yml/.yaml/.json 读取鉴权配置，找不到配置时不注入任何鉴权项
- type=header 的项加入请求头，type=param 的项加入查询参数，空值项不发送
- 调用方传入的 headers/params 覆盖同名的鉴权项
- body 为对象/数组时按 JSON 发送，其余按原始内容发送
- 4xx/5xx 响应原样返回，不视为错误`,
      inputSchema: {
        method: z.string().describe('请求方法，如 GET/POST/PUT/PATCH/DELETE'),
        url: z.string().describe('完整的请求地址，如 https://api.example.com/users'),
        params: keyValueInput.describe('查询参数'),
        headers: keyValueInput.describe('请求头'),
        body: z.unknown().optional().describe('请求体'),
        project_root: z.string().nullish().describe('项目根目录，用于查找鉴权配置'),
        timeout_seconds: z.number().nullish().describe('超时时间（秒），默认 30'),
      },
    },
    async (args) =>
      runTool('api_request', () =>
        apiRequest(
          {
            method: args.method,
            url: args.url,
            params: args.params,
            headers: args.headers,
            body: args.body,
            projectRoot: args.project_root,
            timeoutSeconds: args.timeout_seconds,
          },
          deps
        )
      )
  );
}
