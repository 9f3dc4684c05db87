#!/usr/bin/env node

/**
 * MCP 接口请求服务器
 * 提供 init_config / locate_config / api_request 工具，自动为请求注入项目内配置的鉴权信息
 *
 * 环境变量（可写在 .env 中）:
 *     MCP_API_REQUEST_PROJECT_ROOT  默认项目根目录
 *     MCP_API_REQUEST_TIMEOUT       默认超时时间（秒）
 *     LOG_LEVEL                     DEBUG/INFO/WARNING/ERROR
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config } from 'dotenv';
import { createServer, MCP_NAME } from './server.js';
import { loadSettings, logger } from './utils/index.js';

// 自动加载 .env 文件中的环境变量
config();

/**
 * 启动服务器
 */
async function main() {
  const settings = loadSettings();
  const server = createServer(settings);
  // 使用 stdio 传输方式
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`[${MCP_NAME}] 服务器已启动`);
}

// 处理未捕获的错误
process.on('uncaughtException', (error) => {
  logger.error(`[${MCP_NAME}] 未捕获的异常:`, error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`[${MCP_NAME}] 未处理的 Promise 拒绝:`, reason);
  process.exit(1);
});

// 运行服务器
main().catch((error) => {
  logger.error(`[${MCP_NAME}] 启动失败:`, error);
  process.exit(1);
});
