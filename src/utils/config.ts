/**
 * 运行时设置加载
 * 从环境变量（以及 dotenv 载入的 .env）读取
 */

import { logger } from './logger.js';

export const PROJECT_ROOT_ENV = 'MCP_API_REQUEST_PROJECT_ROOT';
export const TIMEOUT_ENV = 'MCP_API_REQUEST_TIMEOUT';
export const DEFAULT_TIMEOUT_SECONDS = 30;
/** 定时器能表示的最大毫秒数 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface Settings {
  /** 未显式传入 project_root 时使用的默认项目根目录 */
  projectRoot?: string;
  defaultTimeoutSeconds: number;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const settings: Settings = { defaultTimeoutSeconds: DEFAULT_TIMEOUT_SECONDS };

  const root = env[PROJECT_ROOT_ENV]?.trim();
  if (root) {
    settings.projectRoot = root;
  }

  const rawTimeout = env[TIMEOUT_ENV]?.trim();
  if (rawTimeout) {
    const timeout = Number(rawTimeout);
    if (Number.isFinite(timeout) && timeout > 0 && timeout * 1000 <= MAX_TIMEOUT_MS) {
      settings.defaultTimeoutSeconds = timeout;
    } else {
      logger.warning(`${TIMEOUT_ENV} 不是有效的超时秒数，已忽略: ${rawTimeout}`);
    }
  }

  return settings;
}
