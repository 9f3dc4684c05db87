import * as fs from 'fs/promises';
import * as path from 'path';
import type { LocateConfigResult } from '../types/config.js';
import type { Settings } from '../utils/config.js';
import { PROJECT_ROOT_ENV } from '../utils/config.js';
import { isApiRequestError } from './errors.js';
import { findConfig } from './locate.js';
import { formatFromPath, parseTokens } from './tokens.js';

/**
 * 报告配置文件能否被找到，用于排查配置问题
 * 配置内容解析失败时写入 config_error，不抛出
 */
export async function locateConfig(
  projectRoot: string | null | undefined,
  settings: Settings,
  cwd: string = process.cwd()
): Promise<LocateConfigResult> {
  const location = await findConfig(projectRoot, settings, cwd);
  const result: LocateConfigResult = {
    config_found: location.path !== null,
    searched_directories: location.searched,
    current_working_directory: path.resolve(cwd),
  };

  if (location.path) {
    result.config_path = location.path;
    result.config_directory = path.dirname(location.path);
    result.config_filename = path.basename(location.path);
    try {
      const text = await fs.readFile(location.path, 'utf-8');
      const tokens = parseTokens(text, formatFromPath(location.path));
      result.tokens_count = tokens.length;
      result.token_types = {
        header: tokens.filter((t) => t.type === 'header').length,
        param: tokens.filter((t) => t.type === 'param').length,
      };
    } catch (error) {
      if (!isApiRequestError(error)) {
        throw error;
      }
      result.config_error = error.message;
    }
  } else {
    result.message =
      `未找到配置文件。请运行 init_config 创建配置文件，\n` +
      `或设置环境变量 ${PROJECT_ROOT_ENV} 指定项目根目录。`;
  }

  if (settings.projectRoot) {
    result.env_project_root = settings.projectRoot;
  }

  return result;
}
