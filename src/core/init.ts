/**
 * 初始化鉴权配置文件
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomBytes } from 'crypto';
import type { ConfigFormat, InitConfigResult, TokenEntry } from '../types/config.js';
import type { Settings } from '../utils/config.js';
import { PROJECT_ROOT_ENV } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { ApiRequestError, invalidArgument } from './errors.js';
import { configFileName, findConfig, resolveProjectRoot } from './locate.js';
import { serializeTokens, validateTokens } from './tokens.js';

export interface InitConfigOptions {
  projectRoot?: string | null;
  overwrite?: boolean;
  tokens?: unknown[] | null;
  fmt?: string | null;
}

/** 模板中的示例项均为空值，需用户手动填写 */
export function defaultTemplate(): TokenEntry[] {
  return [
    { type: 'header', key: 'Authorization', value: '' },
    { type: 'param', key: 'access_token', value: '' },
  ];
}

export function parseFormat(fmt: string | null | undefined): ConfigFormat {
  const normalized = (fmt ?? 'yaml').trim().toLowerCase();
  if (normalized === 'yaml' || normalized === 'yml') {
    return 'yaml';
  }
  if (normalized === 'json') {
    return 'json';
  }
  throw invalidArgument(`不支持的配置格式: ${fmt}，仅支持 yaml 或 json`);
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

function isNotDirectory(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'EEXIST' || error.code === 'ENOTDIR')
  );
}

/**
 * 先写临时文件再 rename 覆盖目标，避免留下写了一半的配置
 */
export async function writeFileAtomic(target: string, content: string): Promise<void> {
  const dir = path.dirname(target);
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    if (isNotDirectory(error)) {
      throw invalidArgument(`project_root 不是目录: ${dir}`);
    }
    throw error;
  }
  const tmp = path.join(dir, `.${path.basename(target)}.${randomBytes(6).toString('hex')}.tmp`);
  try {
    await fs.writeFile(tmp, content, 'utf-8');
    await fs.rename(tmp, target);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

export async function initConfig(
  options: InitConfigOptions,
  settings: Settings
): Promise<InitConfigResult> {
  const format = parseFormat(options.fmt);
  const tokens =
    options.tokens === null || options.tokens === undefined
      ? defaultTemplate()
      : validateTokens(options.tokens);

  const root = resolveProjectRoot(options.projectRoot, settings);
  const target = path.join(root, configFileName(format));

  if (!options.overwrite && (await exists(target))) {
    throw new ApiRequestError(
      'AlreadyExists',
      `配置文件已存在：${target}\n如需覆盖请设置 overwrite=true`
    );
  }

  await writeFileAtomic(target, serializeTokens(tokens, format));
  logger.info(`已写入配置文件: ${target}（${tokens.length} 项）`);

  const located = await findConfig(options.projectRoot, settings);
  const autoDiscoverable = located.path === target;

  const result: InitConfigResult = {
    path: target,
    created: true,
    format,
    count: tokens.length,
    auto_discoverable: autoDiscoverable,
    next_steps: [
      '打开上述文件，填入实际 token 值（空值项不会被发送）',
      '可保留或删除不需要的项；可添加更多 {type, key, value} 条目',
    ],
  };

  if (autoDiscoverable) {
    result.note = '配置文件位置正确，api_request 可以自动发现并使用';
  } else {
    const shadow = located.path ? `（当前会优先使用 ${located.path}）` : '';
    result.warning =
      `配置文件创建在 ${target}，但可能无法被自动发现${shadow}。\n` +
      `建议：设置环境变量 ${PROJECT_ROOT_ENV}=${root} 或在调用时明确指定 project_root`;
  }

  return result;
}
