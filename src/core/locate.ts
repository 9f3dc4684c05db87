/**
 * 项目根目录解析与配置文件查找
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { ConfigFormat, ConfigLocation } from '../types/config.js';
import type { Settings } from '../utils/config.js';

/** 同一目录下的查找顺序 */
export const CONFIG_CANDIDATES = [
  '.mcp_api_request.yml',
  '.mcp_api_request.yaml',
  '.mcp_api_request.json',
] as const;

/** 从工作目录向上查找的最大目录数（含工作目录本身） */
export const MAX_SEARCH_DEPTH = 5;

export function configFileName(format: ConfigFormat): string {
  return format === 'json' ? '.mcp_api_request.json' : '.mcp_api_request.yml';
}

function isBlank(value: string | null | undefined): value is null | undefined | '' {
  return value === null || value === undefined || value.trim() === '';
}

function expandHome(p: string): string {
  if (p === '~') {
    return os.homedir();
  }
  if (p.startsWith('~/') || p.startsWith('~\\')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

export function toAbsoluteDir(p: string): string {
  return path.resolve(expandHome(p.trim()));
}

/**
 * 解析项目根目录
 * 优先级：显式传入 > MCP_API_REQUEST_PROJECT_ROOT > 当前工作目录
 */
export function resolveProjectRoot(
  projectRoot: string | null | undefined,
  settings: Pick<Settings, 'projectRoot'>
): string {
  if (!isBlank(projectRoot)) {
    return toAbsoluteDir(projectRoot);
  }
  if (settings.projectRoot) {
    return toAbsoluteDir(settings.projectRoot);
  }
  return path.resolve(process.cwd());
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/** 在单个目录中查找配置文件 */
export async function findConfigInDir(dir: string): Promise<string | null> {
  for (const name of CONFIG_CANDIDATES) {
    const candidate = path.join(dir, name);
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/** 需要查找的目录列表，按优先级排列且不重复 */
export function searchDirectories(
  projectRoot: string | null | undefined,
  settings: Pick<Settings, 'projectRoot'>,
  cwd: string = process.cwd()
): string[] {
  if (!isBlank(projectRoot)) {
    return [toAbsoluteDir(projectRoot)];
  }

  const dirs: string[] = [];
  if (settings.projectRoot) {
    dirs.push(toAbsoluteDir(settings.projectRoot));
  }

  let current = path.resolve(cwd);
  for (let i = 0; i < MAX_SEARCH_DEPTH; i++) {
    if (!dirs.includes(current)) {
      dirs.push(current);
    }
    const parent = path.dirname(current);
    if (parent === current) {
      // 已到达根目录
      break;
    }
    current = parent;
  }
  return dirs;
}

/**
 * 查找配置文件
 * 返回找到的路径（未找到为 null）以及实际搜索过的目录
 */
export async function findConfig(
  projectRoot: string | null | undefined,
  settings: Pick<Settings, 'projectRoot'>,
  cwd: string = process.cwd()
): Promise<ConfigLocation> {
  const searched: string[] = [];
  for (const dir of searchDirectories(projectRoot, settings, cwd)) {
    searched.push(dir);
    const found = await findConfigInDir(dir);
    if (found) {
      return { path: found, searched };
    }
  }
  return { path: null, searched };
}
