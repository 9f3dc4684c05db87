/**
 * 配置项与调用方请求数据的合并
 * 纯函数，不涉及文件或网络
 */

import type { StringMap } from '../types/config.js';
import { invalidArgument } from './errors.js';

const EMPTY_MARKERS = new Set(['', 'null', 'none', 'undefined']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

/** 空串以及 "null"/"none"/"undefined" 表示调用方未传值 */
export function isAbsentMarker(value: string): boolean {
  return EMPTY_MARKERS.has(value.trim().toLowerCase());
}

/**
 * 将调用方传入的 headers/params 规整为字符串映射
 *
 * 接受：对象、对象的 JSON 字符串、[key, value] 数组或 {key, value} 对象组成的列表。
 * 空串以及 "null"/"none"/"undefined" 视为未传。
 */
export function coerceStringMap(input: unknown, name: string): StringMap {
  if (input === null || input === undefined) {
    return {};
  }

  if (typeof input === 'string') {
    const s = input.trim();
    if (isAbsentMarker(s)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(s);
    } catch {
      throw invalidArgument(`${name} 不是合法的 JSON: ${s}`);
    }
    if (typeof parsed === 'string') {
      throw invalidArgument(`${name} 应为对象或键值对列表`);
    }
    return coerceStringMap(parsed, name);
  }

  if (Array.isArray(input)) {
    const result: StringMap = {};
    input.forEach((item, index) => {
      if (Array.isArray(item) && item.length === 2) {
        result[stringify(item[0])] = stringify(item[1]);
      } else if (isPlainObject(item) && 'key' in item && 'value' in item) {
        result[stringify(item.key)] = stringify(item.value);
      } else {
        throw invalidArgument(`${name} 第 ${index + 1} 项应为 [key, value] 或 {key, value}`);
      }
    });
    return result;
  }

  if (isPlainObject(input)) {
    const result: StringMap = {};
    for (const [k, v] of Object.entries(input)) {
      if (v === null || v === undefined) {
        continue;
      }
      result[k] = stringify(v);
    }
    return result;
  }

  throw invalidArgument(`${name} 应为对象或键值对列表`);
}

/** 配置提供默认值，调用方同名 key 覆盖 */
export function mergeParams(fromConfig: StringMap, fromCaller: StringMap): StringMap {
  return { ...fromConfig, ...fromCaller };
}

/** 与 mergeParams 相同，但 header 名不区分大小写 */
export function mergeHeaders(fromConfig: StringMap, fromCaller: StringMap): StringMap {
  const callerNames = new Set(Object.keys(fromCaller).map((k) => k.toLowerCase()));
  const merged: StringMap = {};
  for (const [k, v] of Object.entries(fromConfig)) {
    if (!callerNames.has(k.toLowerCase())) {
      merged[k] = v;
    }
  }
  return { ...merged, ...fromCaller };
}

export function hasHeader(headers: StringMap, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((k) => k.toLowerCase() === lower);
}
