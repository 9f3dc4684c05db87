/**
 * 读取鉴权配置，合并到请求中并发起 HTTP 调用
 */

import * as fs from 'fs/promises';
import type {
  BodyKind,
  HttpMethod,
  RequestSpec,
  ResponseEnvelope,
  StringMap,
  TokenEntry,
} from '../types/config.js';
import type { Settings } from '../utils/config.js';
import { MAX_TIMEOUT_MS } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { ApiRequestError, invalidArgument } from './errors.js';
import { findConfig } from './locate.js';
import { coerceStringMap, hasHeader, isAbsentMarker, mergeHeaders, mergeParams } from './merge.js';
import { formatFromPath, parseTokens, partitionTokens } from './tokens.js';
import { sendWithBody } from './transport.js';
import type { HttpClient } from './transport.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export const SUPPORTED_METHODS: readonly HttpMethod[] = [
  'GET',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'HEAD',
  'OPTIONS',
];

export interface ApiRequestInput {
  method: unknown;
  url: unknown;
  params?: unknown;
  headers?: unknown;
  body?: unknown;
  projectRoot?: string | null;
  timeoutSeconds?: number | null;
}

export interface DispatchDeps {
  settings: Settings;
  fetch?: FetchLike;
  /** GET/HEAD 携带 body 时使用 */
  sendWithBody?: HttpClient;
  /** 向上查找配置的起点，默认 process.cwd() */
  cwd?: string;
}

export interface LoadedTokens {
  path: string | null;
  searched: string[];
  tokens: TokenEntry[];
}

/** 每次调用都重新读取，不做缓存 */
export async function loadConfigTokens(
  projectRoot: string | null | undefined,
  settings: Settings,
  cwd?: string
): Promise<LoadedTokens> {
  const location = await findConfig(projectRoot, settings, cwd);
  if (!location.path) {
    logger.debug(`未找到配置文件，已搜索: ${location.searched.join(', ')}`);
    return { ...location, tokens: [] };
  }
  const text = await fs.readFile(location.path, 'utf-8');
  let tokens: TokenEntry[];
  try {
    tokens = parseTokens(text, formatFromPath(location.path));
  } catch (error) {
    if (error instanceof ApiRequestError) {
      throw new ApiRequestError(error.kind, `${location.path}: ${error.message}`, {
        cause: error.cause,
      });
    }
    throw error;
  }
  return { path: location.path, searched: location.searched, tokens };
}

export function normalizeMethod(method: unknown): HttpMethod {
  const upper = typeof method === 'string' ? method.trim().toUpperCase() : '';
  if (!upper) {
    throw invalidArgument('method 不能为空，例如 GET/POST/PUT/DELETE');
  }
  const found = SUPPORTED_METHODS.find((m) => m === upper);
  if (!found) {
    throw invalidArgument(`不支持的请求方法: ${upper}`);
  }
  return found;
}

export function normalizeUrl(url: unknown): string {
  if (typeof url !== 'string' || url.trim() === '') {
    throw invalidArgument('url 不能为空');
  }
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    throw invalidArgument(`url 不是合法的绝对地址: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw invalidArgument(`url 仅支持 http/https: ${url}`);
  }
  return parsed.toString();
}

export function normalizeTimeout(
  timeoutSeconds: number | null | undefined,
  fallback: number
): number {
  const seconds = timeoutSeconds ?? fallback;
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw invalidArgument(`timeout_seconds 应为正数: ${seconds}`);
  }
  if (seconds * 1000 > MAX_TIMEOUT_MS) {
    throw invalidArgument(`timeout_seconds 不能超过 ${MAX_TIMEOUT_MS / 1000}: ${seconds}`);
  }
  return seconds;
}

export function timeoutMs(timeoutSeconds: number): number {
  return Math.min(MAX_TIMEOUT_MS, Math.max(1, Math.ceil(timeoutSeconds * 1000)));
}

/**
 * 对象/数组按 JSON 发送，其余原样发送
 * 空串以及 "null"/"none"/"undefined" 视为没有 body
 */
export function encodeBody(
  body: unknown,
  headers: StringMap
): { body?: string; bodyKind: BodyKind; headers: StringMap } {
  if (body === null || body === undefined) {
    return { bodyKind: null, headers };
  }
  if (typeof body === 'string' && isAbsentMarker(body)) {
    return { bodyKind: null, headers };
  }
  if (typeof body === 'object') {
    const withType = hasHeader(headers, 'content-type')
      ? headers
      : { ...headers, 'Content-Type': 'application/json' };
    return { body: JSON.stringify(body), bodyKind: 'json', headers: withType };
  }
  return { body: String(body), bodyKind: 'content', headers };
}

/** 由配置项和调用方输入得到最终请求，不发起网络调用 */
export function buildRequestSpec(
  input: ApiRequestInput,
  tokens: TokenEntry[],
  defaultTimeoutSeconds: number
): RequestSpec {
  const fromConfig = partitionTokens(tokens);
  const method = normalizeMethod(input.method);
  const url = normalizeUrl(input.url);
  const params = mergeParams(fromConfig.params, coerceStringMap(input.params, 'params'));
  const merged = mergeHeaders(fromConfig.headers, coerceStringMap(input.headers, 'headers'));
  const encoded = encodeBody(input.body, merged);
  const timeoutSeconds = normalizeTimeout(input.timeoutSeconds, defaultTimeoutSeconds);

  return {
    method,
    url,
    params,
    headers: encoded.headers,
    body: encoded.body,
    bodyKind: encoded.bodyKind,
    timeoutSeconds,
  };
}

/** 合并后的 params 覆盖 url 中已有的同名查询参数 */
export function buildUrl(url: string, params: StringMap): string {
  const target = new URL(url);
  for (const [k, v] of Object.entries(params)) {
    target.searchParams.set(k, v);
  }
  return target.toString();
}

function isJsonContentType(contentType: string): boolean {
  return contentType.toLowerCase().includes('json');
}

export async function readResponseBody(response: Response): Promise<unknown> {
  const bytes = new Uint8Array(await response.arrayBuffer());
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return `[binary body: ${bytes.byteLength} bytes]`;
  }

  const contentType = response.headers.get('content-type') ?? '';
  if (text !== '' && isJsonContentType(contentType)) {
    try {
      return JSON.parse(text);
    } catch (error) {
      logger.debug(`响应声明为 JSON 但解析失败，按文本返回: ${String(error)}`);
    }
  }
  return text;
}

function describeFetchError(error: unknown, timeoutSeconds: number): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return `请求超时（${timeoutSeconds} 秒）`;
    }
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `请求失败: ${error.message}${cause}`;
  }
  return `请求失败: ${String(error)}`;
}

/** 日志中只出现查询参数名，参数值可能是鉴权信息 */
export function describeRequest(spec: RequestSpec): string {
  const names = Object.keys(spec.params);
  const params = names.length > 0 ? ` params=[${names.join(', ')}]` : '';
  return `${spec.method} ${spec.url}${params}`;
}

export async function sendRequest(
  spec: RequestSpec,
  fetchImpl: FetchLike,
  bodyClient: HttpClient = sendWithBody
): Promise<ResponseEnvelope> {
  const target = buildUrl(spec.url, spec.params);
  const label = describeRequest(spec);
  logger.info(label);

  const started = performance.now();
  const signal = AbortSignal.timeout(timeoutMs(spec.timeoutSeconds));
  let response: Response;
  try {
    if (spec.body !== undefined && (spec.method === 'GET' || spec.method === 'HEAD')) {
      response = await bodyClient({
        url: target,
        method: spec.method,
        headers: spec.headers,
        body: spec.body,
        signal,
      });
    } else {
      response = await fetchImpl(target, {
        method: spec.method,
        headers: spec.headers,
        body: spec.body,
        redirect: 'follow',
        signal,
      });
    }
  } catch (error) {
    const message = describeFetchError(error, spec.timeoutSeconds);
    logger.error(`${label} ${message}`);
    throw new ApiRequestError('RequestFailed', message, { cause: error });
  }
  const elapsedMs = Math.round(performance.now() - started);

  const headers: StringMap = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  let body: unknown;
  try {
    body = await readResponseBody(response);
  } catch (error) {
    const message = describeFetchError(error, spec.timeoutSeconds);
    throw new ApiRequestError('RequestFailed', `读取响应失败: ${message}`, { cause: error });
  }

  logger.debug(`${label} -> ${response.status} (${elapsedMs}ms)`);

  return {
    status_code: response.status,
    reason: response.statusText || null,
    headers,
    content_type: response.headers.get('content-type'),
    body,
    elapsed_ms: elapsedMs,
    url_final: response.url || target,
    request: {
      method: spec.method,
      url: spec.url,
      headers: spec.headers,
      params: spec.params,
      body_kind: spec.bodyKind,
    },
  };
}

export async function apiRequest(
  input: ApiRequestInput,
  deps: DispatchDeps
): Promise<ResponseEnvelope> {
  const { tokens, path } = await loadConfigTokens(input.projectRoot, deps.settings, deps.cwd);
  if (path) {
    logger.debug(`使用配置文件 ${path}（${tokens.length} 项）`);
  }
  const spec = buildRequestSpec(input, tokens, deps.settings.defaultTimeoutSeconds);
  return sendRequest(spec, deps.fetch ?? fetch, deps.sendWithBody);
}
