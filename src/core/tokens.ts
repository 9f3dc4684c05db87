/**
 * 鉴权配置文件的解析与序列化
 *
 * 文件内容为列表，每项 {type, key, value}：
 *   - type: header | param
 *   - key: 鉴权字段名
 *   - value: 鉴权值，空字符串表示不发送
 */

import { z } from 'zod';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ConfigFormat, TokenEntry } from '../types/config.js';
import { ApiRequestError, invalidArgument } from './errors.js';

const TOKEN_TYPES = ['header', 'param'] as const;

/** JSON 中超出安全整数范围的数值已被舍入，只能要求加引号 */
const safeNumber = z
  .number()
  .refine(
    (n) => !Number.isInteger(n) || Number.isSafeInteger(n),
    '数值超出精度范围，请用引号包裹'
  );

const scalar = z
  .union([z.string(), safeNumber, z.bigint(), z.boolean()])
  .transform((v) => String(v).trim());

/** 磁盘上的配置项：type 不区分大小写，数字/布尔值按字符串处理 */
const StoredTokenSchema = z.object({
  type: z
    .string({ required_error: '缺少 type' })
    .transform((t) => t.trim().toLowerCase())
    .pipe(z.enum(TOKEN_TYPES, { message: 'type 仅支持 header 或 param' })),
  key: scalar.pipe(z.string().min(1, '缺少 key')),
  value: scalar.nullish().transform((v) => v ?? ''),
});

const StoredConfigSchema = z.array(StoredTokenSchema, {
  invalid_type_error: '根节点应为列表',
});

/** 调用方传给 init_config 的配置项，原样写入 */
export const TokenEntrySchema = z.object({
  type: z.enum(TOKEN_TYPES, { message: 'type 仅支持 header 或 param' }),
  key: z.string().refine((k) => k.trim() !== '', '缺少 key'),
  value: z.string().default(''),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      if (issue.path.length === 0) {
        return issue.message;
      }
      const [index, ...rest] = issue.path;
      const field = rest.length > 0 ? ` ${rest.join('.')}` : '';
      return typeof index === 'number'
        ? `第 ${index + 1} 项${field}: ${issue.message}`
        : `${issue.path.join('.')}: ${issue.message}`;
    })
    .join('; ');
}

export function formatFromPath(filePath: string): ConfigFormat {
  return filePath.toLowerCase().endsWith('.json') ? 'json' : 'yaml';
}

/**
 * 解析配置文件文本
 * 空文件或 null 文档视为没有任何配置项；YAML 整数按 bigint 读取，保持原值
 */
export function parseTokens(text: string, format: ConfigFormat): TokenEntry[] {
  let data: unknown;
  try {
    data =
      format === 'json'
        ? JSON.parse(text.trim() || '[]')
        : parseYaml(text, { intAsBigInt: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ApiRequestError('ConfigParseError', `配置文件无法解析: ${reason}`, {
      cause: error,
    });
  }

  if (data === null || data === undefined) {
    return [];
  }

  const result = StoredConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ApiRequestError(
      'ConfigParseError',
      `配置文件格式错误: ${describeIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/** 校验调用方提供的配置项，格式不正确时抛出 InvalidArgument */
export function validateTokens(tokens: unknown): TokenEntry[] {
  const result = z.array(TokenEntrySchema).safeParse(tokens);
  if (!result.success) {
    throw invalidArgument(`tokens 格式错误: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function serializeTokens(tokens: TokenEntry[], format: ConfigFormat): string {
  const data = tokens.map(({ type, key, value }) => ({ type, key, value }));
  if (format === 'json') {
    return `${JSON.stringify(data, null, 2)}\n`;
  }
  return stringifyYaml(data);
}

/** 去掉空值项，按类型拆分；同名 key 以后出现的为准 */
export function partitionTokens(tokens: TokenEntry[]): {
  headers: Record<string, string>;
  params: Record<string, string>;
} {
  const headers: Record<string, string> = {};
  const params: Record<string, string> = {};
  for (const token of tokens) {
    if (token.value === '') {
      continue;
    }
    if (token.type === 'header') {
      headers[token.key] = token.value;
    } else {
      params[token.key] = token.value;
    }
  }
  return { headers, params };
}
