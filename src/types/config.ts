/**
 * 鉴权配置与请求相关类型定义
 */

export type TokenType = 'header' | 'param';

export type ConfigFormat = 'yaml' | 'json';

export interface TokenEntry {
  type: TokenType;
  key: string;
  value: string;
}

export type StringMap = Record<string, string>;

export type HttpMethod =
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'HEAD'
  | 'OPTIONS';

export type BodyKind = 'json' | 'content' | null;

export interface ConfigLocation {
  path: string | null;
  searched: string[];
}

export interface RequestSpec {
  method: HttpMethod;
  url: string;
  params: StringMap;
  headers: StringMap;
  body?: string;
  bodyKind: BodyKind;
  timeoutSeconds: number;
}

export interface ResponseEnvelope {
  status_code: number;
  reason: string | null;
  headers: StringMap;
  content_type: string | null;
  body: unknown;
  elapsed_ms: number;
  url_final: string;
  request: {
    method: HttpMethod;
    url: string;
    headers: StringMap;
    params: StringMap;
    body_kind: BodyKind;
  };
}

export interface InitConfigResult {
  path: string;
  created: boolean;
  format: ConfigFormat;
  count: number;
  auto_discoverable: boolean;
  next_steps: string[];
  note?: string;
  warning?: string;
}

export interface LocateConfigResult {
  config_found: boolean;
  searched_directories: string[];
  config_path?: string;
  config_directory?: string;
  config_filename?: string;
  tokens_count?: number;
  token_types?: Record<TokenType, number>;
  config_error?: string;
  message?: string;
  env_project_root?: string;
  current_working_directory: string;
}
