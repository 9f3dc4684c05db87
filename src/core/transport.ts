/**
 * 携带 body 的 GET/HEAD 请求
 * fetch 按规范拒绝这类请求，这里改用 undici.request 发送，不跟随重定向
 */

import { request } from 'undici';
import type { HttpMethod, StringMap } from '../types/config.js';

export interface OutgoingRequest {
  url: string;
  method: HttpMethod;
  headers: StringMap;
  body: string;
  signal: AbortSignal;
}

export type HttpClient = (req: OutgoingRequest) => Promise<Response>;

const NULL_BODY_STATUSES = new Set([101, 103, 204, 205, 304]);

export const sendWithBody: HttpClient = async (req) => {
  const res = await request(req.url, {
    method: req.method,
    headers: req.headers,
    body: req.body,
    signal: req.signal,
  });

  const headers = new Headers();
  for (const [name, value] of Object.entries(res.headers)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      value.forEach((v) => headers.append(name, v));
    } else {
      headers.set(name, value);
    }
  }

  const bytes = new Uint8Array(await res.body.arrayBuffer());
  const hasBody = req.method !== 'HEAD' && !NULL_BODY_STATUSES.has(res.statusCode);
  return new Response(hasBody ? bytes : null, { status: res.statusCode, headers });
};
