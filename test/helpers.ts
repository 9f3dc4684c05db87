import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import type { FetchLike } from '../src/core/dispatch.js';
import type { Settings } from '../src/utils/config.js';

export const settings: Settings = { defaultTimeoutSeconds: 30 };

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'api-request-mcp-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function mockFetch(response: () => Response = () => new Response('ok')) {
  return vi.fn<FetchLike>(async () => response());
}

export function silenceLogs(): void {
  vi.spyOn(console, 'error').mockImplementation(() => {});
}
