import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  configFileName,
  findConfig,
  findConfigInDir,
  resolveProjectRoot,
  searchDirectories,
} from '../../src/core/locate.js';
import { makeTempDir, removeDir } from '../helpers.js';

describe('resolveProjectRoot', () => {
  it('resolves an explicit root to an absolute path', () => {
    expect(resolveProjectRoot('/srv/app/../project', {})).toBe('/srv/project');
  });

  it('expands the home directory', () => {
    expect(resolveProjectRoot('~/work', {})).toBe(path.join(os.homedir(), 'work'));
  });

  it('falls back to the configured root, then the working directory', () => {
    expect(resolveProjectRoot(null, { projectRoot: '/env/root' })).toBe('/env/root');
    expect(resolveProjectRoot('   ', {})).toBe(path.resolve(process.cwd()));
  });
});

describe('configFileName', () => {
  it('maps formats to fixed file names', () => {
    expect(configFileName('yaml')).toBe('.mcp_api_request.yml');
    expect(configFileName('json')).toBe('.mcp_api_request.json');
  });
});

describe('searchDirectories', () => {
  it('only searches an explicit root', () => {
    expect(searchDirectories('/srv/project', { projectRoot: '/env/root' }, '/a/b')).toEqual(['/srv/project']);
  });

  it('walks up at most five directories from the working directory', () => {
    expect(searchDirectories(undefined, {}, '/a/b/c/d/e/f')).toEqual([
      '/a/b/c/d/e/f',
      '/a/b/c/d/e',
      '/a/b/c/d',
      '/a/b/c',
      '/a/b',
    ]);
  });

  it('puts the configured root first and stops at the filesystem root', () => {
    expect(searchDirectories(undefined, { projectRoot: '/env/root' }, '/a')).toEqual(['/env/root', '/a', '/']);
  });

  it('does not repeat the configured root', () => {
    expect(searchDirectories(undefined, { projectRoot: '/a' }, '/a')).toEqual(['/a', '/']);
  });
});

describe('findConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('prefers .yml, then .yaml, then .json', async () => {
    await fs.writeFile(path.join(dir, '.mcp_api_request.json'), '[]');
    expect(await findConfigInDir(dir)).toBe(path.join(dir, '.mcp_api_request.json'));

    await fs.writeFile(path.join(dir, '.mcp_api_request.yaml'), '[]');
    expect(await findConfigInDir(dir)).toBe(path.join(dir, '.mcp_api_request.yaml'));

    await fs.writeFile(path.join(dir, '.mcp_api_request.yml'), '[]');
    expect(await findConfigInDir(dir)).toBe(path.join(dir, '.mcp_api_request.yml'));
  });

  it('ignores a directory with a config file name', async () => {
    await fs.mkdir(path.join(dir, '.mcp_api_request.yml'));
    expect(await findConfigInDir(dir)).toBeNull();
  });

  it('returns null with the searched directories when nothing is found', async () => {
    expect(await findConfig(dir, {})).toEqual({ path: null, searched: [dir] });
  });

  it('finds a config in an ancestor of the working directory', async () => {
    const nested = path.join(dir, 'a', 'b');
    await fs.mkdir(nested, { recursive: true });
    await fs.writeFile(path.join(dir, '.mcp_api_request.yml'), '[]');

    expect(await findConfig(undefined, {}, nested)).toEqual({
      path: path.join(dir, '.mcp_api_request.yml'),
      searched: [nested, path.join(dir, 'a'), dir],
    });
  });
});
