import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

let originalCwd: string;
let tempDir: string;
let originalHome: string | undefined;

beforeEach(() => {
  originalCwd = process.cwd();
  originalHome = process.env.HOME;
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'threadfold-config-'));
  process.chdir(tempDir);
  process.env.HOME = tempDir;
});

afterEach(() => {
  process.chdir(originalCwd);
  process.env.HOME = originalHome;
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeGlobalConfig(config: object): void {
  const dir = path.join(tempDir, '.config', 'threadfold');
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify(config), 'utf-8');
}

describe('config loader precedence', () => {
  it('uses defaults when no config exists', async () => {
    vi.resetModules();
    const { loadConfig } = await import('../src/config/loader.js');
    expect(loadConfig()).toEqual({ listing: 'listing.json', foldUnread: false, defaultView: 'unfolded' });
  });

  it('falls back to global config when no local config is present', async () => {
    writeGlobalConfig({ listing: 'global.json', foldUnread: true });

    vi.resetModules();
    const { loadConfig } = await import('../src/config/loader.js');
    const config = loadConfig();
    expect(config.listing).toBe('global.json');
    expect(config.foldUnread).toBe(true);
  });

  it('prioritizes local project config over global config', async () => {
    writeGlobalConfig({ listing: 'global.json' });
    fs.writeFileSync(
      path.join(tempDir, '.threadfold.json'),
      JSON.stringify({ listing: 'local.json', defaultView: 'folded' }),
      'utf-8'
    );

    vi.resetModules();
    const { loadConfig } = await import('../src/config/loader.js');
    const config = loadConfig();
    expect(config.listing).toBe('local.json');
    expect(config.defaultView).toBe('folded');
  });

  it('finds the project config from a subdirectory', async () => {
    fs.writeFileSync(path.join(tempDir, '.threadfold.json'), JSON.stringify({ listing: 'up.json' }), 'utf-8');
    const nested = path.join(tempDir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    process.chdir(nested);

    vi.resetModules();
    const { loadConfig } = await import('../src/config/loader.js');
    expect(loadConfig().listing).toBe('up.json');
  });

  it('rejects invalid JSON', async () => {
    fs.writeFileSync(path.join(tempDir, '.threadfold.json'), '{ nope', 'utf-8');

    vi.resetModules();
    const { loadConfig } = await import('../src/config/loader.js');
    expect(() => loadConfig()).toThrow('Invalid JSON in config file:');
  });

  it('rejects an unknown default view', async () => {
    fs.writeFileSync(path.join(tempDir, '.threadfold.json'), JSON.stringify({ defaultView: 'sideways' }), 'utf-8');

    vi.resetModules();
    const { loadConfig } = await import('../src/config/loader.js');
    expect(() => loadConfig()).toThrow();
  });
});

describe('resolveDefaultFolded', () => {
  it('lets flags override the configured view', async () => {
    const { ConfigSchema, resolveDefaultFolded } = await import('../src/config/loader.js');
    const config = ConfigSchema.parse({ defaultView: 'folded' });
    expect(resolveDefaultFolded(config, { folded: false, unfolded: false })).toBe(true);
    expect(resolveDefaultFolded(config, { folded: false, unfolded: true })).toBe(false);
    expect(resolveDefaultFolded(ConfigSchema.parse({}), { folded: true, unfolded: false })).toBe(true);
  });
});
