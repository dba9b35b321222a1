import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { Config } from '../../../src/core/config.js';
import { buildProgram } from '../../../src/program.js';
import { MemoryConfigStore } from '../../helpers/memory-store.js';

import type { CLIContext } from '../../../src/utils/context.js';
import type { Logger } from '../../../src/utils/logger.js';

interface Harness {
  store: MemoryConfigStore;
  lines: string[];
  run: (...args: string[]) => Promise<void>;
}

function createHarness(content?: string): Harness {
  const store = new MemoryConfigStore(content);
  const lines: string[] = [];
  const logger: Logger = {
    info: (msg) => lines.push(msg),
    warn: (msg) => lines.push(`warn: ${msg}`),
    error: (msg) => lines.push(`error: ${msg instanceof Error ? msg.message : msg}`),
    debug: () => {},
    isVerbose: () => false,
  };
  const ctx: CLIContext = { logger, store };
  return {
    store,
    lines,
    run: async (...args: string[]) => {
      const program = buildProgram(() => ctx).exitOverride();
      await program.parseAsync(['node', 'cmdctx', ...args]);
    },
  };
}

async function loaded(store: MemoryConfigStore): Promise<Config> {
  const { config } = await Config.load(store);
  return config;
}

describe('cmdctx CLI', () => {
  beforeEach(() => {
    process.exitCode = undefined;
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  it('lists the seeded contexts when no file exists', async () => {
    const h = createHarness();
    await h.run('list', 'test');
    expect(h.lines).toEqual(['test:', ' * default  [cargo] test']);
    expect(h.store.writes).toBe(0);
  });

  it('adds entries, switches the default and shows the resolved command', async () => {
    const h = createHarness();
    await h.run('add', 'rust-test', 'cargo-test', 'test', '--type', 'cargo', '--default');
    await h.run('add', 'rust-test', 'cargo-test-verbose', 'test', '-t', 'cargo', '--', '--nocapture');
    expect(process.exitCode).toBeUndefined();

    let config = await loaded(h.store);
    expect(config.commands.getOrDefaultConfig('rust-test').params).toEqual([]);

    await h.run('default', 'rust-test', 'cargo-test-verbose');
    config = await loaded(h.store);
    expect(config.commands.getOrDefaultConfig('rust-test').params).toEqual(['--nocapture']);

    h.lines.length = 0;
    await h.run('show', 'rust-test');
    expect(h.lines).toEqual([
      'command: test',
      'type: cargo',
      'command line: cargo test --nocapture',
      'params: --nocapture',
      'working directory: (current directory)',
      'allow multiple instances: no',
    ]);
  });

  it('stores env, pre-command and concurrency flags', async () => {
    const h = createHarness();
    await h.run('add', 'app', 'build', 'npm', 'run', 'build');
    await h.run(
      'add',
      'app',
      'serve',
      'npm',
      'start',
      '--env',
      'PORT=3000',
      '-e',
      'HOST=localhost',
      '--pre-command',
      'build',
      '--allow-multiple',
    );
    const details = (await loaded(h.store)).commands.getConfigs('app').get('serve');
    expect(details).toEqual({
      command: 'npm',
      commandType: 'shell',
      env: { HOST: 'localhost', PORT: '3000' },
      preCommand: 'build',
      params: ['start'],
      allowMultipleInstances: true,
    });
    expect(h.lines).toContain('Saved app/serve');
  });

  it('reports a validator failure and leaves the file untouched', async () => {
    const h = createHarness();
    await h.run('add', 'app', 'serve', 'npm', '--pre-command', 'missing');
    expect(process.exitCode).toBe(1);
    expect(h.lines).toEqual(["error: pre_command 'missing' does not exist as a command key"]);
    expect(h.store.writes).toBe(0);
  });

  it('reports a missing working directory', async () => {
    const h = createHarness();
    await h.run('add', 'app', 'serve', 'npm', '--cwd', '/cmdctx/definitely/missing');
    expect(process.exitCode).toBe(1);
    expect(h.lines).toEqual(['error: Working directory does not exist: /cmdctx/definitely/missing']);
  });

  it('rejects an unknown command type', async () => {
    const h = createHarness();
    await h.run('add', 'app', 'serve', 'make', '--type', 'make');
    expect(process.exitCode).toBe(1);
    expect(h.lines).toEqual(["error: Unsupported command type 'make'. Expected 'cargo' or 'shell'."]);
  });

  it('does not rewrite an unchanged entry', async () => {
    const h = createHarness();
    await h.run('add', 'app', 'build', 'make');
    await h.run('add', 'app', 'build', 'make');
    expect(h.store.writes).toBe(1);
    expect(h.lines).toEqual(['Saved app/build', 'app/build is unchanged']);
  });

  describe('default', () => {
    it('reports a missing key in lenient mode', async () => {
      const h = createHarness();
      await h.run('default', 'ghost', 'k');
      expect(process.exitCode).toBe(1);
      expect(h.lines).toEqual(["error: Config key 'k' not found in context 'ghost'"]);
    });

    it('reports a missing context in strict mode', async () => {
      const h = createHarness();
      await h.run('default', 'ghost', 'k', '--strict');
      expect(process.exitCode).toBe(1);
      expect(h.lines).toEqual(["error: Context 'ghost' is not registered"]);
    });
  });

  describe('show', () => {
    it('fails for a context without entries', async () => {
      const h = createHarness();
      await h.run('show', 'lint');
      expect(process.exitCode).toBe(1);
      expect(h.lines).toEqual(["error: No command configured for context 'lint'"]);
    });

    it('shows a specific key', async () => {
      const h = createHarness();
      await h.run('show', 'bench', 'default');
      expect(h.lines[0]).toBe('command: bench');
    });
  });

  describe('remove', () => {
    it('removes the default entry and warns', async () => {
      const h = createHarness();
      await h.run('remove', 'test', 'default');
      expect(h.lines).toEqual([
        'Removed test/default',
        'warn: test no longer has a default; run `cmdctx default` to pick one',
      ]);
      const config = await loaded(h.store);
      expect(config.commands.getConfigs('test').size).toBe(0);
    });

    it('does nothing for an unknown key', async () => {
      const h = createHarness();
      await h.run('remove', 'test', 'nope');
      expect(h.lines).toEqual(['test/nope does not exist; nothing to do.']);
      expect(h.store.writes).toBe(0);
    });
  });

  describe('init', () => {
    it('writes the seeded configuration', async () => {
      const h = createHarness();
      await h.run('init');
      expect(h.lines).toEqual(['Wrote default configuration to memory://config.toml']);
      expect((await loaded(h.store)).commands.contexts()).toEqual(['run', 'test', 'build', 'bench']);
    });

    it('keeps an existing file unless forced', async () => {
      const h = createHarness('[commands]\n');
      await h.run('init');
      expect(h.lines).toEqual([
        'memory://config.toml already exists; use --force to overwrite',
      ]);
      expect(h.store.writes).toBe(0);
      await h.run('init', '--force');
      expect(h.store.writes).toBe(1);
    });
  });

  it('exits with status 3 on an unparseable file', async () => {
    const h = createHarness('commands = [');
    await h.run('list');
    expect(process.exitCode).toBe(3);
    expect(h.lines).toHaveLength(1);
    expect(h.lines[0]?.startsWith('error: Failed to parse memory://config.toml: ')).toBe(true);
  });

  it('logs load warnings before acting', async () => {
    const h = createHarness('[commands.test.entries.broken]\nparams = ["x"]\n');
    await h.run('list');
    expect(h.lines).toEqual([
      'warn: commands.test.entries.broken: missing command, skipping',
      'test:',
      '  (no entries)',
    ]);
  });
});
