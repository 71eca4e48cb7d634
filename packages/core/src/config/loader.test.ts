import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigSchema } from '@copyhead/shared';
import { ConfigLoader } from './loader';

vi.mock('fs');
vi.mock('os');

describe('ConfigLoader', () => {
  const mockHome = '/mock/home';
  const mockCwd = '/mock/cwd';
  const userPath = path.join(mockHome, '.copyhead', 'config.yaml');
  const repoPath = path.join(mockCwd, '.copyhead.yaml');

  function withFiles(files: Record<string, unknown>): void {
    vi.mocked(fs.existsSync).mockImplementation((p) => typeof p === 'string' && p in files);
    vi.mocked(fs.readFileSync).mockImplementation((p) => {
      const content = typeof p === 'string' ? files[p] : undefined;
      return typeof content === 'string' ? content : yaml.dump(content);
    });
  }

  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(os.homedir).mockReturnValue(mockHome);
    vi.mocked(fs.existsSync).mockReturnValue(false);
    vi.mocked(fs.readFileSync).mockReturnValue('');
  });

  describe('load', () => {
    it('returns the defaults when no files exist', () => {
      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });
      expect(config).toEqual(ConfigSchema.parse({}));
    });

    it('loads the user config', () => {
      withFiles({ [userPath]: { mode: 'modify' } });

      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });
      expect(config.mode).toBe('modify');
    });

    it('respects precedence: flags > explicit > env > repo > user', () => {
      withFiles({
        [userPath]: { concurrency: 1, year: 2001 },
        [repoPath]: { concurrency: 2, preserveYears: true },
        '/env/config.yaml': { concurrency: 3 },
        '/explicit/config.yaml': { concurrency: 4 },
      });

      const fromFiles = ConfigLoader.load({
        cwd: mockCwd,
        configPath: '/explicit/config.yaml',
        env: { COPYHEAD_CONFIG: '/env/config.yaml' },
      });
      expect(fromFiles.concurrency).toBe(4);
      expect(fromFiles.year).toBe(2001);
      expect(fromFiles.preserveYears).toBe(true);

      const withFlags = ConfigLoader.load({
        cwd: mockCwd,
        configPath: '/explicit/config.yaml',
        env: { COPYHEAD_CONFIG: '/env/config.yaml' },
        flags: { concurrency: 5 },
      });
      expect(withFlags.concurrency).toBe(5);
    });

    it('fails if the explicit config file is missing', () => {
      expect(() => ConfigLoader.load({ configPath: '/missing.yaml', env: {} })).toThrow(
        'Config file not found: /missing.yaml',
      );
    });

    it('fails if the config file named by the environment is missing', () => {
      expect(() =>
        ConfigLoader.load({ cwd: mockCwd, env: { COPYHEAD_CONFIG: '/nowhere.yaml' } }),
      ).toThrow('Config file not found: /nowhere.yaml');
    });

    it('fails on invalid YAML', () => {
      withFiles({ '/invalid.yaml': 'invalid: yaml: :' });

      expect(() => ConfigLoader.load({ configPath: '/invalid.yaml', env: {} })).toThrow(
        /Error parsing YAML file/,
      );
    });

    it('fails on a document that is not a mapping', () => {
      withFiles({ '/list.yaml': '- a\n- b\n' });

      expect(() => ConfigLoader.load({ configPath: '/list.yaml', env: {} })).toThrow(
        'Config file must contain a mapping: /list.yaml',
      );
    });

    it('lists each schema violation', () => {
      withFiles({ '/config.yaml': { detection: 'fuzzy', concurrency: 0 } });

      expect(() => ConfigLoader.load({ configPath: '/config.yaml', env: {} })).toThrow(
        /Configuration validation failed:\n- detection: .*\n- concurrency: /,
      );
    });

    it('appends ignore patterns from flags', () => {
      withFiles({ [repoPath]: { ignore: ['dist/'] } });

      const config = ConfigLoader.load({
        cwd: mockCwd,
        env: {},
        flags: { ignore: ['*.gen.rs'] },
      });
      expect(config.ignore).toEqual(['dist/', '*.gen.rs']);
    });

    it('replaces included and appends excluded extensions from flags', () => {
      withFiles({ [repoPath]: { extensions: { include: ['rs'], exclude: ['min.js'] } } });

      const config = ConfigLoader.load({
        cwd: mockCwd,
        env: {},
        flags: { extensions: { include: ['go'], exclude: ['pb.go'] } },
      });
      expect(config.extensions).toEqual({ include: ['go'], exclude: ['min.js', 'pb.go'] });
    });

    it('resolves template paths against the config file directory', () => {
      withFiles({ '/etc/copyhead/config.yaml': { template: { path: 'header.txt' } } });

      const config = ConfigLoader.load({
        cwd: mockCwd,
        configPath: '/etc/copyhead/config.yaml',
        env: {},
      });
      expect(config.template).toEqual({ path: '/etc/copyhead/header.txt' });
    });

    it('resolves flag paths against the working directory', () => {
      const config = ConfigLoader.load({
        cwd: mockCwd,
        env: {},
        flags: { template: { path: 'LICENSE_HEADER' } },
      });
      expect(config.template).toEqual({ path: '/mock/cwd/LICENSE_HEADER' });
    });

    it('reads the global ignore file from the environment', () => {
      const config = ConfigLoader.load({
        cwd: mockCwd,
        env: { COPYHEAD_GLOBAL_IGNORE: '/mock/home/.licenseignore' },
      });
      expect(config.globalIgnoreFile).toBe('/mock/home/.licenseignore');
    });

    it('prefers a configured global ignore file over the environment', () => {
      withFiles({ [repoPath]: { globalIgnoreFile: 'ignore/global' } });

      const config = ConfigLoader.load({
        cwd: mockCwd,
        env: { COPYHEAD_GLOBAL_IGNORE: '/mock/home/.licenseignore' },
      });
      expect(config.globalIgnoreFile).toBe('/mock/cwd/ignore/global');
    });
  });

  describe('mergeConfigs', () => {
    it('merges nested mappings and replaces arrays', () => {
      const merged = ConfigLoader.mergeConfigs(
        { extensions: { include: ['rs'], exclude: ['a'] }, ignore: ['x'] },
        { extensions: { exclude: ['b'] }, ignore: ['y'], mode: undefined },
      );
      expect(merged).toEqual({ extensions: { include: ['rs'], exclude: ['b'] }, ignore: ['y'] });
    });
  });
});
