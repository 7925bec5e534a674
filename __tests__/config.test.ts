import * as fs from 'fs-extra';
import * as path from 'path';
import { getConfigPath, loadConfiguration, parseConfiguration, writeDefaultConfiguration } from '../src/config';
import { CONFIG_FILE, DEFAULT_CONFIGURATION } from '../src/constants';
import { ConfigurationError } from '../src/errors';
import { makeTempDir } from './helpers';

describe('configuration', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('should fall back to defaults without a config file', () => {
    expect(loadConfiguration(root)).toEqual(DEFAULT_CONFIGURATION);
  });

  it('should fill in missing nested settings', async () => {
    await fs.writeJson(path.join(root, CONFIG_FILE), {
      downstreamSubdir: 'tools/sched',
      schedulers: { allowList: ['scx_lavd'] }
    });

    const config = loadConfiguration(root);

    expect(config.downstreamSubdir).toBe('tools/sched');
    expect(config.schedulers).toEqual({
      broadGroup: 'kernel-examples',
      narrowGroup: 'rust-user',
      allowList: ['scx_lavd'],
      exclude: ['meson.build']
    });
    expect(config.manifest).toEqual({ fileName: 'Cargo.toml', dependency: 'scx_utils' });
  });

  it('should reject values of the wrong type', () => {
    expect(() => parseConfiguration({ schedulers: { allowList: 'scx_rusty' } })).toThrow(ConfigurationError);
  });

  it('should reject unknown keys', () => {
    expect(() => parseConfiguration({ mappings: [] })).toThrow(/Configuration validation failed/);
  });

  it('should reject chain targets without a command', () => {
    expect(() =>
      parseConfiguration({ chain: { targets: [{ name: 'a', output: 'a', command: [] }] } })
    ).toThrow(ConfigurationError);
  });

  it('should report malformed JSON', async () => {
    await fs.writeFile(path.join(root, CONFIG_FILE), '{');

    expect(() => loadConfiguration(root)).toThrow(/Failed to read downstream-sync.json/);
  });

  it('should write the default configuration once', async () => {
    expect(await writeDefaultConfiguration(root)).toBe(true);
    expect(await fs.readJson(getConfigPath(root))).toEqual(DEFAULT_CONFIGURATION);
    expect(await writeDefaultConfiguration(root)).toBe(false);
  });
});
