import * as fs from 'fs-extra';
import * as path from 'path';
import inquirer from 'inquirer';
import { DownstreamSync } from '../src/downstream-sync';
import { parseConfiguration } from '../src/config';
import { MissingDestinationError } from '../src/errors';
import { FixtureEnumerator, makeTempDir, writeFiles } from './helpers';

jest.mock('inquirer');
jest.mock('chalk', () => ({
  green: jest.fn((text: string) => text),
  red: jest.fn((text: string) => text),
  yellow: jest.fn((text: string) => text),
  blue: jest.fn((text: string) => text),
  gray: jest.fn((text: string) => text),
  bold: jest.fn((text: string) => text)
}));

const configuration = parseConfiguration({
  downstreamSubdir: 'kernel',
  schedulers: { broadGroup: 'grpA', allowList: ['schedX'] }
});

const SOURCES = {
  'include/a.h': '#define A 2\n',
  'grpA/s1.c': 'int s1;\n',
  'rust-user/schedX/Cargo.toml': 'scx_utils = { path = "../../scx_utils", version = "1.2.3" }\n',
  'rust-user/schedY/Cargo.toml': '[package]\nname = "schedY"\n'
};

describe('DownstreamSync', () => {
  let sourceRoot: string;
  let downstream: string;
  let sync: DownstreamSync;
  let consoleLogSpy: jest.SpyInstance;

  beforeEach(async () => {
    sourceRoot = await makeTempDir();
    downstream = await makeTempDir();
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();

    await writeFiles(sourceRoot, SOURCES);
    await writeFiles(downstream, {
      'kernel/include/a.h': '#define A 1\n',
      'kernel/s1.c': 'int s1;\n',
      'kernel/schedX/Cargo.toml': 'old\n'
    });

    sync = new DownstreamSync({
      sourceRoot,
      configuration,
      enumerator: new FixtureEnumerator({
        include: ['include/a.h'],
        grpA: ['grpA/s1.c'],
        'rust-user': ['rust-user/schedX/Cargo.toml', 'rust-user/schedY/Cargo.toml']
      })
    });
    sync.init();
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    jest.mocked(inquirer.prompt).mockReset();
    await fs.remove(sourceRoot);
    await fs.remove(downstream);
  });

  it('should map only allow-listed narrow sources', () => {
    expect(sync.planMappings(downstream).map(mapping => mapping.destination)).toEqual([
      path.join(downstream, 'kernel/include/a.h'),
      path.join(downstream, 'kernel/s1.c'),
      path.join(downstream, 'kernel/schedX/Cargo.toml')
    ]);
  });

  it('should sync changed files and report counts', async () => {
    const report = await sync.run(downstream);

    expect(report).toEqual({ total: 3, missing: 0, skipped: 1, copied: 2 });
    expect(fs.readFileSync(path.join(downstream, 'kernel/schedX/Cargo.toml'), 'utf8'))
      .toBe('scx_utils = "1.2.3"\n');
    expect(consoleLogSpy).toHaveBeenCalledWith(
      '→',
      `Syncing 1 headers and 2 scheduler source files to ${path.join(downstream, 'kernel')}`
    );
    expect(consoleLogSpy).toHaveBeenCalledWith('✓', 'Skipped 1 unchanged files');
  });

  it('should copy nothing when run twice', async () => {
    await sync.run(downstream);
    const report = await sync.run(downstream);

    expect(report).toEqual({ total: 3, missing: 0, skipped: 3, copied: 0 });
  });

  it('should refuse to write anything when a destination is missing', async () => {
    await fs.remove(path.join(downstream, 'kernel/s1.c'));

    await expect(sync.run(downstream)).rejects.toThrow(MissingDestinationError);
    await expect(sync.run(downstream)).rejects.toMatchObject({
      missing: [path.join(downstream, 'kernel/s1.c')]
    });
    expect(fs.readFileSync(path.join(downstream, 'kernel/include/a.h'), 'utf8')).toBe('#define A 1\n');
    expect(fs.readFileSync(path.join(downstream, 'kernel/schedX/Cargo.toml'), 'utf8')).toBe('old\n');
  });

  it('should ask before copying in interactive mode', async () => {
    jest.mocked(inquirer.prompt).mockResolvedValueOnce({ confirm: false });

    const report = await sync.run(downstream, { interactive: true });

    expect(inquirer.prompt).toHaveBeenCalledWith([
      expect.objectContaining({ type: 'confirm', message: 'Copy 2 changed file(s)?' })
    ]);
    expect(report).toEqual({ total: 3, missing: 0, skipped: 1, copied: 0 });
    expect(fs.readFileSync(path.join(downstream, 'kernel/include/a.h'), 'utf8')).toBe('#define A 1\n');
  });

  it('should copy after confirmation in interactive mode', async () => {
    jest.mocked(inquirer.prompt).mockResolvedValueOnce({ confirm: true });

    const report = await sync.run(downstream, { interactive: true });

    expect(report.copied).toBe(2);
  });

  it('should not prompt when nothing changed', async () => {
    await sync.run(downstream);
    await sync.run(downstream, { interactive: true });

    expect(inquirer.prompt).not.toHaveBeenCalled();
  });

  it('should build the chain from configuration', () => {
    const graph = sync.chain();

    expect(graph.targets.map(target => target.name)).toEqual([
      'scx_layered',
      'scx_rusty',
      'scx_rustland',
      'scx_rlfifo',
      'scx_asdf',
      'scx_bpfland',
      'scx_lavd'
    ]);
    expect(graph.aggregate.name).toBe('rust_scheds');
    expect(graph.aggregate.depends).toEqual(['scx_lavd']);
  });
});
