import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import os from 'os';
import * as path from 'path';
import { createProgram, main, name } from './index';

describe('cli package', () => {
  it('exports name', () => {
    expect(name).toBe('@buildprof/cli');
  });

  it('registers the profile, snapshot and compare commands', () => {
    const commands = createProgram().commands.map((c) => c.name());
    expect(commands).toEqual(['profile', 'snapshot', 'compare']);
  });

  it('reports the package version', () => {
    expect(createProgram().version()).toBe('0.1.0');
  });
});

describe('buildprof', () => {
  let tmpDir: string;
  let root: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;
  let infoSpy: ReturnType<typeof vi.spyOn>;
  let debugSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'buildprof-cli-test-')));
    root = path.join(tmpDir, 'project');
    await fs.mkdir(root);
    await fs.writeFile(path.join(root, 'main.c'), 'int main() {}');
    await fs.utimes(path.join(root, 'main.c'), 1000, 1000);

    vi.spyOn(os, 'homedir').mockReturnValue(path.join(tmpDir, 'home'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const run = (...args: string[]) => main(['node', 'buildprof', ...args]);
  const jsonOutput = () => JSON.parse(String(logSpy.mock.calls[0][0]));

  describe('profile', () => {
    it('writes a CSV of the files the build created and prints JSON', async () => {
      const report = path.join(tmpDir, 'report.csv');

      const code = await run('--json', 'profile', root, '-o', report, '--utc', '--build', 'touch new.o');

      expect(code).toBe(0);
      const output = jsonOutput();
      expect(output.root).toBe(root);
      expect(output.output).toBe(report);
      expect(output.build).toMatchObject({ command: 'touch new.o', exitCode: 0, timedOut: false });
      expect(output.summary).toEqual({ created: 1, modified: 0, unchanged: 1, missing: 0 });
      expect(output.changes).toHaveLength(1);
      expect(output.changes[0]).toMatchObject({ path: `${root}/new.o`, kind: 'created' });

      const lines = (await fs.readFile(report, 'utf8')).trimEnd().split('\n');
      expect(lines[0]).toBe('filepath,last_modification_timestamp');
      expect(lines[1].startsWith(`"${root}/new.o","`)).toBe(true);
      expect(lines[1].endsWith(' UTC"')).toBe(true);
    });

    it('exits 0 and still reports when the build fails', async () => {
      const report = path.join(tmpDir, 'report.csv');

      const code = await run('--json', 'profile', root, '-o', report, '-b', 'touch half.o; exit 4');

      expect(code).toBe(0);
      expect(jsonOutput().build.exitCode).toBe(4);
      expect(jsonOutput().changes.map((c: { path: string }) => c.path)).toEqual([`${root}/half.o`]);
    });

    it('picks up settings from the directory config file', async () => {
      await fs.writeFile(path.join(root, '.buildprof.yaml'), 'scan:\n  excludes: ["*.tmp"]\n');
      const report = path.join(tmpDir, 'report.csv');

      await run('--json', 'profile', root, '-o', report, '-b', 'touch keep.o skip.tmp');

      expect(jsonOutput().changes.map((c: { path: string }) => c.path)).toEqual([`${root}/keep.o`]);
    });

    it('keeps stdout to the JSON result while logging verbosely', async () => {
      const report = path.join(tmpDir, 'report.csv');

      const code = await run(
        '--json', '--verbose', 'profile', root, '-o', report, '-b', 'echo building && touch new.o',
      );

      expect(code).toBe(0);
      const stdout = [logSpy, infoSpy, debugSpy]
        .flatMap((spy) => spy.mock.calls.map((call: unknown[]) => call.map(String).join(' ')))
        .join('\n');
      expect(JSON.parse(stdout).build.command).toBe('echo building && touch new.o');
      expect(errSpy).toHaveBeenCalledWith('Running build: echo building && touch new.o');
    });

    it('takes every argument after -b as the build command', async () => {
      const report = path.join(tmpDir, 'report.csv');

      const code = await run('--json', 'profile', root, '-o', report, '-b', 'touch', 'a.o', 'b.o');

      expect(code).toBe(0);
      expect(jsonOutput().build.command).toBe('touch a.o b.o');
      expect(jsonOutput().changes.map((c: { path: string }) => c.path)).toEqual([
        `${root}/a.o`,
        `${root}/b.o`,
      ]);
    });

    it('exits 2 when -b has no command', async () => {
      expect(await run('profile', root, '-b')).toBe(2);
    });

    it('exits 2 for a directory that does not exist', async () => {
      const missing = path.join(tmpDir, 'missing');

      const code = await run('--json', 'profile', missing, '-b', 'true');

      expect(code).toBe(2);
      expect(jsonOutput()).toEqual({
        error: { code: 'UsageError', message: `Directory not found: ${missing}` },
      });
    });

    it('exits 2 for an invalid concurrency', async () => {
      const code = await run('profile', root, '--concurrency', 'lots', '-b', 'true');

      expect(code).toBe(2);
      expect(errSpy).toHaveBeenCalledWith(
        '❌ Error: --concurrency must be a positive integer, got "lots"',
      );
    });

    it('exits 2 for an invalid config file', async () => {
      const configPath = path.join(tmpDir, 'bad.yaml');
      await fs.writeFile(configPath, 'report:\n  timeZone: mars\n');

      const code = await run('--json', '--config', configPath, 'profile', root, '-b', 'true');

      expect(code).toBe(2);
      expect(jsonOutput().error.code).toBe('ConfigError');
    });
  });

  describe('snapshot and compare', () => {
    it('reports a file modified between two saved snapshots', async () => {
      const before = path.join(tmpDir, 'before.json');
      const after = path.join(tmpDir, 'after.json');
      const report = path.join(tmpDir, 'compare.csv');

      expect(await run('snapshot', root, '-o', before)).toBe(0);
      await fs.utimes(path.join(root, 'main.c'), 2000, 2000);
      expect(await run('snapshot', root, '-o', after)).toBe(0);
      logSpy.mockClear();

      const code = await run('--json', 'compare', before, after, '-o', report, '--relative', '--utc');

      expect(code).toBe(0);
      expect(warnSpy).not.toHaveBeenCalled();
      expect(jsonOutput()).toEqual({
        root,
        output: report,
        summary: { created: 0, modified: 1, unchanged: 0, missing: 0 },
        changes: [
          { path: `${root}/main.c`, mtimeMs: 2_000_000, kind: 'modified', previousMtimeMs: 1_000_000 },
        ],
      });
      expect(await fs.readFile(report, 'utf8')).toBe(
        'filepath,last_modification_timestamp\n"main.c","1970-01-01 00:33:20 UTC"\n',
      );
    });

    it('warns when the snapshots are of different directories', async () => {
      const other = path.join(tmpDir, 'other');
      await fs.mkdir(other);
      const before = path.join(tmpDir, 'before.json');
      const after = path.join(tmpDir, 'after.json');
      await run('snapshot', root, '-o', before);
      await run('snapshot', other, '-o', after);
      logSpy.mockClear();

      const code = await run('--json', 'compare', before, after);

      expect(code).toBe(0);
      expect(warnSpy).toHaveBeenCalledWith(
        `Warning: snapshots were taken of different directories (${root} and ${other}); ` +
          'files are matched by absolute path',
      );
      expect(jsonOutput().summary).toEqual({ created: 0, modified: 0, unchanged: 0, missing: 1 });
    });

    it('prints JSON details of a saved snapshot', async () => {
      const out = path.join(tmpDir, 'snap.json');

      await run('--json', 'snapshot', root, '-o', out);

      expect(jsonOutput()).toMatchObject({ root, output: out, fileCount: 1 });
    });

    it('exits 1 for a snapshot file that is not valid', async () => {
      const bad = path.join(tmpDir, 'bad.json');
      await fs.writeFile(bad, '{ "schemaVersion": 1 }');

      const code = await run('--json', 'compare', bad, bad);

      expect(code).toBe(1);
      expect(jsonOutput().error.code).toBe('SnapshotError');
    });

    it('exits 2 when the snapshot output is missing', async () => {
      expect(await run('snapshot', root)).toBe(2);
    });
  });
});
