import fs from 'fs';
import path from 'path';

import { ConverterService } from '../src/services/converterService';
import { FakeCommandRunner, missingExecutable } from './helpers/fakeRunner';
import { makeTempDir, removeDir } from './helpers/recorders';

describe('ConverterService', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('builds the converter command with an optional format flag', () => {
    const service = new ConverterService(new FakeCommandRunner());

    expect(service.buildArgs({ inputFile: '/in/a.pdf', outputDir: '/out' })).toEqual(['--output', '/out', '/in/a.pdf']);
    expect(service.buildArgs({ inputFile: '/in/a.pdf', outputDir: '/out', outputFormat: 'json' })).toEqual([
      '--to',
      'json',
      '--output',
      '/out',
      '/in/a.pdf'
    ]);
  });

  it('creates the destination directory and reports success on exit code 0', async () => {
    const runner = new FakeCommandRunner(() => ({ stdout: 'done\n' }));
    const service = new ConverterService(runner, { executablePath: '/opt/docling/bin/docling' });
    const outputDir = path.join(root, 'nested', 'out');

    const outcome = await service.convert({ inputFile: '/in/a.pdf', outputDir });

    expect(fs.existsSync(outputDir)).toBe(true);
    expect(runner.calls[0].command).toBe('/opt/docling/bin/docling');
    expect(outcome).toEqual({
      inputFile: '/in/a.pdf',
      outputDir,
      success: true,
      exitCode: 0,
      stdout: 'done\n',
      stderr: '',
      missingExecutable: false
    });
  });

  it('reports an output directory that cannot be created without running the converter', async () => {
    const runner = new FakeCommandRunner();
    const service = new ConverterService(runner);
    const blocker = path.join(root, 'taken');
    await fs.promises.writeFile(blocker, 'not a directory');
    const outputDir = path.join(blocker, 'out');

    const outcome = await service.convert({ inputFile: '/in/a.pdf', outputDir });

    expect(runner.calls).toEqual([]);
    expect(outcome).toEqual({
      inputFile: '/in/a.pdf',
      outputDir,
      success: false,
      exitCode: null,
      stdout: '',
      stderr: '',
      missingExecutable: false,
      destinationError: expect.any(String)
    });
  });

  it('reports a non-zero exit as a failure with captured stderr', async () => {
    const service = new ConverterService(new FakeCommandRunner(() => ({ exitCode: 3, stderr: 'broken file' })));

    const outcome = await service.convert({ inputFile: '/in/a.pdf', outputDir: root });

    expect(outcome.success).toBe(false);
    expect(outcome.exitCode).toBe(3);
    expect(outcome.stderr).toBe('broken file');
    expect(outcome.missingExecutable).toBe(false);
  });

  it('flags a missing executable instead of throwing', async () => {
    const service = new ConverterService(new FakeCommandRunner(() => missingExecutable));

    const outcome = await service.convert({ inputFile: '/in/a.pdf', outputDir: root });

    expect(outcome.success).toBe(false);
    expect(outcome.missingExecutable).toBe(true);
  });

  it('checks the installation with --help and a short timeout', async () => {
    const runner = new FakeCommandRunner();
    const service = new ConverterService(runner);

    await expect(service.checkInstallation()).resolves.toBe(true);
    expect(runner.calls).toEqual([{ command: 'docling', args: ['--help'], options: { timeoutMs: 10_000 } }]);

    runner.respondWith(() => missingExecutable);
    await expect(service.checkInstallation()).resolves.toBe(false);

    runner.respondWith(() => ({ exitCode: null, timedOut: true }));
    await expect(service.checkInstallation()).resolves.toBe(false);
  });
});
