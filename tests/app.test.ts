import fs from 'fs';
import path from 'path';
import request from 'supertest';
import type { Application } from 'express';

import { createApp } from '../src/app';
import { decodeUploadName } from '../src/routes/conversion';
import { FakeCommandRunner, RecordedCall } from './helpers/fakeRunner';
import { makeTempDir, removeDir, writeFiles } from './helpers/recorders';

function argAfter(call: RecordedCall, flag: string): string {
  const index = call.args.indexOf(flag);
  return call.args[index + 1];
}

describe('Conversion web front-end', () => {
  let root: string;
  let stagingRoot: string;
  let runner: FakeCommandRunner;
  let app: Application;

  beforeEach(async () => {
    root = await makeTempDir();
    stagingRoot = path.join(root, 'staging');
    runner = new FakeCommandRunner();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);

    const context = await createApp({
      runner,
      publicDir: path.join(root, 'public'),
      settings: {
        stagingRoot,
        converterPath: 'docling',
        defaultOutputDir: path.join(root, 'default-output'),
        batchDriver: { command: 'node', args: ['batch.js'] }
      }
    });
    app = context.app;
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(root);
  });

  it('reports health', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok' });
  });

  it('returns supported formats', async () => {
    const response = await request(app).get('/formats');

    expect(response.status).toBe(200);
    expect(response.body.formats.source).toContain('pdf');
    expect(response.body.formats.source).toContain('flac');
    expect(response.body.formats.target).toEqual(['md', 'json', 'html', 'txt']);
  });

  it('reports whether the converter is installed', async () => {
    runner.respondWith(() => ({ exitCode: 1 }));

    const response = await request(app).get('/status');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ converter: { path: 'docling', installed: false } });
    expect(runner.calls[0].args).toEqual(['--help']);
  });

  describe('POST /convert/directory', () => {
    it('requires a source directory', async () => {
      const response = await request(app).post('/convert/directory').send({});

      expect(response.status).toBe(400);
      expect(runner.calls).toEqual([]);
    });

    it('rejects a source that does not exist', async () => {
      const missing = path.join(root, 'missing');

      const response = await request(app).post('/convert/directory').send({ sourcePath: missing });

      expect(response.status).toBe(404);
      expect(response.body.message).toBe(`Directory not found: ${missing}`);
    });

    it('rejects an unknown output format', async () => {
      const response = await request(app).post('/convert/directory').send({ sourcePath: root, outputFormat: 'docx' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Unsupported output format "docx".');
    });

    it('runs the batch driver and returns its output', async () => {
      runner.respondWith(() => ({ stdout: 'Conversion completed successfully.\n' }));
      const outputPath = path.join(root, 'converted');

      const response = await request(app)
        .post('/convert/directory')
        .send({ sourcePath: root, outputPath, outputFormat: 'json', verbose: true });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        message: 'Conversion completed successfully.',
        outputPath,
        output: 'Conversion completed successfully.\n'
      });
      expect(runner.calls[0]).toMatchObject({
        command: 'node',
        args: ['batch.js', root, '--output', outputPath, '--to', 'json', '--verbose']
      });
    });

    it('uses the default output directory and format', async () => {
      await request(app).post('/convert/directory').send({ sourcePath: root });

      expect(runner.calls[0].args).toEqual(['batch.js', root, '--output', path.join(root, 'default-output'), '--to', 'md']);
    });

    it('surfaces the captured output when the driver fails', async () => {
      runner.respondWith(() => ({ exitCode: 2, stdout: 'Converting\n', stderr: 'Finished with 1 failure(s).\n' }));

      const response = await request(app).post('/convert/directory').send({ sourcePath: root });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        success: false,
        message: 'Error during conversion.',
        output: 'Converting\nFinished with 1 failure(s).\n'
      });
    });
  });

  describe('POST /convert/upload', () => {
    it('stages uploads, converts them and serves the results', async () => {
      runner.respondWith(async (call) => {
        const sourceDir = call.args[1];
        const outputDir = argAfter(call, '--output');
        const staged = await fs.promises.readFile(path.join(sourceDir, 'sample.pdf'), 'utf8');
        await writeFiles(outputDir, ['sample.md'], `converted: ${staged}`);
        return { stdout: 'done\n' };
      });

      const response = await request(app)
        .post('/convert/upload')
        .field('outputFormat', 'md')
        .attach('files', Buffer.from('%PDF sample'), 'sample.pdf');

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.message).toBe('Files converted successfully.');
      expect(response.body.output).toBe('done\n');
      expect(runner.calls[0].args.slice(2)).toEqual(['--output', argAfter(runner.calls[0], '--output'), '--to', 'md', '--verbose']);

      const job = response.body.job;
      expect(job.files).toHaveLength(1);
      expect(job.files[0]).toMatchObject({ name: 'sample.md', relativePath: 'sample.md', size: 22 });
      expect(job.files[0].downloadUrl).toContain(`/download/${job.id}/0`);

      const download = await request(app).get(`/download/${job.id}/0`);
      expect(download.status).toBe(200);
      expect(download.header['content-disposition']).toBe('attachment; filename="sample.md"');
      const content = Buffer.isBuffer(download.body) ? download.body.toString('utf8') : download.text;
      expect(content).toBe('converted: %PDF sample');

      const details = await request(app).get(`/jobs/${job.id}`);
      expect(details.status).toBe(200);
      expect(details.body.job.id).toBe(job.id);

      const removal = await request(app).delete(`/jobs/${job.id}`);
      expect(removal.status).toBe(204);
      await expect(fs.promises.readdir(stagingRoot)).resolves.toEqual([]);

      const afterRemoval = await request(app).get(`/download/${job.id}/0`);
      expect(afterRemoval.status).toBe(404);
    });

    it('keeps non-ASCII upload names intact when staging', async () => {
      let staged: string[] = [];
      runner.respondWith(async (call) => {
        staged = await fs.promises.readdir(call.args[1]);
        return {};
      });

      const response = await request(app)
        .post('/convert/upload')
        .attach('files', Buffer.from('%PDF'), 'relatório.pdf');

      expect(response.status).toBe(200);
      expect(staged).toEqual(['relatório.pdf']);
    });

    it('serves results whose names fall outside latin1', async () => {
      runner.respondWith(async (call) => {
        await writeFiles(argAfter(call, '--output'), ['文档.md'], '# title');
        return {};
      });

      const response = await request(app)
        .post('/convert/upload')
        .attach('files', Buffer.from('%PDF'), 'doc.pdf');
      const job = response.body.job;
      expect(job.files[0].name).toBe('文档.md');

      const download = await request(app).get(`/download/${job.id}/0`);
      expect(download.status).toBe(200);
      expect(download.header['content-type']).toBe('application/octet-stream');
      expect(download.header['content-disposition']).toContain("filename*=UTF-8''%E6%96%87%E6%A1%A3.md");
    });

    it('says so when the converter produced no files', async () => {
      const response = await request(app)
        .post('/convert/upload')
        .attach('files', Buffer.from('a,b'), 'table.csv');

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('No output files were generated.');
      expect(response.body.job.files).toEqual([]);
    });

    it('rejects uploads without a supported file', async () => {
      const response = await request(app)
        .post('/convert/upload')
        .attach('files', Buffer.from('MZ'), 'setup.exe');

      expect(response.status).toBe(400);
      expect(runner.calls).toEqual([]);
    });

    it('removes the staging directory when the conversion fails', async () => {
      runner.respondWith(() => ({ exitCode: 2, stderr: 'Finished with 1 failure(s).\n' }));

      const response = await request(app)
        .post('/convert/upload')
        .attach('files', Buffer.from('hello'), 'note.txt');

      expect(response.status).toBe(500);
      expect(response.body.output).toBe('Finished with 1 failure(s).\n');
      await expect(fs.promises.readdir(stagingRoot)).resolves.toEqual([]);
    });
  });

  it('returns 404 for unknown jobs', async () => {
    const download = await request(app).get('/download/unknown/0');
    const removal = await request(app).delete('/jobs/unknown');

    expect(download.status).toBe(404);
    expect(removal.status).toBe(404);
  });
});

describe('decodeUploadName', () => {
  it('restores UTF-8 names read as latin1', () => {
    expect(decodeUploadName(Buffer.from('relatório.pdf', 'utf8').toString('latin1'))).toBe('relatório.pdf');
  });

  it('keeps names that are not UTF-8 underneath', () => {
    expect(decodeUploadName('caf\u00e9.pdf')).toBe('caf\u00e9.pdf');
    expect(decodeUploadName('文档.pdf')).toBe('文档.pdf');
    expect(decodeUploadName('plain.pdf')).toBe('plain.pdf');
  });
});
