import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';

import { createStagingArea, removeStagingArea, StagingArea } from '../config/storage';
import { OutputFile, UploadJob } from '../types/job';

async function listOutputFiles(outputDir: string, directory = outputDir): Promise<OutputFile[]> {
  const entries = await fs.promises.readdir(directory, { withFileTypes: true });
  const files: OutputFile[] = [];

  for (const entry of entries) {
    const entryPath = path.join(directory, entry.name);

    if (entry.isDirectory()) {
      files.push(...(await listOutputFiles(outputDir, entryPath)));
    } else if (entry.isFile()) {
      const stats = await fs.promises.stat(entryPath);
      files.push({
        name: entry.name,
        relativePath: path.relative(outputDir, entryPath).replace(/\\/g, '/'),
        absolutePath: entryPath,
        size: stats.size
      });
    }
  }

  return files;
}

/**
 * Tracks staged uploads whose converted output is still available for
 * download. Removing a job deletes its staging directory.
 */
export class JobStore {
  private readonly jobs = new Map<string, UploadJob>();

  constructor(private readonly stagingRoot: string) {}

  async stage(): Promise<StagingArea> {
    return await createStagingArea(this.stagingRoot);
  }

  async discard(area: StagingArea): Promise<void> {
    await removeStagingArea(area.root);
  }

  async register(area: StagingArea, outputFormat: string): Promise<UploadJob> {
    const job: UploadJob = {
      id: randomUUID(),
      stagingDir: area.root,
      sourceDir: area.sourceDir,
      outputDir: area.outputDir,
      outputFormat,
      files: await listOutputFiles(area.outputDir),
      createdAt: new Date()
    };

    this.jobs.set(job.id, job);
    return job;
  }

  getJob(id: string): UploadJob | undefined {
    return this.jobs.get(id);
  }

  async remove(id: string): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job) {
      return false;
    }

    this.jobs.delete(id);
    await removeStagingArea(job.stagingDir);
    return true;
  }

  async dispose(): Promise<void> {
    const ids = [...this.jobs.keys()];
    await Promise.all(ids.map((id) => this.remove(id)));
  }
}
