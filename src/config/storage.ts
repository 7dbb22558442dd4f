import fs from 'fs';
import path from 'path';

export interface StagingArea {
  root: string;
  sourceDir: string;
  outputDir: string;
}

export async function ensureStagingRoot(stagingRoot: string): Promise<void> {
  await fs.promises.mkdir(stagingRoot, { recursive: true });
}

export async function createStagingArea(stagingRoot: string): Promise<StagingArea> {
  await ensureStagingRoot(stagingRoot);

  const root = await fs.promises.mkdtemp(path.join(stagingRoot, 'upload-'));
  const sourceDir = path.join(root, 'source');
  const outputDir = path.join(root, 'output');

  await Promise.all([
    fs.promises.mkdir(sourceDir, { recursive: true }),
    fs.promises.mkdir(outputDir, { recursive: true })
  ]);

  return { root, sourceDir, outputDir };
}

export async function removeStagingArea(root: string): Promise<void> {
  await fs.promises.rm(root, { recursive: true, force: true });
}
