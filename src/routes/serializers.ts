import type { Request } from 'express';

import { UploadJob } from '../types/job';

export function buildDownloadUrl(req: Request, jobId: string, fileIndex: number): string | undefined {
  const host = req.get('host');

  if (!host) {
    return undefined;
  }

  const protocol = req.protocol;
  const base = `${protocol}://${host}`;

  try {
    return new URL(`download/${encodeURIComponent(jobId)}/${fileIndex}`, base).toString();
  } catch (_error) {
    return undefined;
  }
}

export function serializeJob(req: Request, job: UploadJob) {
  return {
    id: job.id,
    outputFormat: job.outputFormat,
    createdAt: job.createdAt,
    files: job.files.map((file, index) => ({
      name: file.name,
      relativePath: file.relativePath,
      size: file.size,
      downloadUrl: buildDownloadUrl(req, job.id, index)
    }))
  };
}
