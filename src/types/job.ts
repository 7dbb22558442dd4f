export interface OutputFile {
  name: string;
  relativePath: string;
  absolutePath: string;
  size: number;
}

export interface UploadJob {
  id: string;
  stagingDir: string;
  sourceDir: string;
  outputDir: string;
  outputFormat: string;
  files: OutputFile[];
  createdAt: Date;
}
