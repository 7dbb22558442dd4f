import path from 'path';

export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.pdf',
  '.doc',
  '.docx',
  '.ppt',
  '.pptx',
  '.xls',
  '.xlsx',
  '.csv',
  '.md',
  '.txt',
  '.html',
  '.htm',
  '.xml',
  '.jpg',
  '.jpeg',
  '.png',
  '.tiff',
  '.bmp',
  '.gif',
  '.wav',
  '.mp3',
  '.aac',
  '.flac'
];

export const OUTPUT_FORMATS: readonly string[] = ['md', 'json', 'html', 'txt'];

const SUPPORTED_EXTENSION_SET = new Set(SUPPORTED_EXTENSIONS);

export function isSupportedFile(filePath: string): boolean {
  return SUPPORTED_EXTENSION_SET.has(path.extname(filePath).toLowerCase());
}

export function isOutputFormat(format: string): boolean {
  return OUTPUT_FORMATS.includes(format.trim().toLowerCase());
}
