import fs from 'fs';
import path from 'path';

export const FAILURE_REPORT_FILENAME = 'failed_conversions.txt';
export const FAILURE_REPORT_HEADER = 'Files that failed conversion:';

export function formatFailureReport(failedFiles: readonly string[]): string {
  return [FAILURE_REPORT_HEADER, ...failedFiles].map((line) => `${line}\n`).join('');
}

export async function writeFailureReport(failedFiles: readonly string[], outputRoot: string): Promise<string> {
  const reportPath = path.join(outputRoot, FAILURE_REPORT_FILENAME);
  await fs.promises.mkdir(outputRoot, { recursive: true });
  await fs.promises.writeFile(reportPath, formatFailureReport(failedFiles), 'utf8');
  return reportPath;
}
