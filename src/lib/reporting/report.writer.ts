/**
 * Report file handling
 */

import * as fs from 'fs';
import * as path from 'path';
import { CrawlReport } from '../crawling';

/**
 * `<host>_security_scan.json`, with the port separator made file-safe
 */
export function reportFileName(seedUrl: string): string {
  const host = new URL(seedUrl).host.replace(/:/g, '_');
  return `${host}_security_scan.json`;
}

/**
 * Write the report as indented JSON and return its path
 */
export async function saveReport(report: CrawlReport, outputDir: string): Promise<string> {
  const filepath = path.resolve(outputDir, reportFileName(report.target));

  // Ensure directory exists
  await fs.promises.mkdir(path.dirname(filepath), { recursive: true });

  await fs.promises.writeFile(filepath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
  return filepath;
}
