import * as fs from 'node:fs';
import * as path from 'node:path';
import Logger from './logger';
import { sanitizeFileName } from './reporting/utils';
import type { ReportSink } from './types';

/** Writes each report to `<outputDir>/<destinationId>/<fileName>` instead of uploading it */
class DirectorySink implements ReportSink {
  readonly name = 'directory';
  private outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  async deliver(artifact: Buffer, fileName: string, destinationId: string): Promise<void> {
    const dir = path.join(this.outputDir, sanitizeFileName(destinationId));
    await fs.promises.mkdir(dir, { recursive: true });
    const target = path.join(dir, fileName);
    await fs.promises.writeFile(target, artifact);
    Logger.debug(`Wrote ${target}`);
  }
}

export default DirectorySink;
