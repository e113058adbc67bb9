// Report Emitter — workbook → temp file → sink, with unconditional cleanup

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import Logger, { getErrorMessage } from './logger';
import { formatFileTimestamp, sanitizeFileName } from './reporting/utils';
import { buildReportWorkbook } from './report-workbook';
import type { ExpandedRow, ReportSink, ReportWriter } from './types';

interface ReportEmitterOptions {
  /** Directory for the intermediate .xlsx; defaults to the OS temp directory */
  tempDir?: string;
  now?: () => Date;
}

class ReportEmitter implements ReportWriter {
  private sink: ReportSink;
  private tempDir: string;
  private now: () => Date;

  constructor(sink: ReportSink, options: ReportEmitterOptions = {}) {
    this.sink = sink;
    this.tempDir = options.tempDir ?? os.tmpdir();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Render and deliver one report. Never rejects: render or delivery failures are
   * logged and reported as false.
   */
  async emit(rows: readonly ExpandedRow[], reportName: string, destinationId: string): Promise<boolean> {
    const now = this.now();
    const fileName = `${sanitizeFileName(reportName)}_${formatFileTimestamp(now)}.xlsx`;
    const filePath = path.join(this.tempDir, fileName);

    try {
      const workbook = buildReportWorkbook(rows, now);
      await workbook.xlsx.writeFile(filePath);
      await this.sink.deliver(fs.readFileSync(filePath), fileName, destinationId);
      Logger.info(`Delivered ${fileName} (${rows.length} rows) via ${this.sink.name} for ${destinationId}`);
      return true;
    } catch (error) {
      Logger.error(`Error generating report ${reportName}:`, getErrorMessage(error));
      return false;
    } finally {
      this.removeTempFile(filePath);
    }
  }

  private removeTempFile(filePath: string): void {
    if (!fs.existsSync(filePath)) return;
    try {
      fs.unlinkSync(filePath);
    } catch (error) {
      Logger.debug(`Could not remove temp file ${filePath}:`, getErrorMessage(error));
    }
  }
}

export default ReportEmitter;
