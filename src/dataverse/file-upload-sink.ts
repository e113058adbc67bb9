// Dataverse File Sink — chunked upload of a report into a file column on the user record

import { DEFAULT_FILE_ATTRIBUTE, ENTITY_SET, UPLOAD_CHUNK_SIZE } from '../constants';
import Logger from '../logger';
import type { ReportSink } from '../types';
import type { DataverseSession } from './dataverse-session';

export type WebApiWriter = Pick<DataverseSession, 'apiPatch'>;

/** Header value as a string, whatever shape the HTTP client gave it */
function headerString(headers: Record<string, unknown>, name: string): string | null {
  const value = headers[name];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Uploads in three steps:
 *   1. PATCH the file column with `x-ms-transfer-mode: chunked` → upload session URL + chunk size
 *   2. PATCH each block to the session URL with a Content-Range header
 *   3. the last block completes the file
 */
class DataverseFileSink implements ReportSink {
  readonly name = 'dataverse';
  private api: WebApiWriter;
  private fileAttribute: string;
  private fallbackChunkSize: number;

  constructor(api: WebApiWriter, options: { fileAttribute?: string; chunkSize?: number } = {}) {
    this.api = api;
    this.fileAttribute = options.fileAttribute ?? DEFAULT_FILE_ATTRIBUTE;
    this.fallbackChunkSize = options.chunkSize ?? UPLOAD_CHUNK_SIZE;
  }

  async deliver(artifact: Buffer, fileName: string, destinationId: string): Promise<void> {
    const columnUrl = `${ENTITY_SET.systemuser}(${destinationId})/${this.fileAttribute}?x-ms-file-name=${encodeURIComponent(fileName)}`;
    const init = await this.api.apiPatch(columnUrl, null, `Initialize upload ${fileName}`, { 'x-ms-transfer-mode': 'chunked' });

    const headers: Record<string, unknown> = { ...init.headers };
    const sessionUrl = headerString(headers, 'location');
    if (!sessionUrl) throw new Error(`Upload of ${fileName} was not given a session location`);
    const advertised = Number(headerString(headers, 'x-ms-chunk-size'));
    const chunkSize = Number.isInteger(advertised) && advertised > 0 ? advertised : this.fallbackChunkSize;

    const total = artifact.length;
    let blocks = 0;
    for (let start = 0; start < total; start += chunkSize) {
      const end = Math.min(start + chunkSize, total);
      await this.api.apiPatch(sessionUrl, artifact.subarray(start, end), `Upload block ${blocks + 1} of ${fileName}`, {
        'Content-Type': 'application/octet-stream',
        'Content-Range': `bytes ${start}-${end - 1}/${total}`,
        'x-ms-file-name': fileName
      });
      blocks++;
    }

    Logger.info(`Successfully uploaded report for user ${destinationId} (${blocks} blocks, ${total}B)`);
  }
}

export default DataverseFileSink;
